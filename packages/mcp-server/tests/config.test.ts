import { describe, it, expect } from 'vitest';
import { loadConfig } from '../src/config.js';

describe('loadConfig', () => {
  it('falls back to the engine defaults', () => {
    expect(loadConfig({})).toEqual({
      ytmTolerance: 1e-6,
      ytmMaxIterations: 1000,
      sensitivityStep: 0.005,
      logLevel: 'info',
    });
  });

  it('reads and coerces environment values', () => {
    const config = loadConfig({
      BOND_YTM_TOLERANCE: '1e-4',
      BOND_YTM_MAX_ITERATIONS: '250',
      BOND_SENSITIVITY_STEP: '0.01',
      BOND_LOG_LEVEL: 'debug',
    });
    expect(config).toEqual({ ytmTolerance: 1e-4, ytmMaxIterations: 250, sensitivityStep: 0.01, logLevel: 'debug' });
  });

  it('treats blank values as unset', () => {
    expect(loadConfig({ BOND_YTM_TOLERANCE: '  ', BOND_LOG_LEVEL: '' }).ytmTolerance).toBe(1e-6);
  });

  it('ignores unrelated variables', () => {
    expect(loadConfig({ HOME: '/tmp', BOND_LOG_LEVEL: 'warn' }).logLevel).toBe('warn');
  });

  it('rejects invalid values with the offending variable', () => {
    expect(() => loadConfig({ BOND_YTM_TOLERANCE: 'abc' })).toThrow('Invalid configuration: BOND_YTM_TOLERANCE');
    expect(() => loadConfig({ BOND_YTM_MAX_ITERATIONS: '0' })).toThrow('BOND_YTM_MAX_ITERATIONS');
    expect(() => loadConfig({ BOND_YTM_MAX_ITERATIONS: '2.5' })).toThrow('BOND_YTM_MAX_ITERATIONS');
    expect(() => loadConfig({ BOND_LOG_LEVEL: 'verbose' })).toThrow('BOND_LOG_LEVEL');
  });
});
