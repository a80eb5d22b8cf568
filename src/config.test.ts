import { describe, it, expect } from 'vitest';
import { parseConfig } from './config';
import { ConfigError } from './errors';

describe('parseConfig', () => {
  it('fills in defaults', () => {
    expect(parseConfig()).toEqual({
      compatible: false,
      refTracking: true,
      useBigInt64: false,
      warnOnPrecisionLoss: true,
      maxDepth: 50,
    });
  });

  it('keeps given options', () => {
    const config = parseConfig({ compatible: true, refTracking: false, maxDepth: 10 });
    expect(config.compatible).toBe(true);
    expect(config.refTracking).toBe(false);
    expect(config.maxDepth).toBe(10);
  });

  it('rejects a depth limit below 2', () => {
    expect(() => parseConfig({ maxDepth: 1 })).toThrow(ConfigError);
  });

  it('names the offending option', () => {
    expect(() => parseConfig({ maxDepth: 2.5 })).toThrow(/^Invalid config: maxDepth: /);
  });
});
