import { afterEach, describe, it, expect, vi } from 'vitest';
import { createSsaLogger, ssaDecompose, ssaReconstruct } from '../src/index';
import { withLeakCheck } from './utils';
import { getFloat64Configs, applyConfig } from './test-matrix';

describe('createSsaLogger', () => {
  const saved = process.env.SSA_LOG_LEVEL;
  afterEach(() => {
    if (saved === undefined) delete process.env.SSA_LOG_LEVEL;
    else process.env.SSA_LOG_LEVEL = saved;
  });

  it('is silent without a level', () => {
    delete process.env.SSA_LOG_LEVEL;
    expect(createSsaLogger().silent).toBe(true);
  });

  it('takes its level from SSA_LOG_LEVEL', () => {
    process.env.SSA_LOG_LEVEL = 'debug';
    const logger = createSsaLogger();
    expect(logger.silent).toBe(false);
    expect(logger.level).toBe('debug');
  });

  it('an explicit level wins', () => {
    process.env.SSA_LOG_LEVEL = 'debug';
    expect(createSsaLogger('warn').level).toBe('warn');
  });
});

describe('injected logger', async () => {
  const configs = await getFloat64Configs();

  it('reports clamped truncation', () => {
    const logger = createSsaLogger('error');
    const debug = vi.spyOn(logger, 'debug');
    ssaDecompose([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], 5, { truncateTo: 9, logger });
    expect(debug).toHaveBeenCalledWith('truncateTo=9 exceeds rank 5; keeping all');
  });

  for (const config of configs) {
    it(`reports each reconstructed group (${config.label})`, async () => {
      applyConfig(config);
      const logger = createSsaLogger('error');
      const debug = vi.spyOn(logger, 'debug');
      const dec = ssaDecompose([1, 2, 3, 4, 5, 6, 7, 8, 9, 10], 5);
      await withLeakCheck(() => ssaReconstruct(dec, { trend: [1, 2], rest: [3] }, { logger }));
      expect(debug).toHaveBeenCalledWith('reconstructing group "trend" from 2 eigentriple(s)');
      expect(debug).toHaveBeenCalledWith('reconstructing group "rest" from 1 eigentriple(s)');
    });
  }
});
