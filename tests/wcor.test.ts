import { describe, it, expect } from 'vitest';
import {
  ssaDecompose, ssaContributions, ssaSingularValues, ssaWCorrelation, ssaReconstruct,
  syntheticSeries, IndexOutOfRangeError,
} from '../src/index';
import { weightedInner } from '../src/wcor';
import { maxAbsDiff, withLeakCheck } from './utils';
import { getFloat64Configs, applyConfig } from './test-matrix';

const noisy = syntheticSeries({ n: 80, period: 16, slope: 0.03, noiseStd: 0.5, seed: 13 }).y;

// Constant 5 plus a period-10 sinusoid with L = 20, K = 90: both multiples
// of the period, so the trajectory rows and columns of the two parts are
// exactly orthogonal and the SVD separates them (σ₁ = 5·√1800 for the
// constant, the sinusoid pair after it).
const N_SEP = 109;
const separable = Array.from({ length: N_SEP }, (_, t) => 5 + Math.sin(2 * Math.PI * t / 10));

// ─── Spectrum ───────────────────────────────────────────────────────────────

describe('ssaSingularValues / ssaContributions', () => {
  it('singular values follow the eigentriple order', () => {
    const dec = ssaDecompose(noisy, 16);
    expect(ssaSingularValues(dec)).toEqual(dec.triples.map(t => t.sigma));
  });

  it('contributions sum to 1 without truncation', () => {
    const c = ssaContributions(ssaDecompose(noisy, 16));
    expect(c).toHaveLength(16);
    expect(Math.abs(c.reduce((s, v) => s + v, 0) - 1)).toBeLessThan(1e-9);
  });

  it('truncation keeps the leading contributions', () => {
    const full = ssaContributions(ssaDecompose(noisy, 16));
    const top = ssaContributions(ssaDecompose(noisy, 16, { truncateTo: 4 }));
    expect(top).toHaveLength(4);
    for (let i = 0; i < 4; i++) expect(top[i]).toBeCloseTo(full[i], 12);
    expect(top.reduce((s, v) => s + v, 0)).toBeLessThan(1);
  });

  it('the constant carries 5²·1800 of the separable series energy', () => {
    const dec = ssaDecompose(separable, 20);
    expect(dec.triples[0].sigma).toBeCloseTo(5 * Math.sqrt(1800), 8);
  });

  it('contributions stay finite when the squared norm overflows', () => {
    const dec = ssaDecompose([1e200, 2e200, 3e200, 4e200, 5e200], 2);
    expect(dec.normSq).toBe(Infinity);
    const c = ssaContributions(dec);
    const unit = ssaContributions(ssaDecompose([1, 2, 3, 4, 5], 2));
    expect(c).toHaveLength(2);
    for (let i = 0; i < 2; i++) expect(c[i]).toBeCloseTo(unit[i], 10);
    expect(Math.abs(c[0] + c[1] - 1)).toBeLessThan(1e-9);
  });

  it('a zero series contributes nothing', () => {
    expect(ssaContributions(ssaDecompose([0, 0, 0, 0], 2))).toEqual([0, 0]);
  });
});

describe('weightedInner', () => {
  it('weights each product', () => {
    expect(weightedInner([1, 2, 3], [4, 5, 6], [1, 2, 1])).toBe(4 + 20 + 18);
  });
});

// ─── W-correlation ──────────────────────────────────────────────────────────

describe('ssaWCorrelation', async () => {
  const configs = await getFloat64Configs();

  for (const config of configs) {
    it(`elementary matrix is symmetric with unit diagonal (${config.label})`, async () => {
      applyConfig(config);
      const dec = ssaDecompose(noisy, 12);
      const rho = await withLeakCheck(() => ssaWCorrelation(dec));
      expect(rho).toHaveLength(12);
      for (let i = 0; i < 12; i++) {
        expect(rho[i]).toHaveLength(12);
        expect(rho[i][i]).toBe(1);
        for (let j = 0; j < 12; j++) {
          expect(rho[i][j]).toBe(rho[j][i]);
          expect(Math.abs(rho[i][j])).toBeLessThanOrEqual(1 + 1e-12);
        }
      }
    });

    it(`separates a constant from a sinusoid (${config.label})`, async () => {
      applyConfig(config);
      const dec = ssaDecompose(separable, 20);
      const rec = await withLeakCheck(() => ssaReconstruct(dec, { level: [1], wave: [2, 3] }));
      expect(maxAbsDiff(rec.level, new Array(N_SEP).fill(5))).toBeLessThan(1e-8);

      const rho = await withLeakCheck(() =>
        ssaWCorrelation(dec, { groups: { level: [1], wave: [2, 3] } }),
      );
      expect(rho[0][0]).toBe(1);
      expect(rho[1][1]).toBe(1);
      expect(Math.abs(rho[0][1])).toBeLessThan(1e-6);
    });

    it(`identical groups are fully correlated (${config.label})`, async () => {
      applyConfig(config);
      const dec = ssaDecompose(noisy, 12);
      const rho = await withLeakCheck(() =>
        ssaWCorrelation(dec, { groups: { a: [1, 2], b: [2, 1] } }),
      );
      expect(rho[0][1]).toBeCloseTo(1, 10);
    });

    it(`an empty group has zero correlation with the rest (${config.label})`, async () => {
      applyConfig(config);
      const dec = ssaDecompose(noisy, 12);
      const rho = await withLeakCheck(() =>
        ssaWCorrelation(dec, { groups: { a: [1], none: [] } }),
      );
      expect(rho).toEqual([[1, 0], [0, 1]]);
    });

    it(`group indices are validated (${config.label})`, async () => {
      applyConfig(config);
      const dec = ssaDecompose(noisy, 12);
      await expect(ssaWCorrelation(dec, { groups: { a: [13] } })).rejects.toBeInstanceOf(IndexOutOfRangeError);
    });
  }
});
