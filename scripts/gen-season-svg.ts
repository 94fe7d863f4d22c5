/**
 * Generate an SVG plot of a noisy seasonal series and its SSA
 * reconstruction from the leading eigentriple pair.
 *
 * Signal: sin(2πt/260) + N(0, 0.5²) over five periods (t = 1…1300).
 *
 * Usage:  npx tsx scripts/gen-season-svg.ts <L> [seed]
 *   L     window length, required (650 is half the series)
 *   seed  noise seed, default 1
 * Output: assets/season.svg
 */

import { resolve, dirname } from "node:path";
import { performance } from "node:perf_hooks";
import { init, defaultDevice } from "@hamk-uas/jax-js-nonconsuming";
import { ssaDecompose, ssaReconstruct, ssaContributions, syntheticSeries, createSsaLogger } from "../src/index.ts";
import {
  makeLinearScale, polylinePoints, extent, yTicksFromRange,
  renderGridLines, renderYAxis, renderXAxis, renderAxesBorder, writeSvg,
} from "./lib/svg-helpers.ts";
import { withLeakCheck } from "./lib/leak-utils.ts";
import { intArg } from "./lib/cli-args.ts";

const root = resolve(dirname(new URL(import.meta.url).pathname), "..");
const logger = createSsaLogger(process.env.SSA_LOG_LEVEL ?? "info");

const period = 260;
const cycles = 5;
const n = period * cycles;
const usage = "tsx scripts/gen-season-svg.ts <L> [seed]";
const L = intArg(process.argv, 0, "L", usage);
const seed = intArg(process.argv, 1, "seed", usage, 1);

const devices = await init();
defaultDevice(devices.includes("wasm") ? "wasm" : "cpu");

const { t, y, clean } = syntheticSeries({ n, period, noiseStd: 0.5, seed, start: 1 });

// ── Decompose and reconstruct ──────────────────────────────────────────────

const t0 = performance.now();
const dec = ssaDecompose(y, L, { truncateTo: 10, logger });
const t1 = performance.now();
const rec = await withLeakCheck(() => ssaReconstruct(dec, { one: [1, 2] }, { logger }));
const t2 = performance.now();

const share = ssaContributions(dec).slice(0, 2).reduce((s, v) => s + v, 0);
logger.info(
  `L=${L}, K=${dec.K}: decompose ${(t1 - t0).toFixed(0)} ms, reconstruct ${(t2 - t1).toFixed(0)} ms, ` +
  `pair (1,2) carries ${(100 * share).toFixed(1)}% of the energy`,
);

// ── SVG generation ─────────────────────────────────────────────────────────

const margin = { top: 30, right: 20, bottom: 50, left: 55 };
const W = 900;
const H = 360;
const plotW = W - margin.left - margin.right;
const plotH = H - margin.top - margin.bottom;

const [lo, hi] = extent(y, rec.one);
const yMin = Math.floor(lo * 2) / 2;
const yMax = Math.ceil(hi * 2) / 2;

const sx = makeLinearScale(t[0], t[n - 1], margin.left, margin.left + plotW);
const sy = makeLinearScale(yMin, yMax, margin.top + plotH, margin.top); // inverted: high values at top

const yTicks = yTicksFromRange(yMin, yMax);
const tTicks: number[] = [];
for (let v = 0; v <= t[n - 1]; v += period) tTicks.push(v);

const obsColor = "#9ca3af";     // grey
const recColor = "#16a34a";     // green
const cleanColor = "#111827";

const lines: string[] = [];
const push = (s: string) => lines.push(s);

push(`<svg xmlns="http://www.w3.org/2000/svg" viewBox="0 0 ${W} ${H}" font-family="system-ui,-apple-system,sans-serif" font-size="12">`);
push(`<rect width="${W}" height="${H}" fill="white"/>`);
lines.push(...renderGridLines(yTicks, sy, margin.left, W - margin.right));

push(`<polyline points="${polylinePoints(t, y, sx, sy)}" fill="none" stroke="${obsColor}" stroke-width="1"/>`);
push(`<polyline points="${polylinePoints(t, clean, sx, sy)}" fill="none" stroke="${cleanColor}" stroke-width="1" stroke-dasharray="4,3"/>`);
push(`<polyline points="${polylinePoints(t, rec.one, sx, sy)}" fill="none" stroke="${recColor}" stroke-width="2"/>`);

lines.push(...renderAxesBorder(margin.left, margin.top, W - margin.right, H - margin.bottom));
lines.push(...renderYAxis(yTicks, sy, margin.left, (v) => v.toFixed(1)));
lines.push(...renderXAxis(tTicks.map(v => ({ val: v, label: String(v) })), sx, H - margin.bottom));

push(`<text x="${margin.left + plotW / 2}" y="${H - 5}" text-anchor="middle" fill="#333" font-size="13">t</text>`);
push(`<text x="${W / 2}" y="${16}" text-anchor="middle" fill="#333" font-size="12" font-weight="600">SSA, L=${L}: reconstruction from eigentriples 1–2 (${(100 * share).toFixed(1)}% of energy)</text>`);

// Legend
const legX = W - margin.right - 215;
const legY = margin.top + 8;
push(`<rect x="${legX}" y="${legY}" width="210" height="62" rx="4" fill="white" stroke="#e5e7eb" stroke-width="1"/>`);
push(`<line x1="${legX + 8}" y1="${legY + 14}" x2="${legX + 20}" y2="${legY + 14}" stroke="${obsColor}" stroke-width="1"/>`);
push(`<text x="${legX + 24}" y="${legY + 14}" dominant-baseline="middle" fill="#333" font-size="11">Observations</text>`);
push(`<line x1="${legX + 8}" y1="${legY + 30}" x2="${legX + 20}" y2="${legY + 30}" stroke="${cleanColor}" stroke-width="1" stroke-dasharray="4,3"/>`);
push(`<text x="${legX + 24}" y="${legY + 30}" dominant-baseline="middle" fill="#333" font-size="11">Noiseless signal</text>`);
push(`<line x1="${legX + 8}" y1="${legY + 46}" x2="${legX + 20}" y2="${legY + 46}" stroke="${recColor}" stroke-width="2"/>`);
push(`<text x="${legX + 24}" y="${legY + 46}" dominant-baseline="middle" fill="#333" font-size="11">Reconstruction (1, 2)</text>`);

push(`</svg>`);

const outPath = resolve(root, "assets", "season.svg");
const bytes = writeSvg(lines, outPath);
logger.info(`Written: ${outPath} (${(bytes / 1024).toFixed(0)} KB)`);
