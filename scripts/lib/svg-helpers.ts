/**
 * SVG plotting helpers for the gen-*-svg scripts: scales, polylines,
 * axes and grid.
 */

import { writeFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

// ── Rounding ───────────────────────────────────────────────────────────────

/** Round to 1 decimal for compact SVG output. */
export const r = (v: number): string => v.toFixed(1);

// ── Scale factories ────────────────────────────────────────────────────────

/** Create a linear scale function mapping [domainMin, domainMax] → [rangeMin, rangeMax]. */
export function makeLinearScale(
  domainMin: number, domainMax: number,
  rangeMin: number, rangeMax: number,
): (v: number) => number {
  const domainSpan = domainMax - domainMin;
  const rangeSpan = rangeMax - rangeMin;
  return (v: number) => rangeMin + ((v - domainMin) / domainSpan) * rangeSpan;
}

// ── Polylines ──────────────────────────────────────────────────────────────

/** Build an SVG polyline `points` string from parallel x/y arrays. */
export function polylinePoints(
  xs: ArrayLike<number>, ys: ArrayLike<number>,
  sx: (v: number) => number, sy: (v: number) => number,
): string {
  return Array.from(xs, (x, i) => `${r(sx(x))},${r(sy(ys[i]))}`).join(" ");
}

/** Min and max of several series together. */
export function extent(...series: ArrayLike<number>[]): [number, number] {
  let lo = Infinity;
  let hi = -Infinity;
  for (const s of series) {
    for (let i = 0; i < s.length; i++) {
      lo = Math.min(lo, s[i]);
      hi = Math.max(hi, s[i]);
    }
  }
  return [lo, hi];
}

// ── Tick generation ────────────────────────────────────────────────────────

/** Generate evenly spaced y-axis ticks from a range, with auto step. */
export function yTicksFromRange(min: number, max: number, step?: number): number[] {
  const span = max - min;
  const s = step ?? (span > 40 ? 10 : span > 15 ? 5 : span > 6 ? 2 : span > 2 ? 1 : 0.5);
  const ticks: number[] = [];
  const start = Math.ceil(min / s) * s;
  const end = Math.floor(max / s) * s;
  for (let v = start; v <= end; v += s) ticks.push(v);
  return ticks;
}

// ── SVG element helpers ────────────────────────────────────────────────────

/** Render horizontal grid lines for given y-tick values. */
export function renderGridLines(
  yTicks: number[], sy: (v: number) => number,
  leftX: number, rightX: number,
): string[] {
  return yTicks.map((v) =>
    `<line x1="${leftX}" y1="${r(sy(v))}" x2="${rightX}" y2="${r(sy(v))}" stroke="#e5e7eb" stroke-width="1"/>`,
  );
}

/** Render y-axis tick marks and labels. */
export function renderYAxis(
  yTicks: number[], sy: (v: number) => number,
  leftX: number, fmt?: (v: number) => string,
): string[] {
  const format = fmt ?? ((v) => String(v));
  return yTicks.flatMap((v) => {
    const yy = r(sy(v));
    return [
      `<line x1="${leftX - 5}" y1="${yy}" x2="${leftX}" y2="${yy}" stroke="#333" stroke-width="1.5"/>`,
      `<text x="${leftX - 8}" y="${yy}" text-anchor="end" dominant-baseline="middle" fill="#333">${format(v)}</text>`,
    ];
  });
}

/** Render x-axis tick marks and labels. */
export function renderXAxis(
  ticks: { val: number; label: string }[],
  sx: (v: number) => number, bottomY: number,
): string[] {
  return ticks.flatMap(({ val, label }) => {
    const xx = r(sx(val));
    return [
      `<line x1="${xx}" y1="${bottomY}" x2="${xx}" y2="${bottomY + 5}" stroke="#333" stroke-width="1.5"/>`,
      `<text x="${xx}" y="${bottomY + 18}" text-anchor="middle" fill="#333">${label}</text>`,
    ];
  });
}

/** Render y-axis and x-axis border lines. */
export function renderAxesBorder(
  leftX: number, topY: number, rightX: number, bottomY: number,
): string[] {
  return [
    `<line x1="${leftX}" y1="${topY}" x2="${leftX}" y2="${bottomY}" stroke="#333" stroke-width="1.5"/>`,
    `<line x1="${leftX}" y1="${bottomY}" x2="${rightX}" y2="${bottomY}" stroke="#333" stroke-width="1.5"/>`,
  ];
}

// ── File I/O ───────────────────────────────────────────────────────────────

/** Write SVG lines to a file, creating directories as needed. Returns the size in bytes. */
export function writeSvg(lines: string[], outPath: string): number {
  const content = lines.join("\n");
  mkdirSync(dirname(outPath), { recursive: true });
  writeFileSync(outPath, content, "utf8");
  return Buffer.byteLength(content);
}
