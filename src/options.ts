import { DType } from "@hamk-uas/jax-js-nonconsuming";
import type { Logger } from "winston";
import { z } from "zod";
import { InvalidOptionsError } from "./errors";
import { createSsaLogger } from "./logger";

const isLogger = (v: unknown): v is Logger =>
  typeof v === "object" && v !== null &&
  "debug" in v && typeof v.debug === "function" &&
  "warn" in v && typeof v.warn === "function";

const loggerSchema = z.custom<Logger>(isLogger, { message: "expected a winston Logger" });
const signalSchema = z.instanceof(AbortSignal);
const dtypeSchema = z.custom<DType>(
  (v) => v === DType.Float64 || v === DType.Float32,
  { message: "dtype must be DType.Float64 or DType.Float32" },
);

/** Options for ssaFactorize / ssaDecompose */
export const decomposeOptionsSchema = z.object({
  /**
   * Keep only the top `truncateTo` eigentriples (clamped to min(L, K)).
   * The full SVD still runs; this trims the result and what later stages
   * carry, not the factorization time.
   */
  truncateTo: z.number().int().positive().optional(),
  /** Abort signal, checked once on entry */
  signal: signalSchema.optional(),
  logger: loggerSchema.optional(),
}).strict();

/** Options for ssaReconstruct / ssaWCorrelation */
export const reconstructOptionsSchema = z.object({
  /** Computation precision of the rank-r products (default: Float64) */
  dtype: dtypeSchema.optional(),
  /** Abort signal checked between groups */
  signal: signalSchema.optional(),
  logger: loggerSchema.optional(),
}).strict();

/** Group specification: name → list of 1-based indices */
export const groupSpecSchema = z.record(z.string(), z.array(z.number()));

export type DecomposeOptions = z.input<typeof decomposeOptionsSchema>;
export type ReconstructOptions = z.input<typeof reconstructOptionsSchema>;

export interface ResolvedDecomposeOptions {
  truncateTo?: number;
  signal?: AbortSignal;
  logger: Logger;
}

export interface ResolvedReconstructOptions {
  dtype: DType;
  signal?: AbortSignal;
  logger: Logger;
}

/** Turn zod issues into readable "path: message" strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`,
  );
}

export function resolveDecomposeOptions(options: DecomposeOptions = {}): ResolvedDecomposeOptions {
  const parsed = decomposeOptionsSchema.safeParse(options);
  if (!parsed.success) throw new InvalidOptionsError("decompose options", formatIssues(parsed.error));
  const { truncateTo, signal, logger } = parsed.data;
  return { truncateTo, signal, logger: logger ?? createSsaLogger() };
}

export function resolveReconstructOptions(options: ReconstructOptions = {}): ResolvedReconstructOptions {
  const parsed = reconstructOptionsSchema.safeParse(options);
  if (!parsed.success) throw new InvalidOptionsError("reconstruct options", formatIssues(parsed.error));
  const { dtype, signal, logger } = parsed.data;
  return { dtype: dtype ?? DType.Float64, signal, logger: logger ?? createSsaLogger() };
}
