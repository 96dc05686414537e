import { createHash } from "node:crypto";

import type { RandomSource } from "./random";

export const ORACLE_UPDATE_INTERVAL_MS = 1000;

/**
 * First 8 hex digits of sha256("<seed>-<epochMillis>") as an unsigned integer.
 */
export function computeOracleValue(seed: number, epochMillis: number): number {
  const digest = createHash("sha256").update(`${seed}-${epochMillis}`, "utf8").digest("hex");
  return parseInt(digest.slice(0, 8), 16);
}

/** Seed used while no external seed is available */
export const fallbackOracleSeed = (random: RandomSource): number => random.int(0, 65535);

export interface OracleTickerOptions {
  /** Current seed; read on every tick so a newly supplied seed takes effect at once */
  getSeed: () => number;
  onValue: (value: number) => void;
  intervalMs?: number;
  now?: () => number;
}

/**
 * Recomputes the oracle value once per interval. Returns a function that stops it.
 */
export function startOracleTicker({
  getSeed,
  onValue,
  intervalMs = ORACLE_UPDATE_INTERVAL_MS,
  now = Date.now,
}: OracleTickerOptions): () => void {
  const timer = setInterval(() => onValue(computeOracleValue(getSeed(), now())), intervalMs);
  return () => clearInterval(timer);
}
