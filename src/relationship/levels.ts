/**
 * Score → relationship level and speaking style.
 *
 * Bands are inclusive at their lower bound and checked from the top.
 */

export const MIN_AFFINITY = 0;
export const MAX_AFFINITY = 100;

/** Score of a relationship that has never been updated. */
export const DEFAULT_AFFINITY = 50;

export type AffinityLevel = "close friend" | "friend" | "stranger" | "distant" | "hostile";

export interface AffinityBand {
  min: number;
  level: AffinityLevel;
  style: string;
}

export const AFFINITY_BANDS: readonly AffinityBand[] = [
  { min: 80, level: "close friend", style: "warm and open, happy to share personal stories" },
  { min: 60, level: "friend", style: "friendly and relaxed, chats freely" },
  { min: 40, level: "stranger", style: "polite and friendly, keeps a professional tone" },
  { min: 20, level: "distant", style: "curt and reserved, answers briefly" },
  { min: Number.NEGATIVE_INFINITY, level: "hostile", style: "cold and impatient, avoids small talk" },
];

export interface AffinityDescription {
  level: AffinityLevel;
  style: string;
}

export function clampAffinity(score: number): number {
  return Math.min(MAX_AFFINITY, Math.max(MIN_AFFINITY, score));
}

export function describeAffinity(score: number): AffinityDescription {
  const band = AFFINITY_BANDS.find((candidate) => score >= candidate.min) ?? AFFINITY_BANDS[AFFINITY_BANDS.length - 1];
  return { level: band.level, style: band.style };
}
