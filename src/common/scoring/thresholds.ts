import { COMMENTARY_THRESHOLDS, TIER_BANDS } from '../config/tiers';
import { InvariantViolationError } from '../errors/scorecard.error';
import type { CommentaryLevel, PillarDefinition, QuestionId, TierBand, TierLabel } from '../types/scoring';

/** Half-up rounding to an integer. Scores are never negative, so Math.round is half-up here. */
export function roundScore(score: number): number {
  return Math.round(score);
}

export function tierFor(score: number, bands: readonly TierBand[] = TIER_BANDS): TierLabel {
  const rounded = roundScore(score);
  const band = bands.find((b) => b.min <= rounded && rounded <= b.max);
  if (!band) {
    throw new InvariantViolationError(`No tier band contains score ${rounded}`);
  }
  return band.label;
}

export function commentaryLevelFor(score: number): CommentaryLevel {
  for (const { min, level } of COMMENTARY_THRESHOLDS) {
    if (score >= min) return level;
  }
  return 'fundamentals';
}

export function assertTierBandsPartition(bands: readonly TierBand[]): void {
  for (let s = 0; s <= 100; s++) {
    const matches = bands.filter((b) => b.min <= s && s <= b.max).length;
    if (matches !== 1) {
      throw new InvariantViolationError(
        `Tier bands must partition 0..100: score ${s} matches ${matches} bands`,
      );
    }
  }
}

export function assertCatalogConsistent(
  pillarDefs: readonly PillarDefinition[],
  questionText: Readonly<Record<QuestionId, string>>,
): void {
  const seen = new Set<QuestionId>();
  for (const pillar of pillarDefs) {
    for (const id of pillar.questionIds) {
      if (seen.has(id)) {
        throw new InvariantViolationError(`Question ${id} is assigned more than once`);
      }
      if (!(id in questionText)) {
        throw new InvariantViolationError(`Question ${id} in ${pillar.name} has no text`);
      }
      seen.add(id);
    }
  }
}
