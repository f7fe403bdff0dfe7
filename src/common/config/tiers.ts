import type { CommentaryLevel, TierBand } from '../types/scoring';

/** Inclusive bands over the rounded overall score. Must partition 0..100. */
export const TIER_BANDS: readonly TierBand[] = [
  { label: 'Emerging', min: 0, max: 39 },
  { label: 'Developing', min: 40, max: 59 },
  { label: 'Established', min: 60, max: 79 },
  { label: 'Optimized', min: 80, max: 100 },
];

/**
 * Per-pillar commentary thresholds, checked top-down against the raw pillar score.
 * Independent of TIER_BANDS even though the cut points currently line up.
 */
export const COMMENTARY_THRESHOLDS: readonly { min: number; level: CommentaryLevel }[] = [
  { min: 80, level: 'reinforce' },
  { min: 60, level: 'standardize' },
  { min: 40, level: 'formalize' },
];

export const commentaryTemplates: Record<CommentaryLevel, (pillar: string) => string> = {
  reinforce: (pillar) => `${pillar} is strong and scalable — keep reinforcing what works.`,
  standardize: (pillar) => `${pillar} shows a solid foundation with room to standardize and scale.`,
  formalize: (pillar) => `${pillar} is emerging — formalize structure, cadence, and measurement.`,
  fundamentals: (pillar) =>
    `${pillar} is underdeveloped — prioritize core mechanics and minimum viable structure.`,
};
