export type QuestionId = string;

export type TierLabel = 'Emerging' | 'Developing' | 'Established' | 'Optimized';

export type PillarKey = 'strategy' | 'program' | 'enablement' | 'operations' | 'growth';

/** Raw responses keyed by question ID. Only integers in 1..5 count as answered. */
export type AnswerSet = Readonly<Record<QuestionId, unknown>>;

export interface PillarDefinition {
  key: string;
  name: string;
  questionIds: readonly QuestionId[];
}

export interface TierBand {
  label: TierLabel;
  min: number;
  max: number;
}

export interface PillarScore {
  pillar: string;
  score: number;
  answers: Record<QuestionId, number>;
}

export interface ScoreResult {
  pillarScores: PillarScore[];
  overall: number;
  tier: TierLabel;
}

export type CommentaryLevel = 'reinforce' | 'standardize' | 'formalize' | 'fundamentals';

export interface Insights {
  strengths: string[];
  gaps: string[];
  recommendations: string[];
}
