import { Injectable } from '@nestjs/common';
import type { AnswerSet, Insights, ScoreResult, TierLabel } from '../common/types/scoring';
import { ScoringService } from '../common/scoring/scoring.service';
import { InsightsService } from '../common/insights/insights.service';
import { roundScore } from '../common/scoring/thresholds';

export interface PillarPreview {
  pillar: string;
  score: number;
  commentary: string;
  answers: Record<string, number>;
}

/** Admin results preview. Scores are rounded for display. */
export interface AssessmentPreview extends Insights {
  overall: number;
  tier: TierLabel;
  pillars: PillarPreview[];
}

@Injectable()
export class AssessmentService {
  constructor(
    private readonly scoring: ScoringService,
    private readonly insights: InsightsService,
  ) {}

  preview(answers: AnswerSet): AssessmentPreview {
    const scores: ScoreResult = this.scoring.computeScores(answers);

    return {
      overall: roundScore(scores.overall),
      tier: scores.tier,
      pillars: scores.pillarScores.map((p) => ({
        pillar: p.pillar,
        score: roundScore(p.score),
        commentary: this.insights.commentaryFor(p.pillar, p.score),
        answers: p.answers,
      })),
      ...this.insights.deriveInsights(scores.pillarScores),
    };
  }
}
