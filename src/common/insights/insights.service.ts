import { Injectable } from '@nestjs/common';
import type { Insights, PillarScore } from '../types/scoring';
import { recommendationFor } from '../config/pillars';
import { commentaryTemplates } from '../config/tiers';
import { commentaryLevelFor } from '../scoring/thresholds';

const STRENGTH_COUNT = 2;
const GAP_COUNT = 3;

@Injectable()
export class InsightsService {
  /**
   * Strengths are the top 2 pillars, gaps and recommendations the bottom 3 (weakest first).
   * Ties keep catalog order. The two lists may overlap in small catalogs.
   */
  deriveInsights(pillarScores: readonly PillarScore[]): Insights {
    const descending = [...pillarScores].sort((a, b) => b.score - a.score);
    const ascending = [...pillarScores].sort((a, b) => a.score - b.score);

    const lows = ascending.slice(0, GAP_COUNT);

    return {
      strengths: descending.slice(0, STRENGTH_COUNT).map((p) => p.pillar),
      gaps: lows.map((p) => p.pillar),
      recommendations: lows.map((p) => recommendationFor(p.pillar)),
    };
  }

  commentaryFor(pillarName: string, score: number): string {
    return commentaryTemplates[commentaryLevelFor(score)](pillarName);
  }
}
