import { Injectable, OnModuleInit } from '@nestjs/common';
import type {
  AnswerSet,
  PillarDefinition,
  PillarScore,
  QuestionId,
  ScoreResult,
  TierBand,
} from '../types/scoring';
import { TIER_BANDS } from '../config/tiers';
import { PILLARS } from '../config/pillars';
import { ANSWER_MAX, ANSWER_MIN, questions } from '../config/questions';
import { assertCatalogConsistent, assertTierBandsPartition, tierFor } from './thresholds';

@Injectable()
export class ScoringService implements OnModuleInit {
  onModuleInit(): void {
    assertTierBandsPartition(TIER_BANDS);
    assertCatalogConsistent(PILLARS, questions);
  }

  computeScores(
    answers: AnswerSet,
    pillarDefs: readonly PillarDefinition[] = PILLARS,
    bands: readonly TierBand[] = TIER_BANDS,
  ): ScoreResult {
    const snapshot = { ...answers };

    const pillarScores = pillarDefs.map((pillar) => this.scorePillar(pillar, snapshot));
    const overall = pillarScores.length
      ? pillarScores.reduce((sum, p) => sum + p.score, 0) / pillarScores.length
      : 0;

    return {
      pillarScores,
      overall,
      tier: tierFor(overall, bands),
    };
  }

  /** Integer in 1..5, otherwise 0 (unanswered). */
  normalizeAnswer(value: unknown): number {
    if (typeof value !== 'number' || !Number.isInteger(value)) return 0;
    return value >= ANSWER_MIN && value <= ANSWER_MAX ? value : 0;
  }

  private scorePillar(pillar: PillarDefinition, answers: AnswerSet): PillarScore {
    const detail: Record<QuestionId, number> = {};
    for (const id of pillar.questionIds) {
      detail[id] = this.normalizeAnswer(answers[id]);
    }

    const values = Object.values(detail);
    const score = values.every((v) => v === 0)
      ? 0
      : (values.reduce((sum, v) => sum + v, 0) / values.length / ANSWER_MAX) * 100;

    return { pillar: pillar.name, score, answers: detail };
  }
}
