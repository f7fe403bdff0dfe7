import { IsObject } from 'class-validator';
import type { QuestionId } from '../../common/types/scoring';

export class ScoreAssessmentDto {
  /** Question ID -> rating. Out-of-range values are scored as unanswered, not rejected. */
  @IsObject()
  answers!: Record<QuestionId, unknown>;
}
