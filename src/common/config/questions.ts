import type { QuestionId } from '../types/scoring';

export const QUESTIONNAIRE_VERSION = '1.0';

export const questions: Readonly<Record<QuestionId, string>> = {
  A1: 'Do you have a clearly defined purpose for selling through partners (beyond revenue expansion)?',
  A2: 'Are your target partner types (TSD, VAR, MSP, SI, etc.) well-defined and prioritized?',
  B1: 'Do you have a partner program with tiering, incentives, rules of engagement, or performance criteria?',
  B2: 'Can you clearly articulate what makes your offer unique and profitable for partners?',
  C1: 'Do you provide training, sales playbooks, or co-branded marketing assets?',
  C2: 'How consistently do you communicate and collaborate with active partners?',
  D1: 'Are internal sales/ops aligned to support channel transactions (quoting, order flow, support)?',
  D2: 'Do you track partner pipeline separately with forecast accuracy goals?',
  E1: 'Does senior leadership actively sponsor the channel model?',
  E2: 'Are tools, systems, and staffing sufficient to support 2–3× partner growth?',
};

/** Lowest and highest accepted rating. */
export const ANSWER_MIN = 1;
export const ANSWER_MAX = 5;
