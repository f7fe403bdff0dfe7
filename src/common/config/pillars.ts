import type { PillarDefinition, PillarKey } from '../types/scoring';

export interface PillarConfig extends PillarDefinition {
  key: PillarKey;
  playbook: string;
}

export const pillars: Record<PillarKey, PillarConfig> = {
  strategy: {
    key: 'strategy',
    name: 'A. Channel Strategy & Alignment',
    questionIds: ['A1', 'A2'],
    playbook:
      'Clarify the partner role by segment and set a 12-month channel thesis with 3 measurable outcomes.',
  },
  program: {
    key: 'program',
    name: 'B. Partner Program Design',
    questionIds: ['B1', 'B2'],
    playbook:
      'Publish a simple one-pager: tiers, incentives, rules of engagement, and co-marketing paths.',
  },
  enablement: {
    key: 'enablement',
    name: 'C. Partner Enablement & Engagement',
    questionIds: ['C1', 'C2'],
    playbook:
      'Stand up a 30-60-90 enablement cadence: onboarding kit, monthly enablement call, quarterly MDF campaign.',
  },
  operations: {
    key: 'operations',
    name: 'D. Sales & Operations Integration',
    questionIds: ['D1', 'D2'],
    playbook:
      "Separate channel pipeline tracking; define lead routing/quoting SLAs; add 'channel' to forecast reviews.",
  },
  growth: {
    key: 'growth',
    name: 'E. Growth Readiness',
    questionIds: ['E1', 'E2'],
    playbook:
      'Baseline partner P&L and capacity; set tooling minimums (PRM/CRM views) and resource triggers for 2–3× growth.',
  },
};

export const pillarOrder: PillarKey[] = ['strategy', 'program', 'enablement', 'operations', 'growth'];

/** Catalog order is the order pillars appear in scores and reports. */
export const PILLARS: readonly PillarConfig[] = pillarOrder.map((key) => pillars[key]);

const PLAYBOOK: ReadonlyMap<string, string> = new Map(PILLARS.map((p) => [p.name, p.playbook]));

export function recommendationFor(pillarName: string): string {
  return (
    PLAYBOOK.get(pillarName) ??
    `Prioritize foundational improvements in ${pillarName.toLowerCase()} to enable scale.`
  );
}
