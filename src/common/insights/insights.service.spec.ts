import { InsightsService } from './insights.service';
import { ScoringService } from '../scoring/scoring.service';
import { pillars } from '../config/pillars';
import { MIXED_ANSWERS } from '../../testing/fixtures';
import type { PillarScore } from '../types/scoring';

const score = (pillar: string, value: number): PillarScore => ({ pillar, score: value, answers: {} });

describe('InsightsService', () => {
  const service = new InsightsService();
  const scoring = new ScoringService();

  describe('deriveInsights', () => {
    it('picks strengths, gaps and recommendations for the mixed profile', () => {
      const { pillarScores } = scoring.computeScores(MIXED_ANSWERS);

      expect(service.deriveInsights(pillarScores)).toEqual({
        strengths: [pillars.strategy.name, pillars.enablement.name],
        gaps: [pillars.program.name, pillars.growth.name, pillars.enablement.name],
        recommendations: [
          pillars.program.playbook,
          pillars.growth.playbook,
          pillars.enablement.playbook,
        ],
      });
    });

    it('breaks ties by catalog order', () => {
      const scores = ['P1', 'P2', 'P3', 'P4', 'P5'].map((name) => score(name, 50));
      const insights = service.deriveInsights(scores);

      expect(insights.strengths).toEqual(['P1', 'P2']);
      expect(insights.gaps).toEqual(['P1', 'P2', 'P3']);
    });

    it('orders recommendations weakest first', () => {
      const scores = [
        score(pillars.strategy.name, 70),
        score(pillars.program.name, 90),
        score(pillars.enablement.name, 10),
        score(pillars.operations.name, 40),
        score(pillars.growth.name, 30),
      ];

      expect(service.deriveInsights(scores).recommendations).toEqual([
        pillars.enablement.playbook,
        pillars.growth.playbook,
        pillars.operations.playbook,
      ]);
    });

    it('returns 2 strengths and 3 distinct gaps for a five-pillar catalog', () => {
      const profiles = [
        [10, 20, 30, 40, 50],
        [100, 100, 0, 0, 50],
        [60, 60, 60, 60, 60],
      ];

      for (const values of profiles) {
        const insights = service.deriveInsights(values.map((v, i) => score(`P${i}`, v)));

        expect(insights.strengths).toHaveLength(2);
        expect(insights.gaps).toHaveLength(3);
        expect(insights.recommendations).toHaveLength(3);
        expect(new Set(insights.strengths).size).toBe(2);
        expect(new Set(insights.gaps).size).toBe(3);
      }
    });

    it('allows strengths and gaps to overlap in small catalogs', () => {
      const insights = service.deriveInsights([score('Alpha', 80), score('Beta', 20)]);

      expect(insights.strengths).toEqual(['Alpha', 'Beta']);
      expect(insights.gaps).toEqual(['Beta', 'Alpha']);
    });

    it('falls back to a generic recommendation for pillars without a playbook', () => {
      const insights = service.deriveInsights([score('Custom Pillar', 10)]);

      expect(insights.recommendations).toEqual([
        'Prioritize foundational improvements in custom pillar to enable scale.',
      ]);
    });
  });

  describe('commentaryFor', () => {
    it.each([
      [85, 'Ops is strong and scalable — keep reinforcing what works.'],
      [60, 'Ops shows a solid foundation with room to standardize and scale.'],
      [40, 'Ops is emerging — formalize structure, cadence, and measurement.'],
      [39.9, 'Ops is underdeveloped — prioritize core mechanics and minimum viable structure.'],
    ])('describes a score of %p', (value, text) => {
      expect(service.commentaryFor('Ops', value)).toBe(text);
    });
  });
});
