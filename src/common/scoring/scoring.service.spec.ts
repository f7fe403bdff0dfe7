import { Test } from '@nestjs/testing';
import { ScoringService } from './scoring.service';
import { PILLARS } from '../config/pillars';
import { InvariantViolationError } from '../errors/scorecard.error';
import { ALL_FIVES, MIXED_ANSWERS } from '../../testing/fixtures';
import type { PillarDefinition } from '../types/scoring';

describe('ScoringService', () => {
  let service: ScoringService;

  beforeEach(async () => {
    const moduleRef = await Test.createTestingModule({ providers: [ScoringService] }).compile();
    await moduleRef.init();
    service = moduleRef.get(ScoringService);
  });

  it('scores every pillar 100 and tiers Optimized when all answers are 5', () => {
    const result = service.computeScores(ALL_FIVES);

    expect(result.pillarScores.map((p) => p.score)).toEqual([100, 100, 100, 100, 100]);
    expect(result.overall).toBe(100);
    expect(result.tier).toBe('Optimized');
  });

  it('scores 0 and tiers Emerging when nothing is answered', () => {
    const result = service.computeScores({});

    expect(result.pillarScores.map((p) => p.score)).toEqual([0, 0, 0, 0, 0]);
    expect(result.overall).toBe(0);
    expect(result.tier).toBe('Emerging');
  });

  it('scores the mixed profile', () => {
    const result = service.computeScores(MIXED_ANSWERS);
    const [a, b, c, d, e] = result.pillarScores.map((p) => p.score);

    expect(a).toBeCloseTo(100);
    expect(b).toBeCloseTo(20);
    expect(c).toBeCloseTo(60);
    expect(d).toBeCloseTo(60);
    expect(e).toBeCloseTo(20);
    expect(result.overall).toBeCloseTo(52);
    expect(result.tier).toBe('Developing');
  });

  it('keeps catalog order and per-question detail', () => {
    const result = service.computeScores(MIXED_ANSWERS);

    expect(result.pillarScores.map((p) => p.pillar)).toEqual(PILLARS.map((p) => p.name));
    expect(result.pillarScores[1]?.answers).toEqual({ B1: 1, B2: 1 });
  });

  it('computes each pillar as (mean answer / 5) * 100', () => {
    for (let first = 1; first <= 5; first++) {
      for (let second = 1; second <= 5; second++) {
        const result = service.computeScores({ A1: first, A2: second });
        const score = result.pillarScores[0]?.score;

        expect(score).toBe(((first + second) / 2 / 5) * 100);
        expect(score).toBeGreaterThanOrEqual(0);
        expect(score).toBeLessThanOrEqual(100);
      }
    }
  });

  it('counts an unanswered question as 0 inside a partly answered pillar', () => {
    const result = service.computeScores({ A1: 4 });

    expect(result.pillarScores[0]).toEqual({
      pillar: 'A. Channel Strategy & Alignment',
      score: 40,
      answers: { A1: 4, A2: 0 },
    });
  });

  it('treats out-of-range and non-integer answers as unanswered', () => {
    const result = service.computeScores({ A1: 7, A2: 3, B1: -1, B2: 2.5, C1: '4', C2: null });

    expect(result.pillarScores[0]?.answers).toEqual({ A1: 0, A2: 3 });
    expect(result.pillarScores[0]?.score).toBe(30);
    expect(result.pillarScores[1]?.score).toBe(0);
    expect(result.pillarScores[2]?.score).toBe(0);
  });

  it('ignores questions outside the catalog', () => {
    const result = service.computeScores({ Z9: 5 });

    expect(result.overall).toBe(0);
  });

  it('averages pillars equally regardless of question count', () => {
    const pillarDefs: PillarDefinition[] = [
      { key: 'one', name: 'One', questionIds: ['Q1'] },
      { key: 'three', name: 'Three', questionIds: ['Q2', 'Q3', 'Q4'] },
    ];
    const result = service.computeScores({ Q1: 5, Q2: 1, Q3: 1, Q4: 1 }, pillarDefs);

    expect(result.pillarScores.map((p) => p.score)).toEqual([100, 20]);
    expect(result.overall).toBe(60);
    expect(result.tier).toBe('Established');
  });

  it('scores a pillar with no questions as 0 and keeps it in the mean', () => {
    const pillarDefs: PillarDefinition[] = [
      { key: 'empty', name: 'Empty', questionIds: [] },
      { key: 'full', name: 'Full', questionIds: ['Q1'] },
    ];
    const result = service.computeScores({ Q1: 5 }, pillarDefs);

    expect(result.pillarScores[0]).toEqual({ pillar: 'Empty', score: 0, answers: {} });
    expect(result.overall).toBe(50);
    expect(result.tier).toBe('Developing');
  });

  it('does not modify the answer set', () => {
    const answers = Object.freeze({ A1: 9, B1: 3 });

    expect(() => service.computeScores(answers)).not.toThrow();
    expect(answers).toEqual({ A1: 9, B1: 3 });
  });

  it('returns identical results for identical input', () => {
    expect(service.computeScores(MIXED_ANSWERS)).toEqual(service.computeScores(MIXED_ANSWERS));
  });

  it('surfaces a misconfigured tier table as an invariant violation', () => {
    const bands = [{ label: 'Emerging' as const, min: 0, max: 39 }];

    expect(() => service.computeScores(ALL_FIVES, PILLARS, bands)).toThrow(InvariantViolationError);
  });
});
