import { describe, it, expect } from 'vitest';
import { ConsequenceSimulator, forecast } from '../../../src/simulation/consequence-simulator.js';
import type { ProposedAction } from '../../../src/simulation/types.js';
import { makeAction, makeLesson, testConfig } from '../../helpers/fixtures.js';

const simulator = new ConsequenceSimulator(testConfig().simulation);

const deleteAll = (magnitude: number): ProposedAction => makeAction({
  kind: 'delete',
  pattern: 'delete-all',
  target: '/',
  magnitude,
  resourceCost: 0.2,
  irreversible: true,
});

describe('ConsequenceSimulator', () => {
  describe('scoreRisk', () => {
    it('should weight irreversibility, blast radius and cost', () => {
      expect(simulator.scoreRisk(deleteAll(1))).toEqual({
        irreversibility: 0.45,
        blastRadius: 0.35,
        resourceCost: 0.04,
        total: 0.84,
      });
    });

    it('should score a small respond action low', () => {
      const risk = simulator.scoreRisk(makeAction({ kind: 'respond', magnitude: 0.05, resourceCost: 0.05 }));
      expect(risk.total).toBe(0.0275);
    });
  });

  describe('evaluate', () => {
    it('should reject irreversible actions above the safety ceiling in every mode', () => {
      for (const mode of ['logic', 'balanced', 'chaos'] as const) {
        const verdict = simulator.evaluate(deleteAll(1), mode);
        expect(verdict.status).toBe('rejected');
        expect(verdict.riskScore).toBe(0.84);
        if (verdict.status === 'rejected') {
          expect(verdict.reason).toBe('safety-ceiling');
        }
      }
    });

    it('should reject an irreversible action at exactly the ceiling', () => {
      // 0.45 + 0.35 * 0.6 + 0.2 * 0.7
      const action = makeAction({ irreversible: true, magnitude: 0.6, resourceCost: 0.7 });
      const verdict = simulator.evaluate(action, 'chaos');
      expect(verdict.riskScore).toBe(0.8);
      expect(verdict.status === 'rejected' && verdict.reason).toBe('safety-ceiling');
    });

    it('should accept only when risk is strictly below tolerance', () => {
      const action = makeAction({ magnitude: 1, resourceCost: 0.3, irreversible: false });
      const chaos = simulator.evaluate(action, 'chaos');
      const logic = simulator.evaluate(action, 'logic');

      expect(chaos.riskScore).toBe(0.41);
      expect(chaos.status).toBe('accepted');
      expect(chaos.tolerance).toBe(0.7);
      expect(logic.status).toBe('rejected');
      expect(logic.status === 'rejected' && logic.reason).toBe('risk-above-tolerance');
      expect(logic.rationale).toBe('Risk 0.41 is not below the logic tolerance 0.4');
    });

    it('should reject risk equal to tolerance', () => {
      // 0.35 * 1 + 0.2 * 0.25 = 0.4
      const action = makeAction({ magnitude: 1, resourceCost: 0.25, irreversible: false });
      const verdict = simulator.evaluate(action, 'logic');
      expect(verdict.riskScore).toBe(0.4);
      expect(verdict.status).toBe('rejected');
    });

    it('should lower tolerance for each lesson on the same pattern', () => {
      const action = makeAction({ pattern: 'execute-code', magnitude: 0.3, resourceCost: 0.3 });
      const lessons = [
        makeLesson({ actionPattern: 'execute-code' }),
        makeLesson({ actionPattern: 'execute-code' }),
        makeLesson({ actionPattern: 'delete-all' }),
      ];

      const verdict = simulator.evaluate(action, 'logic', lessons);

      expect(verdict.tolerance).toBe(0.2);
      expect(verdict.matchedLessonIds).toEqual([lessons[0].id, lessons[1].id]);
      // risk 0.105 + 0.06 = 0.165 stays below 0.2
      expect(verdict.status).toBe('accepted');
      expect(verdict.rationale).toContain('tolerance lowered by 0.2 for 2 past failure(s) of "execute-code"');
    });

    it('should cap the lesson penalty', () => {
      const action = makeAction({ pattern: 'execute-code' });
      const lessons = Array.from({ length: 6 }, () => makeLesson({ actionPattern: 'execute-code' }));
      expect(simulator.evaluate(action, 'chaos', lessons).tolerance).toBe(0.4);
    });

    it('should never loosen tolerance because of lessons', () => {
      const action = makeAction();
      const without = simulator.evaluate(action, 'logic');
      const withUnrelated = simulator.evaluate(action, 'logic', [makeLesson({ actionPattern: 'deploy' })]);
      expect(withUnrelated.tolerance).toBe(without.tolerance);
    });

    it('should reject malformed actions', () => {
      const verdict = simulator.evaluate(makeAction({ target: '  ', magnitude: 2 }), 'chaos');
      expect(verdict.status).toBe('rejected');
      expect(verdict.status === 'rejected' && verdict.reason).toBe('malformed-action');
      expect(verdict.riskScore).toBe(1);
      expect(verdict.rationale).toContain('target: target is required');
    });

    it('should return frozen verdicts', () => {
      const verdict = simulator.evaluate(makeAction(), 'chaos');
      expect(Object.isFrozen(verdict)).toBe(true);
      expect(Object.isFrozen(verdict.forecast)).toBe(true);
    });
  });

  describe('forecast', () => {
    it('should map risk to an outlook', () => {
      expect(forecast(0.1)).toEqual({ successProbability: 0.9, outlook: 'stable' });
      expect(forecast(0.5)).toEqual({ successProbability: 0.5, outlook: 'uncertain' });
      expect(forecast(0.84)).toEqual({ successProbability: 0.16, outlook: 'unstable' });
    });
  });
});
