import { describe, it, expect } from 'vitest';
import {
    SCORE_WEIGHTS,
    buildScoreBreakdown,
    clampScore,
    combine
} from '../../../src/scoring/score-combiner';
import { InvalidScoreError } from '../../../src/types/errors';

describe('Score Combiner', () => {
    it('should weight experience, education and skills 20/10/70', () => {
        expect(SCORE_WEIGHTS.experience + SCORE_WEIGHTS.education + SCORE_WEIGHTS.skill).toBeCloseTo(1, 10);
        expect(combine(100, 0, 20)).toBe(34);
        expect(combine(0, 100, 0)).toBe(10);
        expect(combine(100, 100, 100)).toBe(100);
        expect(combine(0, 0, 0)).toBe(0);
        expect(combine(100, 0, 0)).toBe(20);
    });

    it('should clamp components before combining', () => {
        expect(combine(150, -10, 100)).toBe(90);
    });

    it('should reject NaN components', () => {
        expect(() => combine(Number.NaN, 50, 50)).toThrow(InvalidScoreError);
        expect(() => buildScoreBreakdown(50, 50, Number.NaN)).toThrow('skill score is not a number');
    });

    it('should clamp single values', () => {
        expect(clampScore(-1)).toBe(0);
        expect(clampScore(101)).toBe(100);
        expect(clampScore(42.5)).toBe(42.5);
    });

    it('should build a breakdown whose final score follows from its components', () => {
        expect(buildScoreBreakdown(60, 50, 80)).toEqual({
            experience_score: 60,
            education_score: 50,
            skill_score: 80,
            final_score: 73
        });

        const breakdown = buildScoreBreakdown(100 / 3, 200 / 3, 41.004);
        expect(breakdown.experience_score).toBe(33.33);
        expect(breakdown.education_score).toBe(66.67);
        expect(breakdown.skill_score).toBe(41);
        expect(combine(breakdown.experience_score, breakdown.education_score, breakdown.skill_score))
            .toBe(breakdown.final_score);
    });

    it('should stay within 0-100', () => {
        for (const [e, d, s] of [[0, 0, 0], [100, 100, 100], [-50, 300, 55]]) {
            const score = combine(e, d, s);
            expect(score).toBeGreaterThanOrEqual(0);
            expect(score).toBeLessThanOrEqual(100);
        }
    });
});
