import { InvalidScoreError } from '../types/errors';
import type { ScoreBreakdown } from '../types/match';

/**
 * Scoring policy. These three weights are the only place the relative
 * importance of experience, education and skills is defined; they sum to 1.
 */
export const SCORE_WEIGHTS = Object.freeze({
    experience: 0.2,
    education: 0.1,
    skill: 0.7
});

export function clampScore(value: number): number {
    return Math.min(100, Math.max(0, value));
}

function roundScore(value: number): number {
    return Math.round(value * 100) / 100;
}

function component(name: string, value: number): number {
    if (Number.isNaN(value)) {
        throw new InvalidScoreError(`${name} score is not a number`);
    }
    return clampScore(value);
}

/**
 * Weighted final score. Components are clamped to [0,100] first; the
 * result is rounded to two decimals and never clamped.
 */
export function combine(experienceScore: number, educationScore: number, skillScore: number): number {
    return roundScore(
        SCORE_WEIGHTS.experience * component('experience', experienceScore) +
        SCORE_WEIGHTS.education * component('education', educationScore) +
        SCORE_WEIGHTS.skill * component('skill', skillScore)
    );
}

export function buildScoreBreakdown(
    experienceScore: number,
    educationScore: number,
    skillScore: number
): ScoreBreakdown {
    const experience = roundScore(component('experience', experienceScore));
    const education = roundScore(component('education', educationScore));
    const skill = roundScore(component('skill', skillScore));

    return {
        experience_score: experience,
        education_score: education,
        skill_score: skill,
        final_score: combine(experience, education, skill)
    };
}
