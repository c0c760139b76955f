import { InvalidScoreError } from '../types/errors';
import type { CandidateProfile } from '../schemas/candidate-profile.schema';
import type { JobProfile } from '../schemas/job-profile.schema';
import type { SkillGrade, SkillGradingPayload } from '../types/match';
import { clampScore } from './score-combiner';

export const SKILL_SCORE_FIELD = 'final_skill_match_score';

// Plain decimals only: no hex, exponents or "Infinity"
const DECIMAL_SCORE = /^[+-]?(?:\d+(?:\.\d+)?|\.\d+)$/;

/**
 * Builds the grading request from both profiles. Candidate skills include
 * tools; duplicates are dropped case-insensitively.
 */
export function buildSkillGradingPayload(
    candidate: CandidateProfile,
    job: JobProfile
): SkillGradingPayload {
    const seen = new Set<string>();
    const candidateSkills = [...candidate.skills.technical, ...candidate.skills.tools].filter(skill => {
        const key = skill.toLowerCase();
        if (seen.has(key)) {
            return false;
        }
        seen.add(key);
        return true;
    });

    return {
        jd_required_skills: job.required_skills,
        jd_optional_skills: job.optional_skills,
        jd_tools: job.tools_and_technologies,
        jd_responsibilities: job.responsibilities,
        candidate_skills: candidateSkills,
        candidate_tools: candidate.skills.tools,
        candidate_projects: candidate.projects,
        candidate_experience: candidate.experience,
        candidate_certifications: candidate.certifications
    };
}

/**
 * Narrows the grading model's response to an object. Some models wrap the
 * object in a one-element list; the first element is used then.
 */
export function readSkillGrade(response: unknown): SkillGrade {
    const grade: unknown = Array.isArray(response) ? response[0] : response;

    if (typeof grade !== 'object' || grade === null || Array.isArray(grade)) {
        throw new InvalidScoreError(`Skill grade response is not an object, ${SKILL_SCORE_FIELD} is missing`);
    }

    return Object.fromEntries(Object.entries(grade));
}

/**
 * Validates the externally graded skill score and clamps it to [0,100].
 * Missing or non-numeric scores are errors, never a silent 0.
 */
export function adaptSkillScore(value: unknown): number {
    if (value === undefined || value === null) {
        throw new InvalidScoreError(`${SKILL_SCORE_FIELD} is missing`);
    }

    let score: number;
    if (typeof value === 'number') {
        score = value;
    } else if (typeof value === 'string' && value.trim() !== '') {
        if (!DECIMAL_SCORE.test(value.trim())) {
            throw new InvalidScoreError(`${SKILL_SCORE_FIELD} must be numeric, received "${value}"`);
        }
        score = Number(value.trim());
    } else {
        throw new InvalidScoreError(`${SKILL_SCORE_FIELD} must be numeric, received ${typeof value}`);
    }

    if (Number.isNaN(score)) {
        throw new InvalidScoreError(`${SKILL_SCORE_FIELD} must be numeric, received "${String(value)}"`);
    }
    if (!Number.isFinite(score)) {
        throw new InvalidScoreError(`${SKILL_SCORE_FIELD} must be a finite number`);
    }

    return clampScore(score);
}

export function skillScoreFromGrade(grade: SkillGrade): number {
    return adaptSkillScore(grade[SKILL_SCORE_FIELD]);
}
