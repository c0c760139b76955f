/**
 * TypeScript interfaces for match pipeline results
 *
 * Keys are snake_case because these records are returned verbatim by the API,
 * next to the LLM-produced profiles.
 */
import type {
    CandidateProfile,
    CandidateProject,
    WorkExperience
} from '../schemas/candidate-profile.schema';
import type { JobProfile } from '../schemas/job-profile.schema';

// Resume handed to the pipeline: an uploaded buffer or a file on disk
export type ResumeInput =
    | { buffer: Buffer; filename?: string; mimetype?: string }
    | { path: string };

export interface LinkInfo {
    email: string;
    phones: string[];
    linkedin: string;
    medium: string;
    projects: string[];
}

export interface TextExtractionResult {
    raw_text: string;
    links: string[];
    link_info: LinkInfo;
}

// One work entry that made it into the interval union
export interface ExperienceContribution {
    index: number;
    title: string;
    company: string;
    employment_type: string;
    /** First month of the range, YYYY-MM */
    start: string;
    /** First month after the range, YYYY-MM */
    end: string;
    months: number;
}

export interface ExcludedExperience {
    index: number;
    title: string;
    company: string;
    reason: string;
}

export interface ExperienceBreakdown {
    total_years: number;
    total_months: number;
    /** Union of each employment type's own intervals, in years */
    years_by_employment_type: Record<string, number>;
    contributions: ExperienceContribution[];
    excluded: ExcludedExperience[];
    has_overlaps: boolean;
    has_ambiguous_dates: boolean;
}

export interface ScoreBreakdown {
    experience_score: number;
    education_score: number;
    skill_score: number;
    final_score: number;
}

// Body sent to the skill grading model
export interface SkillGradingPayload {
    jd_required_skills: string[];
    jd_optional_skills: string[];
    jd_tools: string[];
    jd_responsibilities: string[];
    candidate_skills: string[];
    candidate_tools: string[];
    candidate_projects: CandidateProject[];
    candidate_experience: WorkExperience[];
    candidate_certifications: string[];
}

// Grading model response, kept whole for the report
export type SkillGrade = Record<string, unknown>;

// Final result structure returned to users
export interface MatchReport {
    candidate_profile: CandidateProfile;
    job_profile: JobProfile;
    experience_breakdown: ExperienceBreakdown;
    skill_grade: SkillGrade;
    scores: ScoreBreakdown;
}
