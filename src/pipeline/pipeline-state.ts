import { PipelineStateError } from '../types/errors';
import type { CandidateProfile } from '../schemas/candidate-profile.schema';
import type { JobProfile } from '../schemas/job-profile.schema';
import type {
    ExperienceBreakdown,
    ResumeInput,
    ScoreBreakdown,
    SkillGrade,
    TextExtractionResult
} from '../types/match';

export const PIPELINE_STAGES = [
    'init',
    'text_extracted',
    'candidate_structured',
    'job_structured',
    'scored',
    'done'
] as const;

export type PipelineStage = typeof PIPELINE_STAGES[number];

/**
 * Accumulator for a single pipeline run. Created fresh by every run and
 * never shared between runs.
 */
export interface PipelineState {
    readonly runId: string;
    stage: PipelineStage;
    readonly resume_input: ResumeInput;
    readonly job_description: string;
    extraction?: TextExtractionResult;
    candidate_profile?: CandidateProfile;
    job_profile?: JobProfile;
    experience_breakdown?: ExperienceBreakdown;
    skill_grade?: SkillGrade;
    scores?: ScoreBreakdown;
}

export function createPipelineState(
    runId: string,
    resumeInput: ResumeInput,
    jobDescription: string
): PipelineState {
    return {
        runId,
        stage: 'init',
        resume_input: resumeInput,
        job_description: jobDescription
    };
}

/**
 * Moves the run one stage forward. Skipping or revisiting a stage is a bug
 * in the orchestrator, not a runtime condition.
 */
export function advanceStage(state: PipelineState, next: PipelineStage): void {
    const current = PIPELINE_STAGES.indexOf(state.stage);
    const target = PIPELINE_STAGES.indexOf(next);

    if (target !== current + 1) {
        throw new PipelineStateError(`Illegal pipeline transition ${state.stage} -> ${next}`);
    }

    state.stage = next;
}
