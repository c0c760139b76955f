import { randomUUID } from 'crypto';
import { getConfig } from '../config/config';
import { logger, type ILogger } from '../config/logger';
import { CANDIDATE_PROFILE_SYSTEM_PROMPT } from '../prompts/candidate-profile.prompt';
import { JOB_PROFILE_SYSTEM_PROMPT } from '../prompts/job-profile.prompt';
import { SKILL_GRADING_SYSTEM_PROMPT } from '../prompts/skill-grading.prompt';
import { type CandidateProfile, parseCandidateProfile } from '../schemas/candidate-profile.schema';
import { type JobProfile, parseJobProfile } from '../schemas/job-profile.schema';
import { degreeMatch } from '../scoring/education.evaluator';
import { computeExperienceBreakdown, experienceMatch } from '../scoring/experience.evaluator';
import { buildScoreBreakdown } from '../scoring/score-combiner';
import { buildSkillGradingPayload, readSkillGrade, skillScoreFromGrade } from '../scoring/skill-score.adapter';
import {
    type ICandidateStructurer,
    type IJobStructurer,
    type ISkillGrader,
    getLlmStructuringService
} from '../services/llm-structuring.service';
import { type ITextExtractor, getTextExtractorService } from '../services/text-extractor.service';
import {
    ExtractionError,
    GradingError,
    StructuringError,
    errorMessage
} from '../types/errors';
import type { MatchReport, ResumeInput, TextExtractionResult } from '../types/match';
import { type IRetryUtil, RetryUtil } from '../utils/retry.util';
import { withTimeout } from '../utils/timeout.util';
import { type PipelineState, advanceStage, createPipelineState } from './pipeline-state';
import { deepFreeze, enrichContactFromLinks } from './profile-enrichment';

export interface IMatchPipeline {
    run(resumeInput: ResumeInput, jobDescription: string): Promise<MatchReport>;
    structureJobDescription(jobDescription: string): Promise<JobProfile>;
    extractResumeText(resumeInput: ResumeInput): Promise<TextExtractionResult>;
}

export interface MatchPipelineOptions {
    /** Budget for every single external call */
    timeoutMs: number;
    /** Evaluation date for "present" in work history */
    now?: () => Date;
}

// One retry with the same input, then the stage fails
const STRUCTURING_ATTEMPTS = 2;

/**
 * Match Pipeline with Dependency Injection
 *
 * Runs one resume against one job description:
 * init -> text_extracted -> candidate_structured -> job_structured -> scored -> done
 *
 * Every run works on its own PipelineState, so one instance can serve
 * concurrent runs.
 */
export class MatchPipeline implements IMatchPipeline {
    private now: () => Date;

    constructor(
        private textExtractor: ITextExtractor,
        private candidateStructurer: ICandidateStructurer,
        private jobStructurer: IJobStructurer,
        private skillGrader: ISkillGrader,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private options: MatchPipelineOptions
    ) {
        this.now = options.now ?? (() => new Date());
    }

    /**
     * Factory method for production use
     */
    static create(): MatchPipeline {
        const structuring = getLlmStructuringService();

        return new MatchPipeline(
            getTextExtractorService(),
            structuring,
            structuring,
            structuring,
            RetryUtil,
            logger,
            { timeoutMs: getConfig().externalCallTimeoutMs }
        );
    }

    async run(resumeInput: ResumeInput, jobDescription: string): Promise<MatchReport> {
        const state = createPipelineState(randomUUID(), resumeInput, jobDescription);

        this.logger.info({
            runId: state.runId,
            jobDescriptionLength: jobDescription.length
        }, 'Starting match pipeline run');

        try {
            const extraction = await this.extractStage(state);
            const candidate = await this.candidateStage(state, extraction);
            const job = await this.jobStage(state);
            const report = await this.scoreStage(state, candidate, job);

            advanceStage(state, 'done');

            this.logger.info({
                runId: state.runId,
                finalScore: report.scores.final_score
            }, 'Match pipeline run completed');

            return report;

        } catch (error: unknown) {
            this.logger.error({
                runId: state.runId,
                stage: state.stage,
                err: error
            }, 'Match pipeline run failed');
            throw error;
        }
    }

    async structureJobDescription(jobDescription: string): Promise<JobProfile> {
        return await this.structureJob(jobDescription);
    }

    async extractResumeText(resumeInput: ResumeInput): Promise<TextExtractionResult> {
        return await this.extractText(resumeInput);
    }

    /**
     * init -> text_extracted
     */
    private async extractStage(state: PipelineState): Promise<TextExtractionResult> {
        const extraction = await this.extractText(state.resume_input);

        state.extraction = extraction;
        advanceStage(state, 'text_extracted');

        return extraction;
    }

    /**
     * text_extracted -> candidate_structured
     */
    private async candidateStage(
        state: PipelineState,
        extraction: TextExtractionResult
    ): Promise<CandidateProfile> {
        const structured = await this.structureWithRetry('Candidate structuring', async () =>
            parseCandidateProfile(
                await this.candidateStructurer.structureCandidate(
                    CANDIDATE_PROFILE_SYSTEM_PROMPT,
                    extraction.raw_text,
                    extraction.link_info
                )
            )
        );

        const candidate = deepFreeze(enrichContactFromLinks(structured, extraction));

        state.candidate_profile = candidate;
        advanceStage(state, 'candidate_structured');

        this.logger.info({
            runId: state.runId,
            experienceEntries: candidate.experience.length,
            educationEntries: candidate.education.length
        }, 'Candidate profile structured');

        return candidate;
    }

    /**
     * candidate_structured -> job_structured
     */
    private async jobStage(state: PipelineState): Promise<JobProfile> {
        const job = await this.structureJob(state.job_description);

        state.job_profile = job;
        advanceStage(state, 'job_structured');

        this.logger.info({
            runId: state.runId,
            requiredYears: job.required_experience.years,
            requiredSkills: job.required_skills.length
        }, 'Job profile structured');

        return job;
    }

    /**
     * job_structured -> scored
     */
    private async scoreStage(
        state: PipelineState,
        candidate: CandidateProfile,
        job: JobProfile
    ): Promise<MatchReport> {
        const experienceBreakdown = computeExperienceBreakdown(candidate.experience, this.now());
        if (experienceBreakdown.has_ambiguous_dates) {
            this.logger.warn({
                runId: state.runId,
                excluded: experienceBreakdown.excluded
            }, 'Work entries with ambiguous dates excluded from experience');
        }

        const experienceScore = experienceMatch(experienceBreakdown, job.required_experience.years);
        const educationScore = degreeMatch(
            candidate.education,
            job.required_degree_level,
            job.required_fields
        );

        const skillGrade = readSkillGrade(await this.gradeSkills(candidate, job));
        const skillScore = skillScoreFromGrade(skillGrade);

        const scores = buildScoreBreakdown(experienceScore, educationScore, skillScore);

        state.experience_breakdown = experienceBreakdown;
        state.skill_grade = skillGrade;
        state.scores = scores;
        advanceStage(state, 'scored');

        this.logger.info({
            runId: state.runId,
            ...scores
        }, 'Match scored');

        return {
            candidate_profile: candidate,
            job_profile: job,
            experience_breakdown: experienceBreakdown,
            skill_grade: skillGrade,
            scores
        };
    }

    private async extractText(resumeInput: ResumeInput): Promise<TextExtractionResult> {
        try {
            return await withTimeout(
                this.textExtractor.extract(resumeInput),
                this.options.timeoutMs,
                'Text extraction'
            );
        } catch (error: unknown) {
            if (error instanceof ExtractionError) {
                throw error;
            }
            throw new ExtractionError(`Text extraction failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    private async structureJob(jobDescription: string): Promise<JobProfile> {
        const job = await this.structureWithRetry('Job structuring', async () =>
            parseJobProfile(
                await this.jobStructurer.structureJob(JOB_PROFILE_SYSTEM_PROMPT, jobDescription)
            )
        );
        return deepFreeze(job);
    }

    private async gradeSkills(candidate: CandidateProfile, job: JobProfile): Promise<unknown> {
        try {
            return await withTimeout(
                this.skillGrader.gradeSkills(SKILL_GRADING_SYSTEM_PROMPT, buildSkillGradingPayload(candidate, job)),
                this.options.timeoutMs,
                'Skill grading'
            );
        } catch (error: unknown) {
            throw new GradingError(`Skill grading failed: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Structuring attempt = model call + schema validation. Any failure,
     * malformed output included, gets exactly one more attempt.
     */
    private async structureWithRetry<T>(operationName: string, attempt: () => Promise<T>): Promise<T> {
        try {
            return await this.retryUtil.executeWithRetry(
                () => withTimeout(attempt(), this.options.timeoutMs, operationName),
                {
                    maxAttempts: STRUCTURING_ATTEMPTS,
                    baseDelay: 0,
                    operationName,
                    shouldRetry: () => true
                }
            );
        } catch (error: unknown) {
            throw new StructuringError(
                `${operationName} failed after ${STRUCTURING_ATTEMPTS} attempts: ${errorMessage(error)}`,
                { cause: error }
            );
        }
    }
}

// Singleton instance
let matchPipeline: MatchPipeline | null = null;

export function getMatchPipeline(): MatchPipeline {
    if (!matchPipeline) {
        matchPipeline = MatchPipeline.create();
    }
    return matchPipeline;
}
