import { logger, type ILogger } from '../config/logger';
import { buildCandidateProfileUserPrompt } from '../prompts/candidate-profile.prompt';
import type { LinkInfo, SkillGradingPayload } from '../types/match';
import { getOpenAIService, type IOpenAIService } from './openai.service';

/**
 * Capability interfaces for the LLM collaborators. Each returns the model's
 * parsed JSON untouched; validation belongs to the pipeline.
 */
export interface ICandidateStructurer {
    structureCandidate(systemPrompt: string, rawText: string, links: LinkInfo): Promise<unknown>;
}

export interface IJobStructurer {
    structureJob(systemPrompt: string, jobDescription: string): Promise<unknown>;
}

export interface ISkillGrader {
    gradeSkills(gradingPrompt: string, payload: SkillGradingPayload): Promise<unknown>;
}

/**
 * LLM Structuring Service with Dependency Injection
 *
 * Turns resume text and job descriptions into JSON and grades skill
 * coverage, all through JSON-mode chat completions.
 */
export class LlmStructuringService implements ICandidateStructurer, IJobStructurer, ISkillGrader {
    constructor(
        private openai: IOpenAIService,
        private logger: ILogger
    ) { }

    /**
     * Factory method for production use
     */
    static create(): LlmStructuringService {
        return new LlmStructuringService(getOpenAIService(), logger);
    }

    async structureCandidate(systemPrompt: string, rawText: string, links: LinkInfo): Promise<unknown> {
        this.logger.info({
            textLength: rawText.length,
            projectLinks: links.projects.length
        }, 'Structuring candidate profile');

        return await this.openai.generateJsonCompletion([
            { role: 'system', content: systemPrompt },
            { role: 'user', content: buildCandidateProfileUserPrompt(rawText, links) }
        ]);
    }

    async structureJob(systemPrompt: string, jobDescription: string): Promise<unknown> {
        this.logger.info({
            textLength: jobDescription.length
        }, 'Structuring job description');

        return await this.openai.generateJsonCompletion([
            { role: 'system', content: systemPrompt },
            { role: 'user', content: jobDescription }
        ]);
    }

    async gradeSkills(gradingPrompt: string, payload: SkillGradingPayload): Promise<unknown> {
        this.logger.info({
            requiredSkills: payload.jd_required_skills.length,
            candidateSkills: payload.candidate_skills.length
        }, 'Grading candidate skills');

        return await this.openai.generateJsonCompletion([
            { role: 'system', content: gradingPrompt },
            { role: 'user', content: JSON.stringify(payload) }
        ]);
    }
}

// Singleton instance
let llmStructuringService: LlmStructuringService | null = null;

export function getLlmStructuringService(): LlmStructuringService {
    if (!llmStructuringService) {
        llmStructuringService = LlmStructuringService.create();
    }
    return llmStructuringService;
}
