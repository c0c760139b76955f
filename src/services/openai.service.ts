import OpenAI from 'openai';
import type {
    ChatCompletion,
    ChatCompletionCreateParamsNonStreaming,
    ChatCompletionMessageParam
} from 'openai/resources/chat/completions';
import { getConfig } from '../config/config';
import { logger, type ILogger } from '../config/logger';
import { errorMessage } from '../types/errors';
import { RetryUtil, type IRetryUtil } from '../utils/retry.util';

export type ChatMessage = ChatCompletionMessageParam;

// Interfaces for better testability
export interface IOpenAIClient {
    chat: {
        completions: {
            create(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
        };
    };
}

export interface CompletionOptions {
    temperature?: number;
    max_tokens?: number;
    response_format?: { type: 'json_object' };
}

export interface IOpenAIService {
    generateCompletion(messages: ChatMessage[], options?: CompletionOptions): Promise<string>;
    generateJsonCompletion(messages: ChatMessage[]): Promise<unknown>;
    testConnection(): Promise<boolean>;
}

/**
 * OpenAI Service with Dependency Injection
 *
 * Chat completions against any OpenAI-compatible endpoint. Transport
 * failures are retried here; content problems are left to the caller.
 */
export class OpenAIService implements IOpenAIService {
    constructor(
        private client: IOpenAIClient,
        private retryUtil: IRetryUtil,
        private logger: ILogger,
        private llmModel: string = 'gpt-4o-mini',
        private temperature: number = 0.1,
        private maxTokens: number = 4000
    ) { }

    /**
     * Factory method for production use
     */
    static create(): OpenAIService {
        const appConfig = getConfig();
        const client = new OpenAI({
            apiKey: appConfig.openai.apiKey,
            baseURL: appConfig.openai.baseUrl,
            timeout: appConfig.externalCallTimeoutMs,
            maxRetries: 0
        });

        return new OpenAIService(
            client,
            RetryUtil,
            logger,
            appConfig.openai.model,
            appConfig.openai.temperature,
            appConfig.openai.maxTokens
        );
    }

    /**
     * Generate LLM completion
     */
    async generateCompletion(messages: ChatMessage[], options?: CompletionOptions): Promise<string> {
        const temperature = options?.temperature ?? this.temperature;

        return await this.retryUtil.executeWithRetry(
            async () => {
                this.logger.info({
                    messagesCount: messages.length,
                    model: this.llmModel,
                    temperature
                }, 'Generating OpenAI completion');

                const response = await this.client.chat.completions.create({
                    model: this.llmModel,
                    messages,
                    temperature,
                    max_tokens: options?.max_tokens ?? this.maxTokens,
                    response_format: options?.response_format
                });

                const content = response.choices[0]?.message?.content;
                if (!content) {
                    throw new Error('No content returned from OpenAI');
                }

                this.logger.info({
                    tokensUsed: response.usage?.total_tokens ?? 0,
                    contentLength: content.length
                }, 'OpenAI completion generated successfully');

                return content;
            },
            {
                maxAttempts: 3,
                baseDelay: 1000,
                maxDelay: 5000,
                operationName: 'OpenAI completion generation'
            }
        );
    }

    /**
     * Generate JSON-mode completion and parse it. The parsed value is not
     * validated against any schema.
     */
    async generateJsonCompletion(messages: ChatMessage[]): Promise<unknown> {
        const content = await this.generateCompletion(messages, {
            response_format: { type: 'json_object' }
        });

        try {
            const parsed: unknown = JSON.parse(stripCodeFence(content));

            this.logger.debug({
                parsedType: Array.isArray(parsed) ? 'array' : typeof parsed
            }, 'JSON completion parsed successfully');

            return parsed;
        } catch (error: unknown) {
            this.logger.warn({
                contentPreview: content.slice(0, 200)
            }, 'OpenAI returned invalid JSON');
            throw new Error(`Invalid JSON returned by model: ${errorMessage(error)}`, { cause: error });
        }
    }

    /**
     * Test OpenAI connection
     */
    async testConnection(): Promise<boolean> {
        try {
            await this.generateCompletion([{ role: 'user', content: 'ping' }], { max_tokens: 5 });
            this.logger.info({}, 'OpenAI connection test successful');
            return true;
        } catch (error: unknown) {
            this.logger.error({ err: error }, 'OpenAI connection test failed');
            return false;
        }
    }
}

/**
 * Some gateways wrap JSON-mode output in a markdown fence anyway.
 */
export function stripCodeFence(content: string): string {
    const fenced = /^\s*```(?:json)?\s*([\s\S]*?)\s*```\s*$/i.exec(content);
    return fenced ? fenced[1] : content;
}

// Singleton instance
let openaiService: OpenAIService | null = null;

export function getOpenAIService(): OpenAIService {
    if (!openaiService) {
        openaiService = OpenAIService.create();
    }
    return openaiService;
}
