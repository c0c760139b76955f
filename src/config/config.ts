import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const blankToUndefined = (value: unknown) =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    PORT: z.coerce.number().int().positive().default(3000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    OPENAI_API_KEY: z.string().default(''),
    OPENAI_BASE_URL: z.preprocess(blankToUndefined, z.string().url().optional()),
    LLM_MODEL: z.string().min(1).default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(4000),
    EXTERNAL_CALL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(10 * 1024 * 1024)
});

export interface AppConfig {
    nodeEnv: 'development' | 'test' | 'production';
    port: number;
    logLevel: 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
    openai: {
        apiKey: string;
        baseUrl?: string;
        model: string;
        temperature: number;
        maxTokens: number;
    };
    externalCallTimeoutMs: number;
    maxUploadBytes: number;
}

/**
 * Application Configuration
 *
 * Validates the process environment and exposes it as a typed object.
 * Throws on the first malformed variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse(env);

    if (!result.success) {
        const problems = result.error.errors
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${problems}`);
    }

    const parsed = result.data;

    return {
        nodeEnv: parsed.NODE_ENV,
        port: parsed.PORT,
        logLevel: parsed.LOG_LEVEL,
        openai: {
            apiKey: parsed.OPENAI_API_KEY,
            baseUrl: parsed.OPENAI_BASE_URL,
            model: parsed.LLM_MODEL,
            temperature: parsed.LLM_TEMPERATURE,
            maxTokens: parsed.LLM_MAX_TOKENS
        },
        externalCallTimeoutMs: parsed.EXTERNAL_CALL_TIMEOUT_MS,
        maxUploadBytes: parsed.MAX_UPLOAD_BYTES
    };
}

let appConfig: AppConfig | null = null;

export function getConfig(): AppConfig {
    if (!appConfig) {
        appConfig = loadConfig();
    }
    return appConfig;
}
