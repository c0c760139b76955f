import type { Response } from "express";
import { z } from "zod";
import { logger } from "../config/logger";
import {
    ExtractionError,
    GradingError,
    InvalidScoreError,
    PipelineError,
    StructuringError,
    UnsupportedFormatError,
    errorMessage
} from "../types/errors";

/**
 * HTTP status for an error raised while serving a request
 */
export function statusForError(error: unknown): number {
    if (error instanceof z.ZodError) {
        return 400;
    }
    if (error instanceof UnsupportedFormatError) {
        return 415;
    }
    if (error instanceof ExtractionError) {
        return 422;
    }
    if (error instanceof StructuringError || error instanceof GradingError || error instanceof InvalidScoreError) {
        return 502;
    }
    return 500;
}

export function sendError(res: Response, error: unknown, context: string): Response {
    if (error instanceof z.ZodError) {
        return res.status(400).json({
            error: 'Validation failed',
            details: error.errors
        });
    }

    const status = statusForError(error);

    if (status >= 500) {
        logger.error({ err: error, context }, `${context} failed`);
    } else {
        logger.warn({ error: errorMessage(error), context }, `${context} rejected`);
    }

    return res.status(status).json({
        error: `${context} failed`,
        code: error instanceof PipelineError ? error.code : 'INTERNAL_ERROR',
        message: errorMessage(error)
    });
}
