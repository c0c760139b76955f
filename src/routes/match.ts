import { Router, type Request, type Response } from "express";
import type { Multer } from "multer";
import { z } from "zod";
import { logger } from "../config/logger";
import type { IMatchPipeline } from "../pipeline/match-pipeline";
import { PipelineError, errorMessage } from "../types/errors";
import type { MatchReport } from "../types/match";
import { sendError } from "./http-errors";

const MAX_BATCH_FILES = 20;

// Validation schema for match requests (multipart text field)
const matchSchema = z.object({
    job_description: z.string().trim().min(1, "Job description is required")
});

type BatchResult =
    | ({ filename: string; success: true } & MatchReport)
    | { filename: string; success: false; code: string; error: string };

export function matchRoutes(pipeline: IMatchPipeline, upload: Multer): Router {
    const router = Router();

    /**
     * POST /match
     *
     * Match one resume against a job description.
     *
     * Multipart: resume (PDF or .txt file), job_description (text)
     * Returns: MatchReport
     */
    router.post('/', upload.single('resume'), async (req: Request, res: Response) => {
        try {
            const { job_description } = matchSchema.parse(req.body);

            if (!req.file) {
                return res.status(400).json({ error: 'Resume file is required' });
            }

            const report = await pipeline.run({
                buffer: req.file.buffer,
                filename: req.file.originalname,
                mimetype: req.file.mimetype
            }, job_description);

            res.json(report);

        } catch (error: unknown) {
            sendError(res, error, 'Resume match');
        }
    });

    /**
     * POST /match/batch
     *
     * Match several resumes against the same job description, one after
     * another. A failing resume is reported inline and does not stop the batch.
     *
     * Multipart: resumes (files), job_description (text)
     */
    router.post('/batch', upload.array('resumes', MAX_BATCH_FILES), async (req: Request, res: Response) => {
        try {
            const { job_description } = matchSchema.parse(req.body);
            const files = Array.isArray(req.files) ? req.files : [];

            if (files.length === 0) {
                return res.status(400).json({ error: 'At least one resume file is required' });
            }

            const results: BatchResult[] = [];

            for (const file of files) {
                try {
                    const report = await pipeline.run({
                        buffer: file.buffer,
                        filename: file.originalname,
                        mimetype: file.mimetype
                    }, job_description);

                    results.push({ filename: file.originalname, success: true, ...report });

                } catch (error: unknown) {
                    logger.warn({
                        filename: file.originalname,
                        error: errorMessage(error)
                    }, 'Batch match failed for resume');

                    results.push({
                        filename: file.originalname,
                        success: false,
                        code: error instanceof PipelineError ? error.code : 'INTERNAL_ERROR',
                        error: errorMessage(error)
                    });
                }
            }

            const successful = results.filter(result => result.success).length;

            logger.info({
                totalProcessed: files.length,
                successful
            }, 'Batch match completed');

            res.json({
                results,
                total_processed: files.length,
                successful,
                failed: files.length - successful
            });

        } catch (error: unknown) {
            sendError(res, error, 'Batch resume match');
        }
    });

    return router;
}
