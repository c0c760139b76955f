import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import multer from "multer";
import { logger } from "./config/logger";
import type { IMatchPipeline } from "./pipeline/match-pipeline";
import { jobDescriptionRoutes } from "./routes/job-description";
import { matchRoutes } from "./routes/match";
import { resumeRoutes } from "./routes/resume";
import { SCORE_WEIGHTS } from "./scoring/score-combiner";
import { errorMessage } from "./types/errors";

export interface AppOptions {
    maxUploadBytes: number;
}

export function createApp(pipeline: IMatchPipeline, options: AppOptions): Express {
    const app = express();

    // Resumes are kept in memory; nothing is written to disk
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: options.maxUploadBytes }
    });

    // Middleware
    app.use(cors());
    app.use(express.json());
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use("/match", matchRoutes(pipeline, upload));
    app.use("/job-description", jobDescriptionRoutes(pipeline));
    app.use("/resume", resumeRoutes(pipeline, upload));

    // Health check
    app.get("/health", (_req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Root route
    app.get("/", (_req: Request, res: Response) => {
        res.json({
            message: "Resume Match Service API",
            version: "1.0.0",
            description: "Scores a resume against a job description on experience, education and skills",
            endpoints: {
                "Matching": {
                    "POST /match": "Match one resume (multipart: resume, job_description)",
                    "POST /match/batch": "Match several resumes (multipart: resumes, job_description)"
                },
                "Parsing": {
                    "POST /job-description/parse": "Structure a job description",
                    "POST /resume/extract": "Extract text and links from a resume"
                },
                "System": {
                    "GET /health": "Health check",
                    "GET /": "API information"
                }
            },
            scoring: {
                experience: SCORE_WEIGHTS.experience,
                education: SCORE_WEIGHTS.education,
                skills: SCORE_WEIGHTS.skill
            }
        });
    });

    // Upload errors raised by multer before a route handler runs
    app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
        if (err instanceof multer.MulterError) {
            const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
            logger.warn({ code: err.code, field: err.field }, 'Upload rejected');
            return res.status(status).json({
                error: 'Upload rejected',
                code: err.code,
                message: err.message
            });
        }

        if (res.headersSent) {
            return next(err);
        }

        logger.error({ err }, 'Unhandled request error');
        res.status(500).json({
            error: 'Internal server error',
            message: errorMessage(err)
        });
    });

    return app;
}
