import { Router, type Request, type Response } from "express";
import type { Multer } from "multer";
import type { IMatchPipeline } from "../pipeline/match-pipeline";
import { sendError } from "./http-errors";

export function resumeRoutes(pipeline: IMatchPipeline, upload: Multer): Router {
    const router = Router();

    /**
     * POST /resume/extract
     *
     * Extract raw text and links from a resume without structuring it.
     *
     * Multipart: resume (PDF or .txt file)
     */
    router.post('/extract', upload.single('resume'), async (req: Request, res: Response) => {
        try {
            if (!req.file) {
                return res.status(400).json({ error: 'Resume file is required' });
            }

            const extraction = await pipeline.extractResumeText({
                buffer: req.file.buffer,
                filename: req.file.originalname,
                mimetype: req.file.mimetype
            });

            res.json(extraction);

        } catch (error: unknown) {
            sendError(res, error, 'Resume text extraction');
        }
    });

    return router;
}
