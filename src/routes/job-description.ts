import { Router, type Request, type Response } from "express";
import { z } from "zod";
import type { IMatchPipeline } from "../pipeline/match-pipeline";
import { sendError } from "./http-errors";

const parseSchema = z.object({
    job_description: z.string().trim().min(1, "Job description is required")
});

export function jobDescriptionRoutes(pipeline: IMatchPipeline): Router {
    const router = Router();

    /**
     * POST /job-description/parse
     *
     * Structure a job description without matching anything against it.
     *
     * Body: { job_description: string }
     * Returns: { job_profile: JobProfile }
     */
    router.post('/parse', async (req: Request, res: Response) => {
        try {
            const { job_description } = parseSchema.parse(req.body);
            const jobProfile = await pipeline.structureJobDescription(job_description);

            res.json({ job_profile: jobProfile });

        } catch (error: unknown) {
            sendError(res, error, 'Job description parsing');
        }
    });

    return router;
}
