import { Router, Request, Response } from "express";
import { z } from "zod";
import { logger } from "../config/logger";
import { createEvaluationRequest, IEvaluationService } from "../services/evaluation.service";
import { JudgeConfigurationError, OrchestrationFailedError } from "../utils/errors";

// Validation schema for evaluate request
const evaluateSchema = z.object({
    cvText: z.string().trim().min(1, "CV text is required"),
    jdText: z.string().trim().min(1, "Job description text is required"),
    guidance: z.string().optional(),
    judges: z.array(z.string().min(1)).min(1, "Select at least one judge").optional()
});

/**
 * POST /evaluate
 *
 * Run the judge ensemble on a CV / job description pair and return the
 * consensus report. Runs synchronously; the response arrives once every
 * judge has answered or been excluded.
 *
 * Body: { cvText: string, jdText: string, guidance?: string, judges?: string[] }
 * Returns: ConsensusReport
 */
export function createEvaluateRoutes(service: IEvaluationService): Router {
    const router = Router();

    router.post('/', async (req: Request, res: Response) => {
        try {
            const validatedData = evaluateSchema.parse(req.body);
            const { cvText, jdText, guidance, judges: judgeIds } = validatedData;

            const configured = service.listJudges();
            let judges = configured;
            if (judgeIds) {
                const unknownIds = judgeIds.filter(id => !configured.some(judge => judge.id === id));
                if (unknownIds.length > 0) {
                    return res.status(400).json({
                        error: 'Unknown judges',
                        details: unknownIds
                    });
                }
                judges = configured.filter(judge => judgeIds.includes(judge.id));
            }

            logger.info({
                judges: judges.map(judge => judge.id),
                cvLength: cvText.length,
                jdLength: jdText.length
            }, 'Evaluation requested');

            const report = await service.evaluate(createEvaluationRequest(cvText, jdText, guidance), judges);
            return res.json(report);

        } catch (error) {
            if (error instanceof z.ZodError) {
                return res.status(400).json({
                    error: 'Validation failed',
                    details: error.errors
                });
            }

            if (error instanceof JudgeConfigurationError) {
                return res.status(400).json({
                    error: 'Invalid judge selection',
                    message: error.message
                });
            }

            if (error instanceof OrchestrationFailedError) {
                logger.error({ excludedJudges: error.excludedJudges }, 'Evaluation failed: no judge produced a result');
                return res.status(502).json({
                    error: 'All judges failed',
                    message: error.message,
                    excludedJudges: error.excludedJudges
                });
            }

            logger.error({ err: error }, 'Evaluation request failed');
            return res.status(500).json({
                error: 'Evaluation request failed',
                message: error instanceof Error ? error.message : 'Unknown error'
            });
        }
    });

    return router;
}
