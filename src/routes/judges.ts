import { Router, Request, Response } from "express";
import { IEvaluationService } from "../services/evaluation.service";

/**
 * GET /judges
 *
 * List the configured judge roster.
 */
export function createJudgeRoutes(service: IEvaluationService): Router {
    const router = Router();

    router.get('/', (req: Request, res: Response) => {
        res.json({
            judges: service.listJudges().map(judge => ({
                id: judge.id,
                name: judge.name,
                role: judge.role ?? null,
                model: judge.model,
                weight: judge.weight
            }))
        });
    });

    return router;
}
