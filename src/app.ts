import express, { Express, Request, Response } from "express";
import { createEvaluateRoutes } from "./routes/evaluate";
import { createJudgeRoutes } from "./routes/judges";
import { IEvaluationService } from "./services/evaluation.service";

export function createApp(service: IEvaluationService): Express {
    const app = express();

    // Middleware
    app.use(express.json({ limit: '2mb' }));
    app.use(express.urlencoded({ extended: true }));

    // Routes
    app.use("/evaluate", createEvaluateRoutes(service));
    app.use("/judges", createJudgeRoutes(service));

    // Health check
    app.get("/health", (req: Request, res: Response) => {
        res.json({ status: "ok", timestamp: new Date().toISOString() });
    });

    // Root route
    app.get("/", (req: Request, res: Response) => {
        res.json({
            message: "Ensemble CV Judge API",
            version: "1.0.0",
            description: "Screens a CV against a job description with several LLM judges and a weighted consensus",
            endpoints: {
                "Evaluation": {
                    "POST /evaluate": "Run the judge ensemble and return the consensus report",
                    "GET /judges": "List configured judges"
                },
                "System": {
                    "GET /health": "Health check",
                    "GET /": "API information"
                }
            }
        });
    });

    return app;
}
