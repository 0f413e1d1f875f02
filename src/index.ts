// Load environment variables before any module reads them
import "dotenv/config";
import { createApp } from "./app";
import { logger } from "./config/logger";
import { getEvaluationService } from "./services/evaluation.service";

const PORT = process.env.PORT || 3000;

function startServer() {
    try {
        const service = getEvaluationService();
        const judges = service.listJudges();
        logger.info({
            judges: judges.map(judge => `${judge.id} (${judge.model}, weight ${judge.weight})`)
        }, "Judge ensemble configured");

        const app = createApp(service);

        app.listen(PORT, () => {
            logger.info({ port: PORT }, `Server running at http://localhost:${PORT}`);
            logger.info({}, "  POST /evaluate - Run the judge ensemble");
            logger.info({}, "  GET /judges - List configured judges");
            logger.info({}, "  GET /health - Health check");
        });
    } catch (error) {
        logger.error({ err: error }, "Failed to start server");
        process.exit(1);
    }
}

startServer();
