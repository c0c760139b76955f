import { createApp } from "./app";
import { getConfig } from "./config/config";
import { logger } from "./config/logger";
import { getMatchPipeline } from "./pipeline/match-pipeline";
import { getOpenAIService } from "./services/openai.service";
import { errorMessage } from "./types/errors";

async function startServer(): Promise<void> {
    try {
        const config = getConfig();

        // Initialize OpenAI service
        const openaiService = getOpenAIService();
        const openaiConnected = await openaiService.testConnection();
        if (openaiConnected) {
            logger.info({ model: config.openai.model }, "OpenAI service initialized and connected");
        } else {
            logger.warn({ model: config.openai.model }, "OpenAI service initialized but connection test failed");
        }

        const app = createApp(getMatchPipeline(), { maxUploadBytes: config.maxUploadBytes });

        app.listen(config.port, () => {
            logger.info({
                port: config.port,
                nodeEnv: config.nodeEnv,
                timeoutMs: config.externalCallTimeoutMs
            }, `Server running at http://localhost:${config.port}`);
        });
    } catch (error: unknown) {
        logger.error({ error: errorMessage(error) }, "Failed to start server");
        process.exit(1);
    }
}

void startServer();
