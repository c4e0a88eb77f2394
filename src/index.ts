import './config/env';
import { createApp } from './app';
import { loadConfig } from './config';
import { logger } from './config/logger';
import { createIntegrationService } from './services/integrationService';
import { FileResultStore } from './services/resultStore';

const config = loadConfig();
const store = new FileResultStore(config.resultDir);
const service = createIntegrationService(config, store);
const app = createApp({ config, service, store });

const server = app.listen(config.port, () => {
    logger.info(`Integration risk API running on port ${config.port}`);
    logger.info(`Health check: http://localhost:${config.port}/health`);
    logger.info(`API Base URL: http://localhost:${config.port}/api`);
});

const shutdown = (signal: NodeJS.Signals) => {
    logger.info(`${signal} signal received: closing HTTP server`);
    server.close(() => {
        logger.info('HTTP server closed');
    });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
