#!/usr/bin/env node
import './config/env';
import { runOperatorLoop } from './cli/operatorLoop';
import { loadConfig } from './config';
import { logger } from './config/logger';
import { createIntegrationService } from './services/integrationService';
import { FileResultStore } from './services/resultStore';

const main = async (): Promise<void> => {
    const config = loadConfig();
    const service = createIntegrationService(config, new FileResultStore(config.resultDir));

    await runOperatorLoop({
        service,
        config,
        input: process.stdin,
        output: process.stdout
    });
};

main().catch(error => {
    logger.error('Operator loop stopped', { error: error instanceof Error ? error.message : String(error) });
    process.exitCode = 1;
});
