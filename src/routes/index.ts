import { Router } from 'express';
import { AppConfig } from '../config';
import { IntegrationService } from '../services/integrationService';
import { ResultStore } from '../services/resultStore';
import { createIntegrationRoutes } from './integrations';

export const createRoutes = (
    service: IntegrationService,
    store: ResultStore,
    config: Pick<AppConfig, 'usersApiUrl' | 'productsApiUrl' | 'riskThreshold' | 'nodeEnv'>
): Router => {
    const router = Router();

    router.use('/integrations', createIntegrationRoutes(service, store));

    router.get('/', (req, res) => {
        res.json({
            name: 'Integration Risk Validator API',
            version: '1.0.0',
            description: 'Pairs a user and a product from external services and scores the integration for fraud risk',
            status: 'Active',
            endpoints: {
                'POST /api/integrations/validate': 'Fetch a user and a product, score the pair and store the result',
                'GET /api/integrations/results/:userId/:productId': 'Read the stored result of a pair',
                'GET /health': 'System health check',
                'GET /api': 'This API information'
            },
            sources: {
                users: config.usersApiUrl,
                products: config.productsApiUrl
            },
            riskThreshold: config.riskThreshold,
            timestamp: new Date().toISOString(),
            environment: config.nodeEnv
        });
    });

    return router;
};
