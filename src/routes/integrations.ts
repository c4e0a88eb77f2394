import { Router, Request, Response } from 'express';
import Joi from 'joi';
import { ApiResponse } from '../types/api';
import { IntegrationResult, PersistedResult } from '../types/integration';
import { IntegrationService } from '../services/integrationService';
import { ResultStore } from '../services/resultStore';
import { ValidationError, NotFoundError, asyncHandler } from '../middleware/errorHandler';

interface ValidateIntegrationRequest {
    userId: number;
    productId: number;
}

const pairSchema = Joi.object<ValidateIntegrationRequest>({
    userId: Joi.number().integer().positive().required(),
    productId: Joi.number().integer().positive().required()
});

const RESOURCE_LABEL = { user: 'User', product: 'Product' } as const;

export const createIntegrationRoutes = (service: IntegrationService, store: ResultStore): Router => {
    const router = Router();

    router.post('/validate', asyncHandler(async (req: Request, res: Response) => {
        const { error, value } = pairSchema.validate(req.body);

        if (error || !value) {
            throw new ValidationError(`Invalid request data: ${error ? error.details[0].message : 'empty body'}`);
        }

        const outcome = await service.validateIntegration(value.userId, value.productId);

        if (outcome.status === 'aborted') {
            throw new NotFoundError(`${RESOURCE_LABEL[outcome.missing]} with ID ${outcome.id} not found`);
        }

        const response: ApiResponse<IntegrationResult> = {
            success: true,
            data: outcome.result,
            message: outcome.result.assessment.blocked ? 'Integration blocked' : 'Integration authorized',
            timestamp: new Date().toISOString()
        };

        res.json(response);
    }));

    router.get('/results/:userId/:productId', asyncHandler(async (req: Request, res: Response) => {
        const { error, value } = pairSchema.validate(req.params);

        if (error || !value) {
            throw new ValidationError(`Invalid parameters: ${error ? error.details[0].message : 'missing'}`);
        }

        const stored = await store.find(value.userId, value.productId);
        if (!stored) {
            throw new NotFoundError(`No result stored for user ${value.userId} and product ${value.productId}`);
        }

        const response: ApiResponse<PersistedResult> = {
            success: true,
            data: stored,
            timestamp: new Date().toISOString()
        };

        res.json(response);
    }));

    return router;
};
