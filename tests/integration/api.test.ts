import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import request from 'supertest';
import { Express } from 'express';
import { createApp } from '../../src/app';
import { AppConfig } from '../../src/config';
import { FetcherService } from '../../src/services/fetcherService';
import { createIntegrationService } from '../../src/services/integrationService';
import { FileResultStore } from '../../src/services/resultStore';
import { stubClient } from '../helpers/stubClient';
import { PRODUCTS_URL, USERS_URL, upstream } from '../helpers/upstream';

describe('Integration API', () => {
    let directory: string;
    let app: Express;

    beforeEach(async () => {
        directory = await fs.mkdtemp(path.join(os.tmpdir(), 'risk-api-'));

        const config: AppConfig = {
            port: 0,
            nodeEnv: 'test',
            resultDir: directory,
            usersApiUrl: USERS_URL,
            productsApiUrl: PRODUCTS_URL,
            riskThreshold: 70,
            fetch: { retries: 3, timeoutMs: 50, retryDelayMs: 0 }
        };
        const store = new FileResultStore(directory, () => new Date(2026, 4, 2, 8, 15, 30));
        const service = createIntegrationService(config, store, new FetcherService(config.fetch, stubClient(upstream).client));

        app = createApp({ config, service, store });
    });

    afterEach(async () => {
        await fs.rm(directory, { recursive: true, force: true });
    });

    describe('POST /api/integrations/validate', () => {
        it('returns the assessment of an authorized pair', async () => {
            const response = await request(app)
                .post('/api/integrations/validate')
                .send({ userId: 3, productId: 1 })
                .expect(200);

            expect(response.body.success).toBe(true);
            expect(response.body.message).toBe('Integration authorized');
            expect(response.body.data.assessment).toEqual({
                score: 20,
                blocked: false,
                reasons: ['common domain', 'pseudo-identifier has an acceptable pattern', "category: men's clothing (risk 10)"]
            });
            expect(response.body.data.pseudoIdentifier).toBe('398.259.791-94');
            expect(response.body.data.ruleOutcomes).toHaveLength(6);
        });

        it('reports a blocked pair with status 200', async () => {
            const response = await request(app)
                .post('/api/integrations/validate')
                .send({ userId: 1, productId: 9 })
                .expect(200);

            expect(response.body.message).toBe('Integration blocked');
            expect(response.body.data.assessment.blocked).toBe(true);
            expect(response.body.data.assessment.score).toBe(100);
        });

        it('answers 404 when the user is missing', async () => {
            const response = await request(app)
                .post('/api/integrations/validate')
                .send({ userId: 42, productId: 1 })
                .expect(404);

            expect(response.body.status).toBe('fail');
            expect(response.body.message).toBe('User with ID 42 not found');
            expect(response.body.path).toBe('/api/integrations/validate');
        });

        it('answers 404 when the product is missing', async () => {
            const response = await request(app)
                .post('/api/integrations/validate')
                .send({ userId: 3, productId: 77 })
                .expect(404);

            expect(response.body.message).toBe('Product with ID 77 not found');
        });

        it('rejects a body without ids', async () => {
            const response = await request(app)
                .post('/api/integrations/validate')
                .send({ userId: 'abc' })
                .expect(400);

            expect(response.body.message).toBe('Invalid request data: "userId" must be a number');
        });
    });

    describe('GET /api/integrations/results/:userId/:productId', () => {
        it('returns a result saved by an earlier evaluation', async () => {
            await request(app).post('/api/integrations/validate').send({ userId: 3, productId: 1 }).expect(200);

            const response = await request(app).get('/api/integrations/results/3/1').expect(200);

            expect(response.body.data).toEqual({
                timestamp: '2026-05-02 08:15:30',
                user: { id: 3, name: 'Clara Mendes', email: 'clara.mendes@studio.biz', city: 'Lisbon' },
                product: { id: 1, title: 'Canvas Backpack', price: 20, category: "men's clothing" },
                antifraud: {
                    score: 20,
                    blocked: false,
                    reasons: ['common domain', 'pseudo-identifier has an acceptable pattern', "category: men's clothing (risk 10)"]
                }
            });
        });

        it('answers 404 for a pair never evaluated', async () => {
            const response = await request(app).get('/api/integrations/results/2/2').expect(404);

            expect(response.body.message).toBe('No result stored for user 2 and product 2');
        });

        it('answers 500 with a readable message for a corrupted result file', async () => {
            await fs.writeFile(path.join(directory, 'result_user4_product4.json'), '{"timestamp": ', 'utf-8');

            const response = await request(app).get('/api/integrations/results/4/4').expect(500);

            expect(response.body.status).toBe('error');
            expect(response.body.message).toMatch(/^Stored result result_user4_product4\.json is unreadable: /);
        });

        it('rejects non-numeric ids', async () => {
            await request(app).get('/api/integrations/results/abc/1').expect(400);
        });
    });

    describe('service endpoints', () => {
        it('describes the API', async () => {
            const response = await request(app).get('/api').expect(200);

            expect(response.body.sources).toEqual({ users: USERS_URL, products: PRODUCTS_URL });
            expect(response.body.riskThreshold).toBe(70);
        });

        it('reports health', async () => {
            const response = await request(app).get('/health').expect(200);

            expect(response.body.status).toBe('OK');
        });

        it('answers 404 for unknown paths', async () => {
            const response = await request(app).get('/nowhere').expect(404);

            expect(response.body).toEqual({ error: 'Endpoint not found', path: '/nowhere', method: 'GET' });
        });
    });
});
