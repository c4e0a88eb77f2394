import { v4 as uuidv4 } from 'uuid';
import { AppConfig } from '../config';
import { logger } from '../config/logger';
import { LookupResult } from '../models/UpstreamModel';
import { UserModel } from '../models/User';
import { ProductModel } from '../models/Product';
import { IntegrationOutcome, IntegrationResult, ResourceKind } from '../types/integration';
import { DecisionService } from './decisionService';
import { FetcherService } from './fetcherService';
import { IntegrationEvent, IntegrationReporter } from './reporter';
import { ResultStore } from './resultStore';
import { RuleEngineService } from './ruleEngineService';
import { synthesizePseudoIdentifier } from './identifierService';

export interface IntegrationServiceDeps {
    users: UserModel;
    products: ProductModel;
    ruleEngine: RuleEngineService;
    decision: DecisionService;
    store: ResultStore;
    retries: number;
    reporters?: IntegrationReporter[];
}

const RESOURCE_LABEL: Record<ResourceKind, string> = {
    user: 'User',
    product: 'Product'
};

/**
 * Runs one evaluation: user lookup, product lookup, scoring, decision and
 * persistence. A missing record stops the run before scoring and nothing is
 * saved. Blocked pairs are saved too.
 */
export class IntegrationService {
    private readonly reporters: IntegrationReporter[];

    constructor(private readonly deps: IntegrationServiceDeps) {
        this.reporters = deps.reporters ?? [];
    }

    async validateIntegration(
        userId: number,
        productId: number,
        reporters: IntegrationReporter[] = []
    ): Promise<IntegrationOutcome> {
        const listeners = [...this.reporters, ...reporters];
        const { users, products, ruleEngine, decision, store } = this.deps;

        const user = (await this.lookup('user', userId, users, listeners)).record;
        if (!user) {
            return { status: 'aborted', missing: 'user', id: userId };
        }

        const product = (await this.lookup('product', productId, products, listeners)).record;
        if (!product) {
            return { status: 'aborted', missing: 'product', id: productId };
        }

        const evaluationId = uuidv4();

        const risk = ruleEngine.score(user, product);
        const assessment = decision.decide(risk);

        if (assessment.blocked) {
            logger.warn(`Integration blocked: user=${userId} product=${productId} risk=${assessment.score}`, { evaluationId });
        } else {
            logger.info(`Integration authorized: user=${userId} product=${productId} risk=${assessment.score}`, { evaluationId });
        }

        this.emit(listeners, {
            type: 'assessment.produced',
            evaluationId,
            user,
            product,
            assessment,
            threshold: decision.threshold
        });

        const location = await store.save(user, product, assessment);
        logger.info(`Result saved: ${location} | risk=${assessment.score} | blocked=${assessment.blocked}`, { evaluationId });

        const result: IntegrationResult = {
            evaluationId,
            user,
            product,
            pseudoIdentifier: synthesizePseudoIdentifier(user.id),
            assessment,
            ruleOutcomes: risk.ruleOutcomes,
            location
        };

        this.emit(listeners, { type: 'result.saved', result });

        return { status: 'completed', result };
    }

    private async lookup<T>(
        resource: ResourceKind,
        id: number,
        model: { urlFor(id: number): string; findById(id: number): Promise<LookupResult<T>> },
        listeners: IntegrationReporter[]
    ): Promise<LookupResult<T>> {
        this.emit(listeners, { type: 'fetch.started', resource, id, url: model.urlFor(id) });

        const lookup = await model.findById(id);

        for (const failure of lookup.outcome.failures) {
            logger.error(`Error fetching ${lookup.url}: ${failure.message}`, {
                resource,
                attempt: failure.attempt,
                kind: failure.kind,
                status: failure.status
            });
            this.emit(listeners, {
                type: 'fetch.failed',
                resource,
                id,
                url: lookup.url,
                failure,
                retriesAllowed: this.deps.retries
            });
        }

        if (lookup.invalid) {
            logger.error(`Invalid ${resource} record from ${lookup.url}: ${lookup.invalid}`);
        }

        if (!lookup.record) {
            logger.warn(`${RESOURCE_LABEL[resource]} ${id} not found`);
            this.emit(listeners, { type: 'record.missing', resource, id, reason: lookup.invalid });
        }

        return lookup;
    }

    private emit(listeners: IntegrationReporter[], event: IntegrationEvent): void {
        for (const listener of listeners) {
            listener.report(event);
        }
    }
}

export const createIntegrationService = (
    config: Pick<AppConfig, 'usersApiUrl' | 'productsApiUrl' | 'riskThreshold' | 'fetch'>,
    store: ResultStore,
    fetcher: FetcherService = new FetcherService(config.fetch),
    reporters: IntegrationReporter[] = []
): IntegrationService => new IntegrationService({
    users: new UserModel(fetcher, config.usersApiUrl),
    products: new ProductModel(fetcher, config.productsApiUrl),
    ruleEngine: new RuleEngineService(),
    decision: new DecisionService(config.riskThreshold),
    store,
    retries: config.fetch.retries,
    reporters
});
