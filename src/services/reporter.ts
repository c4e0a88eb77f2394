import { FetchFailure } from './fetcherService';
import { IntegrationResult, ProductRecord, ResourceKind, RiskAssessment, UserRecord } from '../types/integration';

export type IntegrationEvent =
    | { type: 'fetch.started'; resource: ResourceKind; id: number; url: string }
    | { type: 'fetch.failed'; resource: ResourceKind; id: number; url: string; failure: FetchFailure; retriesAllowed: number }
    | { type: 'record.missing'; resource: ResourceKind; id: number; reason?: string }
    | {
        type: 'assessment.produced';
        evaluationId: string;
        user: UserRecord;
        product: ProductRecord;
        assessment: RiskAssessment;
        threshold: number;
    }
    | { type: 'result.saved'; result: IntegrationResult };

export interface IntegrationReporter {
    report(event: IntegrationEvent): void;
}

/** Keeps every event in order; handy for callers that render afterwards. */
export class CollectingReporter implements IntegrationReporter {
    readonly events: IntegrationEvent[] = [];

    report(event: IntegrationEvent): void {
        this.events.push(event);
    }

    ofType<T extends IntegrationEvent['type']>(type: T): Extract<IntegrationEvent, { type: T }>[] {
        return this.events.filter((event): event is Extract<IntegrationEvent, { type: T }> => event.type === type);
    }
}
