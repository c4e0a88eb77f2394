export interface UserRecord {
    id: number;
    name: string;
    email: string;
    city: string;
}

export interface ProductRecord {
    id: number;
    title: string;
    price: number;
    category: string;
}

export type ResourceKind = 'user' | 'product';

export interface RuleOutcome {
    ruleId: string;
    ruleName: string;
    delta: number;
    reason?: string;
}

export interface RiskScore {
    score: number;
    reasons: string[];
    ruleOutcomes: RuleOutcome[];
}

export interface RiskAssessment {
    readonly score: number;
    readonly reasons: readonly string[];
    readonly blocked: boolean;
}

export interface IntegrationResult {
    evaluationId: string;
    user: UserRecord;
    product: ProductRecord;
    pseudoIdentifier: string;
    assessment: RiskAssessment;
    ruleOutcomes: RuleOutcome[];
    location: string;
}

export type IntegrationOutcome =
    | { status: 'completed'; result: IntegrationResult }
    | { status: 'aborted'; missing: ResourceKind; id: number };

/** On-disk shape of one evaluation. */
export interface PersistedResult {
    timestamp: string;
    user: UserRecord;
    product: ProductRecord;
    antifraud: {
        score: number;
        blocked: boolean;
        reasons: string[];
    };
}
