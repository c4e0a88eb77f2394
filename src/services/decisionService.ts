import { DEFAULT_RISK_THRESHOLD } from '../config';
import { RiskAssessment, RiskScore } from '../types/integration';

export class DecisionService {
    constructor(private readonly riskThreshold: number = DEFAULT_RISK_THRESHOLD) {}

    get threshold(): number {
        return this.riskThreshold;
    }

    /** Blocked when the score reaches the threshold. The result is frozen. */
    decide(risk: RiskScore): RiskAssessment {
        return Object.freeze({
            score: risk.score,
            reasons: Object.freeze([...risk.reasons]),
            blocked: risk.score >= this.riskThreshold
        });
    }
}
