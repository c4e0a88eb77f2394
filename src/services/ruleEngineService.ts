import { ProductRecord, RiskScore, RuleOutcome, UserRecord } from '../types/integration';
import { lastDigitOf, synthesizePseudoIdentifier } from './identifierService';

export const BASE_SCORE = 10;
export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

export const DISPOSABLE_DOMAINS: ReadonlySet<string> = new Set([
    'mailinator.com',
    'tempmail.com',
    '10minutemail.com',
    'disposablemail.com'
]);

export const CATEGORY_RISK: Readonly<Record<string, number>> = {
    'electronics': 30,
    'jewelery': 40,
    "men's clothing": 10,
    "women's clothing": 10
};

export const DEFAULT_CATEGORY_RISK = 15;

const EMAIL_PATTERN = /^[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9-.]+$/;
const UNUSUAL_NAME_CHARACTER = /[^A-Za-zÀ-ÿ \-.]/;
const LONG_DOMAIN_LENGTH = 30;

export const CLAMP_REASON = 'score adjusted to the 0-100 range';

export const clampScore = (value: number): number =>
    Math.max(MIN_SCORE, Math.min(MAX_SCORE, Math.trunc(value)));

export class RuleEngineService {

    /**
     * Scores a (user, product) pair. Rules run in a fixed order and each one
     * may add a reason; the sum starts at BASE_SCORE and is clamped to 0..100.
     */
    score(user: UserRecord, product: ProductRecord): RiskScore {
        const outcomes: RuleOutcome[] = [
            this.checkEmailRule(user.email),
            this.checkPseudoIdentifierRule(user.id),
            this.checkCategoryRule(product.category),
            this.checkPriceRule(product.price),
            this.checkNameShapeRule(user.name),
            this.checkNameEmailLocalityRule(user.name, user.email)
        ];

        const accumulated = outcomes.reduce((sum, outcome) => sum + outcome.delta, BASE_SCORE);
        const score = clampScore(accumulated);
        if (score !== accumulated) {
            outcomes.push({
                ruleId: 'clamp',
                ruleName: 'Score Range',
                delta: score - accumulated,
                reason: CLAMP_REASON
            });
        }

        const reasons = outcomes
            .map(outcome => outcome.reason)
            .filter((reason): reason is string => reason !== undefined);

        return { score, reasons, ruleOutcomes: outcomes };
    }

    checkEmailRule(email: string): RuleOutcome {
        const rule = { ruleId: 'email', ruleName: 'Email Format and Domain' };

        if (!EMAIL_PATTERN.test(email)) {
            return { ...rule, delta: 40, reason: 'invalid email format' };
        }

        return { ...rule, ...this.emailDomainRisk(email) };
    }

    emailDomainRisk(email: string): { delta: number; reason?: string } {
        const at = email.indexOf('@');
        if (at < 0) {
            return { delta: 40, reason: 'malformed email' };
        }

        const domain = email.slice(at + 1).toLowerCase();

        if (DISPOSABLE_DOMAINS.has(domain)) {
            return { delta: 50, reason: `disposable email domain (${domain})` };
        }
        if (domain.length > LONG_DOMAIN_LENGTH) {
            return { delta: 10, reason: 'suspicious long domain' };
        }

        return { delta: 0, reason: 'common domain' };
    }

    checkPseudoIdentifierRule(userId: number): RuleOutcome {
        const seed = Number.isSafeInteger(userId) ? userId : 0;
        const identifier = synthesizePseudoIdentifier(seed);
        const odd = lastDigitOf(identifier) % 2 === 1;

        return {
            ruleId: 'pseudo_identifier',
            ruleName: 'Pseudo Identifier Parity',
            delta: odd ? 25 : 0,
            reason: odd
                ? 'pseudo-identifier ends in an odd digit'
                : 'pseudo-identifier has an acceptable pattern'
        };
    }

    checkCategoryRule(category: string): RuleOutcome {
        const key = category.toLowerCase();
        const risk = Object.prototype.hasOwnProperty.call(CATEGORY_RISK, key)
            ? CATEGORY_RISK[key]
            : DEFAULT_CATEGORY_RISK;

        return {
            ruleId: 'category',
            ruleName: 'Product Category Risk',
            delta: risk,
            reason: risk > 0 ? `category: ${category || 'uncategorized'} (risk ${risk})` : undefined
        };
    }

    checkPriceRule(price: number): RuleOutcome {
        const rule = { ruleId: 'price', ruleName: 'Product Price Risk' };
        const value = Number.isFinite(price) ? price : 0;

        if (value >= 500) {
            return { ...rule, delta: 35, reason: 'very high price' };
        }
        if (value >= 100) {
            return { ...rule, delta: 20, reason: 'elevated price' };
        }
        if (value >= 50) {
            return { ...rule, delta: 10, reason: 'moderate price' };
        }

        return { ...rule, delta: 0 };
    }

    checkNameShapeRule(name: string): RuleOutcome {
        const unusual = UNUSUAL_NAME_CHARACTER.test(name);

        return {
            ruleId: 'name_shape',
            ruleName: 'User Name Characters',
            delta: unusual ? 8 : 0,
            reason: unusual ? 'user name contains unusual characters' : undefined
        };
    }

    checkNameEmailLocalityRule(name: string, email: string): RuleOutcome {
        const rule = { ruleId: 'name_email_locality', ruleName: 'Name and Email Locality' };

        if (!email.includes('@')) {
            return { ...rule, delta: 0 };
        }

        const local = email.split('@')[0].split('.')[0].toLowerCase();
        const normalizedName = name.replace(/\./g, ' ').toLowerCase();

        if (normalizedName.includes(local)) {
            return { ...rule, delta: 0 };
        }

        return { ...rule, delta: 5, reason: 'name does not match email local part' };
    }
}
