import Joi from 'joi';

export interface FetchConfig {
    retries: number;
    timeoutMs: number;
    retryDelayMs: number;
}

export interface AppConfig {
    port: number;
    nodeEnv: string;
    resultDir: string;
    usersApiUrl: string;
    productsApiUrl: string;
    riskThreshold: number;
    fetch: FetchConfig;
}

export const DEFAULT_RISK_THRESHOLD = 70;

export const DEFAULT_FETCH_CONFIG: FetchConfig = {
    retries: 3,
    timeoutMs: 5000,
    retryDelayMs: 1000
};

export class ConfigError extends Error {
    statusCode = 500;
    status = 'error';
    isOperational = false;

    constructor(message: string, public readonly problems: string[]) {
        super(message);
        this.name = 'ConfigError';
    }
}

interface RawEnv {
    PORT: number;
    NODE_ENV: string;
    RESULT_DIR: string;
    USERS_API_URL: string;
    PRODUCTS_API_URL: string;
    RISK_THRESHOLD: number;
    FETCH_RETRIES: number;
    FETCH_TIMEOUT_MS: number;
    FETCH_RETRY_DELAY_MS: number;
}

const envSchema = Joi.object<RawEnv>({
    PORT: Joi.number().integer().min(0).max(65535).default(3000),
    NODE_ENV: Joi.string().default('development'),
    RESULT_DIR: Joi.string().default('results'),
    USERS_API_URL: Joi.string().uri({ scheme: ['http', 'https'] }).default('https://jsonplaceholder.typicode.com/users'),
    PRODUCTS_API_URL: Joi.string().uri({ scheme: ['http', 'https'] }).default('https://fakestoreapi.com/products'),
    RISK_THRESHOLD: Joi.number().integer().min(0).max(100).default(DEFAULT_RISK_THRESHOLD),
    FETCH_RETRIES: Joi.number().integer().min(1).default(DEFAULT_FETCH_CONFIG.retries),
    FETCH_TIMEOUT_MS: Joi.number().integer().min(1).default(DEFAULT_FETCH_CONFIG.timeoutMs),
    FETCH_RETRY_DELAY_MS: Joi.number().integer().min(0).default(DEFAULT_FETCH_CONFIG.retryDelayMs)
}).unknown(true);

const stripTrailingSlash = (url: string): string => url.replace(/\/+$/, '');

/**
 * Builds the runtime configuration from environment variables.
 * Every invalid variable is reported at once through a ConfigError.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
    const result = envSchema.validate(env, { abortEarly: false, convert: true });

    if (result.error !== undefined) {
        const problems = result.error.details.map(detail => detail.message);
        throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`, problems);
    }

    const value = result.value;

    return {
        port: value.PORT,
        nodeEnv: value.NODE_ENV,
        resultDir: value.RESULT_DIR,
        usersApiUrl: stripTrailingSlash(value.USERS_API_URL),
        productsApiUrl: stripTrailingSlash(value.PRODUCTS_API_URL),
        riskThreshold: value.RISK_THRESHOLD,
        fetch: {
            retries: value.FETCH_RETRIES,
            timeoutMs: value.FETCH_TIMEOUT_MS,
            retryDelayMs: value.FETCH_RETRY_DELAY_MS
        }
    };
};
