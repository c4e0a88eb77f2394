import { promises as fs } from 'fs';
import Joi from 'joi';
import path from 'path';
import { PersistedResult, ProductRecord, RiskAssessment, UserRecord } from '../types/integration';

export interface ResultStore {
    save(user: UserRecord, product: ProductRecord, assessment: RiskAssessment): Promise<string>;
    find(userId: number, productId: number): Promise<PersistedResult | null>;
}

/** A stored result file that cannot be read back as a persisted result. */
export class StoredResultError extends Error {
    statusCode = 500;
    status = 'error';
    isOperational = true;

    constructor(readonly location: string, detail: string) {
        super(`Stored result ${path.basename(location)} is unreadable: ${detail}`);
        this.name = 'StoredResultError';
    }
}

const persistedResultSchema = Joi.object<PersistedResult>({
    timestamp: Joi.string().required(),
    user: Joi.object({
        id: Joi.number().integer().positive().required(),
        name: Joi.string().allow('').required(),
        email: Joi.string().allow('').required(),
        city: Joi.string().allow('').required()
    }).required(),
    product: Joi.object({
        id: Joi.number().integer().positive().required(),
        title: Joi.string().allow('').required(),
        price: Joi.number().unsafe().min(0).required(),
        category: Joi.string().allow('').required()
    }).required(),
    antifraud: Joi.object({
        score: Joi.number().integer().min(0).max(100).required(),
        blocked: Joi.boolean().required(),
        reasons: Joi.array().items(Joi.string()).required()
    }).required()
});

const pad = (value: number): string => String(value).padStart(2, '0');

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export const formatTimestamp = (date: Date): string =>
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const resultFileName = (userId: number, productId: number): string =>
    `result_user${userId}_product${productId}.json`;

export const toPersistedResult = (
    user: UserRecord,
    product: ProductRecord,
    assessment: RiskAssessment,
    at: Date
): PersistedResult => ({
    timestamp: formatTimestamp(at),
    user: {
        id: user.id,
        name: user.name,
        email: user.email,
        city: user.city
    },
    product: {
        id: product.id,
        title: product.title,
        price: product.price,
        category: product.category
    },
    antifraud: {
        score: assessment.score,
        blocked: assessment.blocked,
        reasons: [...assessment.reasons]
    }
});

/** One pretty-printed JSON file per (user, product) pair; re-evaluations overwrite. */
export class FileResultStore implements ResultStore {
    constructor(
        private readonly directory: string,
        private readonly now: () => Date = () => new Date()
    ) {}

    pathFor(userId: number, productId: number): string {
        return path.join(this.directory, resultFileName(userId, productId));
    }

    async save(user: UserRecord, product: ProductRecord, assessment: RiskAssessment): Promise<string> {
        const location = this.pathFor(user.id, product.id);
        const data = toPersistedResult(user, product, assessment, this.now());

        await fs.mkdir(this.directory, { recursive: true });
        await fs.writeFile(location, `${JSON.stringify(data, null, 4)}\n`, 'utf-8');

        return location;
    }

    async find(userId: number, productId: number): Promise<PersistedResult | null> {
        const location = this.pathFor(userId, productId);
        let content: string;

        try {
            content = await fs.readFile(location, 'utf-8');
        } catch (error) {
            if (isErrnoException(error) && error.code === 'ENOENT') {
                return null;
            }
            throw error;
        }

        let data: unknown;
        try {
            data = JSON.parse(content);
        } catch (error) {
            throw new StoredResultError(location, error instanceof Error ? error.message : String(error));
        }

        const result = persistedResultSchema.validate(data, { convert: false });
        if (result.error !== undefined) {
            throw new StoredResultError(location, result.error.message);
        }

        return result.value;
    }
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
    error instanceof Error && 'code' in error;
