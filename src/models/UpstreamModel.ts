import Joi from 'joi';
import { FetcherService, FetchOutcome, JsonObject } from '../services/fetcherService';

export interface LookupResult<T> {
    url: string;
    record: T | null;
    outcome: FetchOutcome;
    /** Set when the body was fetched but could not be read as a record. */
    invalid?: string;
}

/**
 * Read-only access to one collection of an upstream JSON service
 * (`GET {baseUrl}/{id}`). Subclasses supply the schema that turns the decoded
 * body into a record.
 */
export abstract class UpstreamModel<TRaw, TRecord> {
    protected abstract readonly schema: Joi.ObjectSchema<TRaw>;

    constructor(
        protected readonly fetcher: FetcherService,
        protected readonly baseUrl: string
    ) {}

    urlFor(id: number): string {
        return `${this.baseUrl}/${id}`;
    }

    async findById(id: number): Promise<LookupResult<TRecord>> {
        const url = this.urlFor(id);
        const outcome = await this.fetcher.fetch(url);

        if (!outcome.found) {
            return { url, record: null, outcome };
        }

        const parsed = this.parse(outcome.data);
        if (!parsed.ok) {
            return { url, record: null, outcome, invalid: parsed.message };
        }

        return { url, record: parsed.record, outcome };
    }

    parse(data: JsonObject): { ok: true; record: TRecord } | { ok: false; message: string } {
        const result = this.schema.validate(data, { stripUnknown: true, convert: true });

        if (result.error !== undefined) {
            return { ok: false, message: result.error.message };
        }

        return { ok: true, record: this.toRecord(result.value) };
    }

    protected abstract toRecord(raw: TRaw): TRecord;
}

export const upstreamId = Joi.number().integer().positive().required();

/** Text field that never rejects the record: bad or missing values become "". */
export const lenientText = () => Joi.string().allow('').default('').failover('');
