import axios, { AxiosInstance } from 'axios';
import { setTimeout as sleep } from 'timers/promises';
import { DEFAULT_FETCH_CONFIG, FetchConfig } from '../config';

export type FetchFailureKind = 'timeout' | 'http_status' | 'network' | 'malformed';

export interface FetchFailure {
    attempt: number;
    kind: FetchFailureKind;
    message: string;
    status?: number;
}

export type JsonObject = { [key: string]: unknown };

export type FetchOutcome =
    | { found: true; data: JsonObject; attempts: number; failures: FetchFailure[] }
    | { found: false; attempts: number; failures: FetchFailure[] };

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

const isJsonObject = (value: unknown): value is JsonObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Reads a single JSON resource over HTTP.
 *
 * Timeouts are retried after `retryDelayMs`, up to `retries` attempts in total.
 * Every other failure ends the read at once. The service never throws for
 * network problems and never logs: failures are returned in the outcome so the
 * caller decides how to audit them.
 */
export class FetcherService {
    private readonly client: AxiosInstance;
    private readonly config: FetchConfig;

    constructor(config: Partial<FetchConfig> = {}, client: AxiosInstance = axios.create()) {
        this.config = { ...DEFAULT_FETCH_CONFIG, ...config };
        this.client = client;
    }

    async fetch(url: string): Promise<FetchOutcome> {
        const failures: FetchFailure[] = [];
        const { retries, timeoutMs, retryDelayMs } = this.config;

        for (let attempt = 1; attempt <= retries; attempt++) {
            const result = await this.attempt(url, attempt, timeoutMs);

            if (result.ok) {
                return { found: true, data: result.data, attempts: attempt, failures };
            }

            failures.push(result.failure);

            if (result.failure.kind !== 'timeout') {
                return { found: false, attempts: attempt, failures };
            }

            if (attempt < retries && retryDelayMs > 0) {
                await sleep(retryDelayMs);
            }
        }

        return { found: false, attempts: retries, failures };
    }

    private async attempt(
        url: string,
        attempt: number,
        timeoutMs: number
    ): Promise<{ ok: true; data: JsonObject } | { ok: false; failure: FetchFailure }> {
        let status: number;
        let body: unknown;

        try {
            const response = await this.client.get<unknown>(url, {
                timeout: timeoutMs,
                responseType: 'text',
                transformResponse: [(data: unknown) => data],
                validateStatus: () => true,
                headers: {
                    'Accept': 'application/json'
                }
            });
            status = response.status;
            body = response.data;
        } catch (error) {
            if (axios.isAxiosError(error) && error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
                return { ok: false, failure: { attempt, kind: 'timeout', message: error.message } };
            }

            return {
                ok: false,
                failure: {
                    attempt,
                    kind: 'network',
                    message: error instanceof Error ? error.message : String(error)
                }
            };
        }

        if (status < 200 || status >= 300) {
            return {
                ok: false,
                failure: { attempt, kind: 'http_status', status, message: `Request failed with status code ${status}` }
            };
        }

        const data = this.decode(body);
        if (!isJsonObject(data)) {
            return {
                ok: false,
                failure: { attempt, kind: 'malformed', status, message: 'Response body is not a JSON object' }
            };
        }

        return { ok: true, data };
    }

    private decode(body: unknown): unknown {
        if (typeof body !== 'string') {
            return body;
        }

        try {
            return JSON.parse(body);
        } catch {
            return undefined;
        }
    }
}
