import { FetcherService } from '../../src/services/fetcherService';
import { json, stubClient } from '../helpers/stubClient';

const URL = 'http://users.test/users/1';
const fastRetries = { retries: 3, timeoutMs: 50, retryDelayMs: 0 };

describe('FetcherService', () => {
    it('returns the decoded object on the first attempt', async () => {
        const { client, calls } = stubClient(() => json({ id: 1, name: 'Clara' }));
        const fetcher = new FetcherService(fastRetries, client);

        const outcome = await fetcher.fetch(URL);

        expect(outcome).toEqual({ found: true, data: { id: 1, name: 'Clara' }, attempts: 1, failures: [] });
        expect(calls).toEqual([URL]);
    });

    it('retries timeouts and succeeds on a later attempt', async () => {
        const { client, calls } = stubClient((url, call) => call < 3 ? { error: 'timeout' } : json({ id: 1 }));
        const fetcher = new FetcherService(fastRetries, client);

        const outcome = await fetcher.fetch(URL);

        expect(outcome.found).toBe(true);
        expect(outcome.attempts).toBe(3);
        expect(outcome.failures.map(failure => [failure.attempt, failure.kind])).toEqual([[1, 'timeout'], [2, 'timeout']]);
        expect(calls).toHaveLength(3);
    });

    it('reports absence after timing out on every attempt', async () => {
        const { client, calls } = stubClient(() => ({ error: 'timeout' }));
        const fetcher = new FetcherService(fastRetries, client);

        const outcome = await fetcher.fetch(URL);

        expect(outcome.found).toBe(false);
        expect(outcome.attempts).toBe(3);
        expect(outcome.failures).toHaveLength(3);
        expect(outcome.failures[2]).toEqual({ attempt: 3, kind: 'timeout', message: 'timeout of 50ms exceeded' });
        expect(calls).toHaveLength(3);
    });

    it('treats ETIMEDOUT as a timeout', async () => {
        const { client, calls } = stubClient(() => ({ error: 'etimedout' }));
        const fetcher = new FetcherService({ ...fastRetries, retries: 2 }, client);

        const outcome = await fetcher.fetch(URL);

        expect(outcome.found).toBe(false);
        expect(calls).toHaveLength(2);
    });

    it('honors a configured retry count', async () => {
        const { client, calls } = stubClient(() => ({ error: 'timeout' }));
        const fetcher = new FetcherService({ ...fastRetries, retries: 5 }, client);

        await fetcher.fetch(URL);

        expect(calls).toHaveLength(5);
    });

    it('waits between timed-out attempts', async () => {
        const { client } = stubClient(() => ({ error: 'timeout' }));
        const fetcher = new FetcherService({ retries: 3, timeoutMs: 50, retryDelayMs: 40 }, client);

        const started = Date.now();
        await fetcher.fetch(URL);
        const elapsed = Date.now() - started;

        expect(elapsed).toBeGreaterThanOrEqual(75);
    });

    it('stops at once on a non-2xx status', async () => {
        const { client, calls } = stubClient(() => json({}, 404));
        const fetcher = new FetcherService(fastRetries, client);

        const outcome = await fetcher.fetch(URL);

        expect(outcome).toEqual({
            found: false,
            attempts: 1,
            failures: [{ attempt: 1, kind: 'http_status', status: 404, message: 'Request failed with status code 404' }]
        });
        expect(calls).toHaveLength(1);
    });

    it('stops at once when the connection is refused', async () => {
        const { client, calls } = stubClient(() => ({ error: 'refused' }));
        const fetcher = new FetcherService(fastRetries, client);

        const outcome = await fetcher.fetch(URL);

        expect(outcome.found).toBe(false);
        expect(outcome.failures).toEqual([{ attempt: 1, kind: 'network', message: 'connect ECONNREFUSED 127.0.0.1:80' }]);
        expect(calls).toHaveLength(1);
    });

    it.each([
        ['an empty body', ''],
        ['invalid JSON', '{"id": 1'],
        ['a JSON array', '[1, 2]'],
        ['JSON null', 'null']
    ])('treats %s as malformed without retrying', async (_label, body) => {
        const { client, calls } = stubClient(() => ({ status: 200, body }));
        const fetcher = new FetcherService(fastRetries, client);

        const outcome = await fetcher.fetch(URL);

        expect(outcome.found).toBe(false);
        expect(outcome.failures).toEqual([
            { attempt: 1, kind: 'malformed', status: 200, message: 'Response body is not a JSON object' }
        ]);
        expect(calls).toHaveLength(1);
    });
});
