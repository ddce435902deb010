import { beforeEach, describe, expect, it, jest } from '@jest/globals';
import { RETRY_POLICY, RetryWrapper, retryDelay } from '../../../src/core/retry';
import { PermanentRemoteError, RemoteOperationError, TransientRemoteError } from '../../../src/utils';
import { ftpError } from '../../helpers/memoryServer';

describe('retryDelay', () => {
    it('doubles from the initial delay up to the cap', () => {
        expect([1, 2, 3, 4, 5].map(retryDelay)).toEqual([1000, 2000, 4000, 8000, 10000]);
    });
});

describe('RetryWrapper', () => {
    let waits: number[];
    let retry: RetryWrapper;

    beforeEach(() => {
        waits = [];
        retry = new RetryWrapper(undefined, async ms => {
            waits.push(ms);
        });
    });

    it('returns the first successful result without waiting', async () => {
        const operation = jest.fn(async () => 'done');

        await expect(retry.run('stat', operation)).resolves.toBe('done');
        expect(operation).toHaveBeenCalledTimes(1);
        expect(waits).toEqual([]);
    });

    it('succeeds on the last attempt after transient failures', async () => {
        let calls = 0;
        const result = await retry.run('list', async () => {
            calls++;
            if (calls < RETRY_POLICY.maxAttempts) {
                throw new TransientRemoteError('list timed out after 10ms');
            }
            return calls;
        });

        expect(result).toBe(3);
        expect(waits).toEqual([1000, 2000]);
    });

    it('raises RemoteOperationError once the attempts are used up', async () => {
        const operation = jest.fn(async (): Promise<void> => {
            throw ftpError(421, 'Service not available');
        });

        const error = await retry.run('download ftp://example.org/a', operation).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(RemoteOperationError);
        expect(error).toMatchObject({
            operation: 'download ftp://example.org/a',
            attempts: 3,
            message: 'download ftp://example.org/a failed after 3 attempts: 421 Service not available'
        });
        expect(operation).toHaveBeenCalledTimes(3);
        expect(waits).toEqual([1000, 2000]);
    });

    it('does not retry permanent failures', async () => {
        const operation = jest.fn(async (): Promise<void> => {
            throw ftpError(550, 'No such file');
        });

        const error = await retry.run('size', operation).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(PermanentRemoteError);
        expect(error).toMatchObject({ kind: 'not-found', message: 'size failed: 550 No such file' });
        expect(operation).toHaveBeenCalledTimes(1);
        expect(waits).toEqual([]);
    });

    it('uses the given classifier', async () => {
        const strict = new RetryWrapper(() => 'permanent', async () => undefined);
        const operation = jest.fn(async (): Promise<void> => {
            throw new TransientRemoteError('timed out');
        });

        await expect(strict.run('stat', operation)).rejects.toBeInstanceOf(PermanentRemoteError);
        expect(operation).toHaveBeenCalledTimes(1);
    });
});
