import { RemoteClient } from '../clients';
import { Logger, StorageError, TransientRemoteError, describeError } from '../utils';
import { EndpointKey, endpointKeyId } from './endpointKey';
import { isConnectionError } from './failureClassifier';

/**
 * Connection health states
 */
export type ConnectionHealth = 'healthy' | 'degraded' | 'disconnected' | 'failed';

export interface RunOptions {
    /**
     * Race the operation against the operation timeout (default true).
     * Data transfers turn this off and rely on the transport's idle timeout instead.
     */
    timeout?: boolean;
}

/**
 * Authenticated handle to one endpoint, shared by every storage object for that endpoint.
 *
 * The Session object itself is stable for the lifetime of the pool. The transport connection
 * inside it is re-established on the next operation after it drops, using the same credentials.
 * Operations are serialized because basic-ftp only supports one command at a time.
 */
export class Session {
    private client: RemoteClient | null = null;
    private health: ConnectionHealth = 'disconnected';
    private closed = false;
    private connectCount = 0;

    // Mutex for serializing remote operations
    private operationMutex: Promise<void> = Promise.resolve();

    constructor(
        public readonly key: EndpointKey,
        private readonly createConnection: () => RemoteClient,
        private readonly operationTimeout: number
    ) {}

    /**
     * Perform the initial handshake and authentication
     */
    public async open(): Promise<void> {
        const releaseLock = await this.acquireOperationLock();
        try {
            await this.connect();
        } finally {
            releaseLock();
        }
    }

    /**
     * Run one remote operation on the connected client.
     * A connection failure or timeout drops the connection so the next operation reconnects.
     */
    public async run<T>(
        operationName: string,
        operation: (client: RemoteClient) => Promise<T>,
        options: RunOptions = {}
    ): Promise<T> {
        const releaseLock = await this.acquireOperationLock();

        try {
            const client = await this.getConnection();

            try {
                const pending = operation(client);
                return options.timeout === false
                    ? await pending
                    : await this.withTimeout(pending, this.operationTimeout, operationName);
            } catch (error) {
                if (error instanceof TransientRemoteError || isConnectionError(error)) {
                    Logger.debug(`${operationName} lost the connection to ${endpointKeyId(this.key)}: ${describeError(error)}`);
                    this.health = 'degraded';
                    await this.dropConnection();
                }
                throw error;
            }
        } finally {
            // Always release the lock
            releaseLock();
        }
    }

    /**
     * Get current health status
     */
    public getHealth(): ConnectionHealth {
        return this.health;
    }

    /**
     * Number of successful handshakes, including reconnects
     */
    public getConnectCount(): number {
        return this.connectCount;
    }

    public isConnected(): boolean {
        return this.client !== null && this.client.isConnected();
    }

    /**
     * Close the transport connection; the session cannot be used afterwards
     */
    public async close(): Promise<void> {
        const releaseLock = await this.acquireOperationLock();
        try {
            this.closed = true;
            await this.dropConnection();
            this.health = 'disconnected';
        } finally {
            releaseLock();
        }
    }

    /**
     * Acquire the operation mutex - ensures only one remote operation runs at a time
     */
    private async acquireOperationLock(): Promise<() => void> {
        let releaseLock: () => void = () => undefined;

        const waitForTurn = new Promise<void>(resolve => {
            releaseLock = resolve;
        });

        // Chain onto the existing mutex
        const previousMutex = this.operationMutex;
        this.operationMutex = previousMutex.then(() => waitForTurn);

        await previousMutex;

        return releaseLock;
    }

    private async getConnection(): Promise<RemoteClient> {
        if (this.closed) {
            throw new StorageError(`Session for ${endpointKeyId(this.key)} has been closed`);
        }

        if (this.client && this.client.isConnected()) {
            return this.client;
        }

        Logger.debug(`Reconnecting to ${endpointKeyId(this.key)}...`);
        return this.connect();
    }

    private async connect(): Promise<RemoteClient> {
        await this.dropConnection();

        const client = this.createConnection();
        try {
            await this.withTimeout(client.connect(), this.operationTimeout, 'Connection');
        } catch (error) {
            this.health = 'failed';
            await this.disconnectQuietly(client);
            throw error;
        }

        this.client = client;
        this.health = 'healthy';
        this.connectCount++;
        return client;
    }

    private async dropConnection(): Promise<void> {
        const client = this.client;
        this.client = null;
        if (client) {
            await this.disconnectQuietly(client);
        }
    }

    private async disconnectQuietly(client: RemoteClient): Promise<void> {
        try {
            await client.disconnect();
        } catch (error) {
            Logger.debug(`Error while disconnecting from ${endpointKeyId(this.key)}: ${describeError(error)}`);
        }
    }

    /**
     * Wrap a promise with timeout
     */
    private async withTimeout<T>(promise: Promise<T>, ms: number, operationName: string): Promise<T> {
        let timeoutId: NodeJS.Timeout | undefined;

        const timeoutPromise = new Promise<never>((_, reject) => {
            timeoutId = setTimeout(() => {
                reject(new TransientRemoteError(`${operationName} timed out after ${ms}ms`));
            }, ms);
        });

        try {
            return await Promise.race([promise, timeoutPromise]);
        } finally {
            clearTimeout(timeoutId);
        }
    }
}
