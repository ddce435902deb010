import { ClientFactory, createClient } from '../clients';
import { Credentials, TransferModeConfig } from '../types';
import { Logger, describeError } from '../utils';
import { EndpointKey, endpointKeyId } from './endpointKey';
import { Session } from './session';

/**
 * One session per endpoint key, created on first use and reused afterwards.
 *
 * The pending creation is stored before any await, so concurrent first use of a key
 * shares a single handshake. A failed creation is forgotten so a later call can retry it.
 * Sessions are not reaped when idle; dispose() closes them all.
 */
export class ConnectionPool {
    private sessions: Map<string, Promise<Session>> = new Map();

    constructor(private readonly clientFactory: ClientFactory = createClient) {}

    public getConnection(
        key: EndpointKey,
        credentials: Credentials,
        transfer: TransferModeConfig
    ): Promise<Session> {
        const id = endpointKeyId(key);
        const existing = this.sessions.get(id);
        if (existing) {
            return existing;
        }

        Logger.debug(`Creating session for ${id}`);
        const creation = this.createSession(key, credentials, transfer);
        this.sessions.set(id, creation);

        // Callers receive the rejection through the returned promise
        void creation.catch(error => {
            // Only forget the entry if it is still ours
            if (this.sessions.get(id) === creation) {
                this.sessions.delete(id);
            }
            Logger.error(`Could not open session for ${id}: ${describeError(error)}`);
        });

        return creation;
    }

    /**
     * Number of pooled (or opening) sessions
     */
    public get size(): number {
        return this.sessions.size;
    }

    public has(key: EndpointKey): boolean {
        return this.sessions.has(endpointKeyId(key));
    }

    /**
     * Close every pooled session and empty the pool
     */
    public async dispose(): Promise<void> {
        const pending = [...this.sessions.values()];
        this.sessions.clear();

        const results = await Promise.allSettled(pending);
        for (const result of results) {
            if (result.status === 'fulfilled') {
                await result.value.close();
            }
        }
    }

    private async createSession(
        key: EndpointKey,
        credentials: Credentials,
        transfer: TransferModeConfig
    ): Promise<Session> {
        const session = new Session(
            key,
            () => this.clientFactory({
                host: key.hostname,
                port: key.port,
                protocol: key.protocol,
                ...credentials,
                ...transfer
            }),
            transfer.timeout
        );
        await session.open();
        return session;
    }
}
