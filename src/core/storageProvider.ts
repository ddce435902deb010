import { ClientFactory, createClient } from '../clients';
import {
    FtpStorageSettings,
    mergeWithDefaults,
    toCredentials,
    toTransferModeConfig
} from '../types';
import { ConfigurationError, Logger } from '../utils';
import { ConfigManager } from './configManager';
import { ConnectionPool } from './connectionPool';
import { FailureClassifier, classifyFailure } from './failureClassifier';
import { getNetloc, parseQuery } from './queryParser';
import { RetryWrapper, Wait, sleep } from './retry';
import { FtpStorageObject } from './storageObject';

export type QueryType = 'input' | 'output' | 'any';

export type Operation = 'exists' | 'mtime' | 'size' | 'retrieve' | 'store' | 'remove' | 'glob';

export interface ExampleQuery {
    query: string;
    type: QueryType;
    description: string;
}

export interface QueryValidationResult {
    valid: boolean;
    query: string;
    reason?: string;
}

export interface StorageProviderOptions {
    clientFactory?: ClientFactory;
    classifier?: FailureClassifier;
    /** Clock used between retry attempts */
    wait?: Wait;
}

const DEFAULT_MAX_REQUESTS_PER_SECOND = 10;

/**
 * Entry point for the host: owns the connection pool for its lifetime and
 * creates storage objects that share it.
 */
export class StorageProvider {
    public readonly settings: FtpStorageSettings;
    private readonly pool: ConnectionPool;
    private readonly retry: RetryWrapper;

    constructor(settings: Partial<FtpStorageSettings> = {}, options: StorageProviderOptions = {}) {
        this.settings = mergeWithDefaults(settings);
        if (this.settings.activeMode) {
            throw new ConfigurationError(
                'Active mode is not supported by the FTP transport; disable activeMode to use passive transfers'
            );
        }
        this.pool = new ConnectionPool(options.clientFactory ?? createClient);
        this.retry = new RetryWrapper(options.classifier ?? classifyFailure, options.wait ?? sleep);

        if (this.settings.debug) {
            Logger.setDebugMode(true);
        }
    }

    /**
     * Provider configured from FTP_STORAGE_* environment variables, with explicit values on top
     */
    public static fromEnvironment(
        overrides: Partial<FtpStorageSettings> = {},
        options: StorageProviderOptions = {},
        env: NodeJS.ProcessEnv = process.env
    ): StorageProvider {
        return new StorageProvider(new ConfigManager(env).resolve(overrides), options);
    }

    public static exampleQueries(): ExampleQuery[] {
        return [
            {
                query: 'ftp://ftpserver.com:21/myfile.txt',
                type: 'any',
                description: 'A file on an ftp server. The port is optional and defaults to 21.'
            },
            {
                query: 'ftps://ftpserver.com:21/myfile.txt',
                type: 'any',
                description: 'A file on an ftp server (using encrypted transport). The port is optional and defaults to 21.'
            }
        ];
    }

    /**
     * Queries may still contain wildcards; they are resolved before the object is used
     */
    public static isValidQuery(query: string): QueryValidationResult {
        const result = parseQuery(query);
        return result.valid
            ? { valid: true, query }
            : { valid: false, query, reason: result.reason };
    }

    public useRateLimiter(): boolean {
        return true;
    }

    public defaultMaxRequestsPerSecond(): number {
        return DEFAULT_MAX_REQUESTS_PER_SECOND;
    }

    /**
     * Requests to the same network location share one rate limiter, whatever the operation
     */
    public rateLimiterKey(query: string, _operation: Operation): string {
        return getNetloc(query);
    }

    public createObject(query: string, localPrefix: string): FtpStorageObject {
        return new FtpStorageObject(query, localPrefix, {
            pool: this.pool,
            retry: this.retry,
            credentials: toCredentials(this.settings),
            transfer: toTransferModeConfig(this.settings)
        });
    }

    public getPool(): ConnectionPool {
        return this.pool;
    }

    /**
     * Close all pooled sessions
     */
    public async dispose(): Promise<void> {
        await this.pool.dispose();
    }
}
