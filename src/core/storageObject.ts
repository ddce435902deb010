import * as fs from 'fs';
import * as path from 'path';
import { RemoteFileInfo } from '../clients';
import {
    Credentials,
    StorageCapability,
    StorageObjectGlob,
    StorageObjectRead,
    StorageObjectWrite,
    TransferModeConfig,
    TransferResult
} from '../types';
import {
    LocalResourceError,
    Logger,
    PermanentRemoteError,
    QueryValidationError,
    RemoteOperationError,
    getParentDir,
    localToRemotePath,
    normalizeRemotePath,
    remoteToLocalPath,
    removeLeadingSlash
} from '../utils';
import { ConnectionPool } from './connectionPool';
import { classifyFailure, toPermanentError } from './failureClassifier';
import { listCandidatePaths } from './globCandidates';
import { ParsedQuery, requireParsedQuery } from './queryParser';
import { RetryWrapper } from './retry';
import { RunOptions, Session } from './session';
import {
    RemoteTree,
    WalkOptions,
    planRemoval,
    resolveLink,
    sumFileSizes,
    walkLocalTree,
    walkRemoteTree
} from './treeWalker';

/**
 * What a storage object borrows from its provider
 */
export interface StorageObjectContext {
    pool: ConnectionPool;
    retry: RetryWrapper;
    credentials: Credentials;
    transfer: TransferModeConfig;
}

// Transfers may run longer than the operation timeout; basic-ftp aborts them when the socket goes idle
const TRANSFER: RunOptions = { timeout: false };

const FOLLOW_LINKS: WalkOptions = { followLinks: true };

const CAPABILITIES: ReadonlySet<StorageCapability> = new Set<StorageCapability>(['read', 'write', 'glob']);

/**
 * A single file or directory on an FTP/FTPS server, staged locally below localPrefix
 */
export class FtpStorageObject implements StorageObjectRead, StorageObjectWrite, StorageObjectGlob {
    public readonly parsedQuery: ParsedQuery;
    public readonly remotePath: string;

    constructor(
        public readonly query: string,
        private readonly localPrefix: string,
        private readonly context: StorageObjectContext
    ) {
        this.parsedQuery = requireParsedQuery(query);
        if (!this.parsedQuery.key.hostname) {
            throw new QueryValidationError(query, 'Query does not contain a host name');
        }
        this.remotePath = normalizeRemotePath(this.parsedQuery.path);
    }

    public supports(capability: StorageCapability): boolean {
        return CAPABILITIES.has(capability);
    }

    public localSuffix(): string {
        return `${this.parsedQuery.netloc}/${removeLeadingSlash(this.remotePath)}`;
    }

    public localPath(): string {
        return path.join(this.localPrefix, ...this.localSuffix().split('/'));
    }

    public async cleanup(): Promise<void> {
        // Nothing is staged besides localPath(), which the host removes
    }

    public async exists(): Promise<boolean> {
        return this.remote('exists', async session => {
            return (await this.tree(session).getFileInfo(this.remotePath)) !== null;
        });
    }

    public async mtime(): Promise<number> {
        return this.remote('mtime', async session => {
            const { info } = await this.requireTarget(session);

            if (info.type !== 'directory') {
                try {
                    const modified = await session.run('MDTM', client => client.getModifiedTime(info.path));
                    return modified.getTime() / 1000;
                } catch (error) {
                    // Servers without MDTM: fall back to the listing timestamp
                    if (classifyFailure(error) === 'transient' || !info.modifiedTime) {
                        throw error;
                    }
                }
            }

            if (!info.modifiedTime) {
                throw new PermanentRemoteError('unsupported', `Server reports no modification time for ${info.path}`);
            }
            return info.modifiedTime.getTime() / 1000;
        });
    }

    /**
     * Byte size of a file; for a directory, the total size of all files below it
     */
    public async size(): Promise<number> {
        return this.remote('size', async session => {
            const { info, realPath } = await this.requireTarget(session);
            if (info.type === 'directory') {
                return sumFileSizes(this.tree(session), info, { ...FOLLOW_LINKS, rootRealPath: realPath });
            }
            return session.run('SIZE', client => client.getSize(info.path));
        });
    }

    /**
     * Mirror the remote file or tree at localPath. Links to directories are mirrored as directories.
     */
    public async retrieveObject(): Promise<TransferResult> {
        const localPath = this.localPath();

        return this.remote('retrieve', async session => {
            const { info, realPath } = await this.requireTarget(session);
            const result: TransferResult = { localPath, remotePath: info.path, files: 0, directories: 0 };
            const options: WalkOptions = { ...FOLLOW_LINKS, rootRealPath: realPath };

            for await (const entry of walkRemoteTree(this.tree(session), info, options)) {
                const target = remoteToLocalPath(entry.info.path, info.path, localPath);
                if (entry.info.type === 'directory') {
                    await this.createLocalDirectory(target);
                    result.directories++;
                } else {
                    await session.run('download', client => client.downloadFile(entry.info.path, target), TRANSFER);
                    result.files++;
                }
            }

            Logger.success(`Downloaded ${result.files} files from ${info.path}`);
            return result;
        });
    }

    public async storeObject(): Promise<TransferResult> {
        const localPath = this.localPath();
        const remotePath = this.remotePath;

        return this.remote('store', async session => {
            const entries = await walkLocalTree(localPath);
            const result: TransferResult = { localPath, remotePath, files: 0, directories: 0 };

            for (const entry of entries) {
                const target = localToRemotePath(entry.localPath, localPath, remotePath);

                if (entry.type === 'directory') {
                    await session.run('ensure directory', client => client.ensureDirectory(target));
                    result.directories++;
                    continue;
                }

                const parent = getParentDir(target);
                if (parent !== '/' && parent !== '.') {
                    await session.run('ensure directory', client => client.ensureDirectory(parent));
                }
                await session.run('upload', client => client.uploadFile(entry.localPath, target), TRANSFER);
                result.files++;
            }

            Logger.success(`Uploaded ${result.files} files to ${remotePath}`);
            return result;
        });
    }

    public async removeObject(): Promise<void> {
        await this.remote('remove', async session => {
            const info = await this.requireInfo(session);

            if (info.type !== 'directory') {
                await session.run('delete', client => client.deleteFile(info.path));
                return;
            }

            for (const entry of await planRemoval(this.tree(session), info)) {
                const target = entry.info.path;
                if (entry.info.type === 'directory') {
                    await session.run('remove directory', client => client.deleteEmptyDirectory(target));
                } else {
                    await session.run('delete', client => client.deleteFile(target));
                }
            }
            Logger.success(`Deleted directory: ${info.path}`);
        });
    }

    /**
     * Wildcard-free remote paths below the constant prefix of this query's path
     */
    public async listCandidatePaths(): Promise<string[]> {
        return this.remote('list candidates', session => listCandidatePaths(this.tree(session), this.parsedQuery.path));
    }

    public async listCandidateMatches(): Promise<string[]> {
        const { scheme, netloc } = this.parsedQuery;
        const paths = await this.listCandidatePaths();
        return paths.map(candidate => `${scheme}://${netloc}${candidate}`);
    }

    /**
     * Session lookup happens outside the retry; every operation on it runs inside
     */
    private async remote<T>(operationName: string, operation: (session: Session) => Promise<T>): Promise<T> {
        const session = await this.getSession();
        return this.context.retry.run(`${operationName} ${this.query}`, () => operation(session));
    }

    private async getSession(): Promise<Session> {
        const { pool, credentials, transfer } = this.context;
        try {
            return await pool.getConnection(this.parsedQuery.key, credentials, transfer);
        } catch (error) {
            const operation = `connect ${this.parsedQuery.netloc}`;
            if (classifyFailure(error) === 'transient') {
                throw new RemoteOperationError(operation, 1, error);
            }
            throw toPermanentError(error, operation);
        }
    }

    private tree(session: Session): RemoteTree {
        return {
            getFileInfo: remotePath => session.run('stat', client => client.getFileInfo(remotePath)),
            listDirectory: remotePath => session.run('list', client => client.listDirectory(remotePath))
        };
    }

    private async requireInfo(session: Session): Promise<RemoteFileInfo> {
        const info = await this.tree(session).getFileInfo(this.remotePath);
        if (!info) {
            throw new PermanentRemoteError('not-found', `${this.query} does not exist`);
        }
        return info;
    }

    /**
     * Info for the query's path with a link at that path resolved to its target
     */
    private async requireTarget(session: Session): Promise<{ info: RemoteFileInfo; realPath: string }> {
        const info = await this.requireInfo(session);
        if (info.type !== 'link') {
            return { info, realPath: info.path };
        }

        const resolved = await resolveLink(this.tree(session), info);
        if (!resolved) {
            throw new PermanentRemoteError('not-found', `${this.query} is a link to a missing target`);
        }
        return resolved;
    }

    private async createLocalDirectory(localPath: string): Promise<void> {
        try {
            await fs.promises.mkdir(localPath, { recursive: true });
        } catch (error) {
            throw new LocalResourceError(localPath, `Cannot create local directory ${localPath}`, { cause: error });
        }
    }
}
