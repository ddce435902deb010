import * as ftp from 'basic-ftp';
import * as fs from 'fs';
import * as path from 'path';
import {
    ConfigurationError,
    LocalResourceError,
    Logger,
    describeError,
    getFilename,
    getParentDir,
    joinRemotePath,
    normalizeRemotePath
} from '../utils';
import { ClientConfig, RemoteClient, RemoteFileInfo } from './remoteClient';

const FILE_UNAVAILABLE = 550;
const FILE_BUSY = 450;

// errno codes of the local filesystem, as opposed to socket failures
const LOCAL_FS_ERROR_CODES = [
    'EACCES',
    'EPERM',
    'ENOENT',
    'ENOTDIR',
    'EISDIR',
    'ENOSPC',
    'EDQUOT',
    'EROFS',
    'EMFILE',
    'ENFILE',
    'EEXIST',
    'EBUSY'
];

/**
 * Replies meaning the path is not there. Some servers (ProFTPD) answer a
 * listing of a missing directory with 450 instead of 550.
 */
function isMissingPathReply(error: unknown): boolean {
    if (!(error instanceof ftp.FTPError)) {
        return false;
    }
    return error.code === FILE_UNAVAILABLE
        || (error.code === FILE_BUSY && /no such file|not found|does not exist/i.test(error.message));
}

function isLocalFsError(error: unknown): boolean {
    if (typeof error !== 'object' || error === null || !('code' in error)) {
        return false;
    }
    return typeof error.code === 'string' && LOCAL_FS_ERROR_CODES.includes(error.code);
}

function toFileInfo(item: ftp.FileInfo, parentPath: string): RemoteFileInfo {
    return {
        name: item.name,
        path: joinRemotePath(parentPath, item.name),
        type: item.isDirectory ? 'directory' : item.isSymbolicLink ? 'link' : 'file',
        size: item.size,
        modifiedTime: item.modifiedAt,
        linkTarget: item.isSymbolicLink && item.link ? item.link : undefined
    };
}

/**
 * FTP/FTPS client implementation using basic-ftp.
 * basic-ftp runs one command at a time; callers serialize access (see Session).
 */
export class FtpClient extends RemoteClient {
    private client: ftp.Client;

    constructor(config: ClientConfig) {
        super(config);
        this.client = new ftp.Client(this.config.timeout);

        if (this.config.debug) {
            this.client.ftp.verbose = true;
            this.client.ftp.log = (message: string) => Logger.debug(`FTP: ${message}`);
        }
    }

    async connect(): Promise<void> {
        if (this.config.activeMode) {
            throw new ConfigurationError(
                'Active mode is not supported by the FTP transport; disable activeMode to use passive transfers'
            );
        }

        try {
            Logger.info(`Connecting to ${this.getEndpointLabel()}...`);

            await this.client.access({
                host: this.config.host,
                port: this.config.port,
                user: this.config.username,
                password: this.config.password,
                secure: this.config.protocol === 'ftps',
                secureOptions: { rejectUnauthorized: this.config.rejectUnauthorized }
            });

            this.connected = true;
            Logger.success(`Connected to ${this.getEndpointLabel()}`);
        } catch (error) {
            this.connected = false;
            this.client.close();
            Logger.error(`Failed to connect to ${this.getEndpointLabel()}: ${describeError(error)}`);
            throw error;
        }
    }

    async disconnect(): Promise<void> {
        this.client.close();
        this.connected = false;
        Logger.info(`Disconnected from ${this.getEndpointLabel()}`);
    }

    isConnected(): boolean {
        return this.connected && !this.client.closed;
    }

    async listDirectory(remotePath: string): Promise<RemoteFileInfo[]> {
        const normalizedRemotePath = normalizeRemotePath(remotePath);
        const list = await this.client.list(normalizedRemotePath);
        return list
            .filter(item => item.name !== '.' && item.name !== '..')
            .map(item => toFileInfo(item, normalizedRemotePath));
    }

    async getFileInfo(remotePath: string): Promise<RemoteFileInfo | null> {
        const normalizedRemotePath = normalizeRemotePath(remotePath);

        if (normalizedRemotePath === '/') {
            return { name: '', path: '/', type: 'directory', size: 0 };
        }

        const parentDir = getParentDir(normalizedRemotePath);
        const fileName = getFilename(normalizedRemotePath);

        let list: ftp.FileInfo[];
        try {
            list = await this.client.list(parentDir);
        } catch (error) {
            // Parent directory does not exist
            if (isMissingPathReply(error)) {
                return null;
            }
            throw error;
        }

        const file = list.find(f => f.name === fileName);
        return file ? toFileInfo(file, parentDir) : null;
    }

    async getSize(remotePath: string): Promise<number> {
        return this.client.size(normalizeRemotePath(remotePath));
    }

    async getModifiedTime(remotePath: string): Promise<Date> {
        return this.client.lastMod(normalizeRemotePath(remotePath));
    }

    async downloadFile(remotePath: string, localPath: string): Promise<void> {
        const normalizedRemotePath = normalizeRemotePath(remotePath);
        const tempPath = `${localPath}.part`;

        try {
            await fs.promises.mkdir(path.dirname(localPath), { recursive: true });
        } catch (error) {
            throw new LocalResourceError(localPath, `Cannot create local directory for ${localPath}`, { cause: error });
        }

        Logger.debug(`Downloading ${normalizedRemotePath} to ${localPath}`);
        try {
            await this.client.downloadTo(tempPath, normalizedRemotePath);
        } catch (error) {
            await fs.promises.rm(tempPath, { force: true }).catch(rmError => {
                Logger.warn(`Could not remove partial download ${tempPath}: ${describeError(rmError)}`);
            });
            if (isLocalFsError(error)) {
                throw new LocalResourceError(localPath, `Cannot write download to ${tempPath}: ${describeError(error)}`, { cause: error });
            }
            throw error;
        }

        try {
            await fs.promises.rename(tempPath, localPath);
        } catch (error) {
            throw new LocalResourceError(localPath, `Cannot move download into place at ${localPath}`, { cause: error });
        }
    }

    async uploadFile(localPath: string, remotePath: string): Promise<void> {
        const normalizedRemotePath = normalizeRemotePath(remotePath);
        Logger.debug(`Uploading ${localPath} to ${normalizedRemotePath}`);
        try {
            await this.client.uploadFrom(localPath, normalizedRemotePath);
        } catch (error) {
            if (isLocalFsError(error)) {
                throw new LocalResourceError(localPath, `Cannot read ${localPath} for upload: ${describeError(error)}`, { cause: error });
            }
            throw error;
        }
    }

    async ensureDirectory(remotePath: string): Promise<void> {
        const normalizedRemotePath = normalizeRemotePath(remotePath);
        // Changes the working directory as a side effect; all paths used here are absolute
        await this.client.ensureDir(normalizedRemotePath);
    }

    async deleteFile(remotePath: string): Promise<void> {
        const normalizedRemotePath = normalizeRemotePath(remotePath);
        Logger.debug(`Deleting remote file: ${normalizedRemotePath}`);
        await this.client.remove(normalizedRemotePath);
    }

    async deleteEmptyDirectory(remotePath: string): Promise<void> {
        const normalizedRemotePath = normalizeRemotePath(remotePath);
        Logger.debug(`Deleting remote directory: ${normalizedRemotePath}`);
        await this.client.removeEmptyDir(normalizedRemotePath);
    }
}
