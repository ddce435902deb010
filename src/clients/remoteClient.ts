import { Credentials, Protocol, TransferModeConfig } from '../types';

/**
 * Everything a client needs to open one authenticated session
 */
export interface ClientConfig extends Credentials, TransferModeConfig {
    host: string;
    port: number;
    protocol: Protocol;
}

/**
 * File info from remote server
 */
export interface RemoteFileInfo {
    name: string;
    path: string;
    type: 'file' | 'directory' | 'link';
    size: number;
    modifiedTime?: Date;
    /** Target of a link as the server lists it, when the server reports it */
    linkTarget?: string;
}

/**
 * Abstract base class for remote clients.
 * Paths are absolute POSIX paths; implementations never swallow transport errors.
 */
export abstract class RemoteClient {
    protected config: ClientConfig;
    protected connected = false;

    constructor(config: ClientConfig) {
        this.config = config;
    }

    /**
     * Connect and authenticate
     */
    abstract connect(): Promise<void>;

    abstract disconnect(): Promise<void>;

    isConnected(): boolean {
        return this.connected;
    }

    /**
     * List the entries of a remote directory, without `.` and `..`
     */
    abstract listDirectory(remotePath: string): Promise<RemoteFileInfo[]>;

    /**
     * Info for a remote path, or null when nothing exists there
     */
    abstract getFileInfo(remotePath: string): Promise<RemoteFileInfo | null>;

    /**
     * Byte size of a remote file
     */
    abstract getSize(remotePath: string): Promise<number>;

    /**
     * Modification time of a remote file
     */
    abstract getModifiedTime(remotePath: string): Promise<Date>;

    /**
     * Download a remote file. The local file appears under its final name only once complete.
     */
    abstract downloadFile(remotePath: string, localPath: string): Promise<void>;

    abstract uploadFile(localPath: string, remotePath: string): Promise<void>;

    /**
     * Create a directory and all missing parents; existing directories are fine
     */
    abstract ensureDirectory(remotePath: string): Promise<void>;

    abstract deleteFile(remotePath: string): Promise<void>;

    abstract deleteEmptyDirectory(remotePath: string): Promise<void>;

    getEndpointLabel(): string {
        return `${this.config.protocol}://${this.config.host}:${this.config.port}`;
    }
}
