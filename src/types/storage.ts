/**
 * Storage object capability contracts
 */

export type StorageCapability = 'read' | 'write' | 'glob';

/**
 * Result of a file or tree transfer
 */
export interface TransferResult {
    localPath: string;
    remotePath: string;
    /** Files copied */
    files: number;
    /** Directories created on the receiving side */
    directories: number;
}

export interface StorageObject {
    readonly query: string;
    supports(capability: StorageCapability): boolean;
    /** Location of the staging copy relative to the host's local prefix */
    localSuffix(): string;
    /** Absolute staging path of this object */
    localPath(): string;
    /** Remove local remainders other than localPath() */
    cleanup(): Promise<void>;
}

export interface StorageObjectRead extends StorageObject {
    exists(): Promise<boolean>;
    /** Modification time in seconds since the epoch */
    mtime(): Promise<number>;
    size(): Promise<number>;
    retrieveObject(): Promise<TransferResult>;
}

export interface StorageObjectWrite extends StorageObject {
    storeObject(): Promise<TransferResult>;
    removeObject(): Promise<void>;
}

export interface StorageObjectGlob extends StorageObject {
    /** Concrete queries without wildcards, for the host's wildcard matching */
    listCandidateMatches(): Promise<string[]>;
}

export function isReadable(object: StorageObject): object is StorageObjectRead {
    return object.supports('read');
}

export function isWritable(object: StorageObject): object is StorageObjectWrite {
    return object.supports('write');
}

export function isGlobbable(object: StorageObject): object is StorageObjectGlob {
    return object.supports('glob');
}
