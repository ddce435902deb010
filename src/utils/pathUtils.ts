import * as path from 'path';

/**
 * Normalize path separators to forward slashes
 */
export function normalizePath(filePath: string): string {
    return filePath.replace(/\\/g, '/');
}

/**
 * Normalize a remote path: forward slashes, no repeated or trailing separators
 */
export function normalizeRemotePath(remotePath: string): string {
    const normalized = path.posix.normalize(normalizePath(remotePath));
    if (normalized.length > 1 && normalized.endsWith('/')) {
        return normalized.slice(0, -1);
    }
    return normalized;
}

/**
 * Join remote path segments
 */
export function joinRemotePath(...parts: string[]): string {
    return normalizeRemotePath(path.posix.join(...parts.map(normalizePath)));
}

/**
 * Get parent directory of a remote path
 */
export function getParentDir(remotePath: string): string {
    return path.posix.dirname(normalizeRemotePath(remotePath));
}

/**
 * Get filename from a remote path
 */
export function getFilename(remotePath: string): string {
    return path.posix.basename(normalizeRemotePath(remotePath));
}

/**
 * Remove leading slash from path
 */
export function removeLeadingSlash(filePath: string): string {
    return filePath.replace(/^\/+/, '');
}

/**
 * Map a remote path below remoteBase onto the same relative location below localBase
 */
export function remoteToLocalPath(
    remotePath: string,
    remoteBase: string,
    localBase: string
): string {
    const relativePath = path.posix.relative(normalizeRemotePath(remoteBase), normalizeRemotePath(remotePath));
    return relativePath ? path.join(localBase, ...relativePath.split('/')) : localBase;
}

/**
 * Map a local path below localBase onto the same relative location below remoteBase
 */
export function localToRemotePath(
    localPath: string,
    localBase: string,
    remoteBase: string
): string {
    const relativePath = normalizePath(path.relative(localBase, localPath));
    return relativePath ? joinRemotePath(remoteBase, relativePath) : normalizeRemotePath(remoteBase);
}
