import { normalizeRemotePath } from '../utils';
import { RemoteTree, collectLeafPaths } from './treeWalker';

// {name} or {name,constraint}; constraints may contain {n} / {n,m} quantifiers
const WILDCARD_PATTERN = /\{\s*\w+\s*(?:,(?:[^{}]+|\{\d+(?:,\d+)?\})*)?\}/;

export function hasWildcards(pattern: string): boolean {
    return WILDCARD_PATTERN.test(pattern);
}

/**
 * Part of a pattern before its first wildcard.
 * With stripIncompleteParts the prefix is cut back to the last '/', so no partial segment remains.
 */
export function getConstantPrefix(pattern: string, stripIncompleteParts = false): string {
    const match = WILDCARD_PATTERN.exec(pattern);
    if (!match) {
        return pattern;
    }

    const prefix = pattern.slice(0, match.index);
    return stripIncompleteParts ? prefix.slice(0, prefix.lastIndexOf('/') + 1) : prefix;
}

/**
 * Remote path the enumeration starts from
 */
export function candidateRootPath(remotePath: string): string {
    const prefix = getConstantPrefix(remotePath, true);
    return prefix ? normalizeRemotePath(prefix) : '/';
}

/**
 * Concrete remote paths that the host can match its wildcard pattern against.
 * A directory prefix yields every file below it plus every empty directory; non-empty
 * directories are never returned. An empty prefix directory is itself returned, although
 * only directories below the prefix can match a pattern that continues past it.
 * Links are reported as they are and never followed.
 */
export async function listCandidatePaths(tree: RemoteTree, remotePath: string): Promise<string[]> {
    const root = await tree.getFileInfo(candidateRootPath(remotePath));

    if (!root) {
        return [];
    }
    if (root.type === 'directory') {
        return collectLeafPaths(tree, root);
    }
    return [root.path];
}
