import * as fs from 'fs';
import * as path from 'path';
import { RemoteFileInfo } from '../clients';
import { LocalResourceError, Logger, getParentDir, joinRemotePath, normalizeRemotePath } from '../utils';

/**
 * The remote primitives a tree walk needs
 */
export interface RemoteTree {
    getFileInfo(remotePath: string): Promise<RemoteFileInfo | null>;
    listDirectory(remotePath: string): Promise<RemoteFileInfo[]>;
}

export interface WalkEntry {
    info: RemoteFileInfo;
    /** 0 for the walk root */
    depth: number;
    /** Number of direct entries, set for directories only */
    entryCount?: number;
}

export interface WalkOptions {
    /** Walk into links to directories; links to files are reported with the file's type and size */
    followLinks?: boolean;
    /** Real location of the root when it was reached through a link */
    rootRealPath?: string;
}

export interface ResolvedLink {
    /** The target's info under the link's own name and path */
    info: RemoteFileInfo;
    realPath: string;
}

// Bound on link chains that point at further links
const MAX_LINK_HOPS = 8;

function byName(a: RemoteFileInfo, b: RemoteFileInfo): number {
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function linkTargetPath(linkRealPath: string, target: string): string {
    return target.startsWith('/')
        ? normalizeRemotePath(target)
        : joinRemotePath(getParentDir(linkRealPath), target);
}

/**
 * Follow a link to what it points at.
 * A link whose target the server does not report comes back unchanged; a dangling link gives null.
 */
export async function resolveLink(
    tree: RemoteTree,
    link: RemoteFileInfo,
    linkRealPath: string = link.path
): Promise<ResolvedLink | null> {
    let current = link;
    let realPath = linkRealPath;

    for (let hops = 0; hops < MAX_LINK_HOPS; hops++) {
        if (current.type !== 'link' || current.linkTarget === undefined) {
            return {
                info: { ...current, name: link.name, path: link.path, linkTarget: undefined },
                realPath
            };
        }

        realPath = linkTargetPath(realPath, current.linkTarget);
        const next = await tree.getFileInfo(realPath);
        if (!next) {
            return null;
        }
        current = next;
    }

    return null;
}

interface PendingEntry {
    info: RemoteFileInfo;
    depth: number;
    realPath: string;
    /** Real paths of the directories above this entry */
    ancestors: readonly string[];
}

/**
 * Depth-first, pre-order walk below (and including) root.
 * Directories are yielded before their contents. Links are leaves unless followLinks is set;
 * a followed link that leads back into one of its own ancestors is skipped.
 */
export async function* walkRemoteTree(
    tree: RemoteTree,
    root: RemoteFileInfo,
    options: WalkOptions = {}
): AsyncGenerator<WalkEntry> {
    const stack: PendingEntry[] = [{ info: root, depth: 0, realPath: options.rootRealPath ?? root.path, ancestors: [] }];

    while (stack.length > 0) {
        const next = stack.pop();
        if (!next) {
            break;
        }

        let { info, realPath } = next;
        if (info.type === 'link' && options.followLinks) {
            const resolved = await resolveLink(tree, info, realPath);
            if (!resolved) {
                Logger.warn(`Skipping ${info.path}: link target does not exist`);
                continue;
            }
            ({ info, realPath } = resolved);
        }

        if (info.type !== 'directory') {
            yield { info, depth: next.depth };
            continue;
        }

        if (next.ancestors.includes(realPath)) {
            Logger.warn(`Skipping ${info.path}: it links back to ${realPath}`);
            continue;
        }

        const children = await tree.listDirectory(info.path);
        yield { info, depth: next.depth, entryCount: children.length };

        const ancestors = [...next.ancestors, realPath];
        // Reverse so the stack pops children in name order
        const sorted = [...children].sort(byName).reverse();
        for (const child of sorted) {
            stack.push({
                info: child,
                depth: next.depth + 1,
                realPath: joinRemotePath(realPath, child.name),
                ancestors
            });
        }
    }
}

/**
 * Leaf paths below root: every file or link, and every directory without entries.
 * An empty root is a leaf itself, so an empty prefix directory is reported as a candidate.
 */
export async function collectLeafPaths(tree: RemoteTree, root: RemoteFileInfo): Promise<string[]> {
    const leaves: string[] = [];
    for await (const entry of walkRemoteTree(tree, root)) {
        if (entry.info.type !== 'directory' || entry.entryCount === 0) {
            leaves.push(entry.info.path);
        }
    }
    return leaves;
}

/**
 * Total size of all files below root
 */
export async function sumFileSizes(
    tree: RemoteTree,
    root: RemoteFileInfo,
    options: WalkOptions = {}
): Promise<number> {
    let total = 0;
    for await (const entry of walkRemoteTree(tree, root, options)) {
        if (entry.info.type !== 'directory') {
            total += entry.info.size;
        }
    }
    return total;
}

/**
 * Order in which a subtree can be deleted: all non-directories, then directories deepest first
 */
export async function planRemoval(tree: RemoteTree, root: RemoteFileInfo): Promise<WalkEntry[]> {
    const files: WalkEntry[] = [];
    const directories: WalkEntry[] = [];

    for await (const entry of walkRemoteTree(tree, root)) {
        (entry.info.type === 'directory' ? directories : files).push(entry);
    }

    directories.sort((a, b) => b.depth - a.depth);
    return [...files, ...directories];
}

export interface LocalEntry {
    localPath: string;
    /** Forward-slash path relative to the walk root, '' for the root itself */
    relativePath: string;
    type: 'file' | 'directory';
}

/**
 * Pre-order walk of a local directory tree; directories come before their contents
 */
export async function walkLocalTree(root: string): Promise<LocalEntry[]> {
    const entries: LocalEntry[] = [];
    const stack: Array<{ localPath: string; relativePath: string }> = [{ localPath: root, relativePath: '' }];

    while (stack.length > 0) {
        const next = stack.pop();
        if (!next) {
            break;
        }

        let stat: fs.Stats;
        try {
            stat = await fs.promises.stat(next.localPath);
        } catch (error) {
            throw new LocalResourceError(next.localPath, `Cannot read local path ${next.localPath}`, { cause: error });
        }

        if (!stat.isDirectory()) {
            entries.push({ ...next, type: 'file' });
            continue;
        }

        entries.push({ ...next, type: 'directory' });

        let names: string[];
        try {
            names = await fs.promises.readdir(next.localPath);
        } catch (error) {
            throw new LocalResourceError(next.localPath, `Cannot list local directory ${next.localPath}`, { cause: error });
        }

        for (const name of names.sort().reverse()) {
            stack.push({
                localPath: path.join(next.localPath, name),
                relativePath: next.relativePath ? `${next.relativePath}/${name}` : name
            });
        }
    }

    return entries;
}
