import { describe, expect, it } from '@jest/globals';
import {
    candidateRootPath,
    getConstantPrefix,
    hasWildcards,
    listCandidatePaths
} from '../../../src/core/globCandidates';
import { RemoteTree } from '../../../src/core/treeWalker';
import { MemoryServer } from '../../helpers/memoryServer';

function treeOf(server: MemoryServer): RemoteTree {
    return server.factory({
        host: 'example.org',
        port: 21,
        protocol: 'ftp',
        activeMode: false,
        rejectUnauthorized: true,
        timeout: 1000,
        debug: false
    });
}

describe('wildcard prefixes', () => {
    it('detects wildcards with and without constraints', () => {
        expect(hasWildcards('/data/{sample}.txt')).toBe(true);
        expect(hasWildcards('/data/{sample,[a-z]+}.txt')).toBe(true);
        expect(hasWildcards('/data/{id,\\d{3}}.txt')).toBe(true);
        expect(hasWildcards('/data/plain.txt')).toBe(false);
    });

    it('cuts the prefix at the first wildcard', () => {
        expect(getConstantPrefix('/data/run_{id}/out.txt')).toBe('/data/run_');
        expect(getConstantPrefix('/data/run_{id}/out.txt', true)).toBe('/data/');
        expect(getConstantPrefix('/data/plain.txt', true)).toBe('/data/plain.txt');
    });

    it('starts enumeration at the constant directory', () => {
        expect(candidateRootPath('/data/run_{id}/out.txt')).toBe('/data');
        expect(candidateRootPath('{name}.txt')).toBe('/');
        expect(candidateRootPath('/data/exact.txt')).toBe('/data/exact.txt');
    });
});

describe('listCandidatePaths', () => {
    it('lists files and empty directories below the prefix', async () => {
        const server = new MemoryServer()
            .addFile('/a/f1', '1')
            .addFile('/a/f2', '2')
            .addDirectory('/a/empty_dir');

        await expect(listCandidatePaths(treeOf(server), '/a/{name}')).resolves.toEqual([
            '/a/empty_dir',
            '/a/f1',
            '/a/f2'
        ]);
    });

    it('never lists non-empty directories', async () => {
        const server = new MemoryServer()
            .addFile('/runs/r1/out.txt', 'x')
            .addFile('/runs/r2/out.txt', 'y');

        await expect(listCandidatePaths(treeOf(server), '/runs/{run}/out.txt')).resolves.toEqual([
            '/runs/r1/out.txt',
            '/runs/r2/out.txt'
        ]);
    });

    it('returns the prefix itself when it is a file', async () => {
        const server = new MemoryServer().addFile('/data/exact.txt', 'x');

        await expect(listCandidatePaths(treeOf(server), '/data/exact.txt')).resolves.toEqual(['/data/exact.txt']);
    });

    it('returns the prefix itself when it is an empty directory', async () => {
        const server = new MemoryServer().addDirectory('/empty');

        await expect(listCandidatePaths(treeOf(server), '/empty/{x}')).resolves.toEqual(['/empty']);
    });

    it('returns nothing when the prefix does not exist', async () => {
        const server = new MemoryServer();

        await expect(listCandidatePaths(treeOf(server), '/missing/{x}')).resolves.toEqual([]);
    });
});
