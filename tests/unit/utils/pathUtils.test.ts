import * as path from 'path';
import { describe, expect, it } from '@jest/globals';
import {
    getFilename,
    getParentDir,
    joinRemotePath,
    localToRemotePath,
    normalizeRemotePath,
    remoteToLocalPath,
    removeLeadingSlash
} from '../../../src/utils/pathUtils';

describe('pathUtils', () => {
    it.each([
        ['/data//a.txt', '/data/a.txt'],
        ['/data/sub/', '/data/sub'],
        ['/data/./sub/../a.txt', '/data/a.txt'],
        ['\\data\\a.txt', '/data/a.txt'],
        ['/', '/']
    ])('normalizes %p to %p', (input, expected) => {
        expect(normalizeRemotePath(input)).toBe(expected);
    });

    it('joins remote segments', () => {
        expect(joinRemotePath('/data/', 'sub', 'a.txt')).toBe('/data/sub/a.txt');
        expect(joinRemotePath('/', 'a.txt')).toBe('/a.txt');
    });

    it('splits parent and name', () => {
        expect(getParentDir('/data/sub/a.txt')).toBe('/data/sub');
        expect(getParentDir('/a.txt')).toBe('/');
        expect(getFilename('/data/sub/')).toBe('sub');
    });

    it('removes leading slashes', () => {
        expect(removeLeadingSlash('//data/a.txt')).toBe('data/a.txt');
    });

    it('maps remote paths below a base onto local paths', () => {
        expect(remoteToLocalPath('/data/sub/a.txt', '/data', '/tmp/stage')).toBe(path.join('/tmp/stage', 'sub', 'a.txt'));
        expect(remoteToLocalPath('/data', '/data/', '/tmp/stage')).toBe('/tmp/stage');
    });

    it('maps local paths below a base onto remote paths', () => {
        expect(localToRemotePath(path.join('/tmp/stage', 'sub', 'a.txt'), '/tmp/stage', '/upload')).toBe('/upload/sub/a.txt');
        expect(localToRemotePath('/tmp/stage', '/tmp/stage', '/upload/')).toBe('/upload');
    });
});
