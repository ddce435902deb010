import { describe, expect, it } from '@jest/globals';
import { getNetloc, parseQuery, requireParsedQuery } from '../../../src/core/queryParser';
import { QueryValidationError } from '../../../src/utils';

describe('parseQuery', () => {
    it('accepts an ftp query with an explicit port', () => {
        const result = parseQuery('ftp://ftpserver.com:2121/data/myfile.txt');

        expect(result).toEqual({
            valid: true,
            parsed: {
                query: 'ftp://ftpserver.com:2121/data/myfile.txt',
                scheme: 'ftp',
                netloc: 'ftpserver.com:2121',
                key: { hostname: 'ftpserver.com', port: 2121, protocol: 'ftp' },
                path: '/data/myfile.txt'
            }
        });
    });

    it('defaults the port to 21 for both protocols', () => {
        const ftp = requireParsedQuery('ftp://example.org/a.txt');
        const ftps = requireParsedQuery('ftps://example.org/a.txt');

        expect(ftp.key.port).toBe(21);
        expect(ftps.key.port).toBe(21);
        expect(ftps.key.protocol).toBe('ftps');
    });

    it('treats the scheme case-insensitively', () => {
        expect(requireParsedQuery('FTPS://Example.ORG/a.txt').scheme).toBe('ftps');
    });

    it('lower-cases the host name in the endpoint key but keeps the netloc as written', () => {
        const parsed = requireParsedQuery('ftp://Example.ORG/a.txt');

        expect(parsed.key.hostname).toBe('example.org');
        expect(parsed.netloc).toBe('Example.ORG');
    });

    it('strips user info from the endpoint key', () => {
        const parsed = requireParsedQuery('ftp://alice@example.org:2100/a.txt');

        expect(parsed.key).toEqual({ hostname: 'example.org', port: 2100, protocol: 'ftp' });
        expect(parsed.netloc).toBe('alice@example.org:2100');
    });

    it('parses bracketed IPv6 hosts', () => {
        const parsed = requireParsedQuery('ftp://[::1]:2121/a.txt');

        expect(parsed.key.hostname).toBe('::1');
        expect(parsed.key.port).toBe(2121);
    });

    it('keeps wildcards in the path untouched', () => {
        expect(requireParsedQuery('ftp://example.org/data/{sample}.txt').path).toBe('/data/{sample}.txt');
    });

    it('accepts a query without a host; the storage object rejects it later', () => {
        const result = parseQuery('ftp:///myfile.txt');

        expect(result.valid).toBe(true);
    });

    it.each([
        ['http://example.org/a.txt'],
        ['sftp://example.org/a.txt'],
        ['example.org/a.txt'],
        ['']
    ])('rejects %p because of its scheme', query => {
        expect(parseQuery(query)).toEqual({
            valid: false,
            query,
            reason: 'Query does not start with ftp:// or ftps://'
        });
    });

    it('rejects a query without a path', () => {
        expect(parseQuery('ftp://example.org')).toEqual({
            valid: false,
            query: 'ftp://example.org',
            reason: 'Query does not contain a path to a file or directory'
        });
    });

    it.each(['0', '65536', 'abc'])('rejects port %p', port => {
        const result = parseQuery(`ftp://example.org:${port}/a.txt`);

        expect(result).toEqual({
            valid: false,
            query: `ftp://example.org:${port}/a.txt`,
            reason: `Port '${port}' is not a valid port number`
        });
    });

    it('rejects an unterminated IPv6 host', () => {
        const result = parseQuery('ftp://[::1/a.txt');

        expect(result.valid).toBe(false);
    });
});

describe('requireParsedQuery', () => {
    it('throws a QueryValidationError carrying the reason', () => {
        expect(() => requireParsedQuery('http://example.org/a.txt')).toThrow(QueryValidationError);
        expect(() => requireParsedQuery('http://example.org/a.txt')).toThrow(
            "Invalid query 'http://example.org/a.txt': Query does not start with ftp:// or ftps://"
        );
    });
});

describe('getNetloc', () => {
    it('returns the network location as written', () => {
        expect(getNetloc('ftp://User@Host.example:2121/x/y')).toBe('User@Host.example:2121');
    });

    it('returns an empty string for queries without one', () => {
        expect(getNetloc('not a query')).toBe('');
    });
});
