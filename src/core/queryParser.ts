import { Protocol, isProtocol, getDefaultPort } from '../types';
import { QueryValidationError } from '../utils';
import { EndpointKey, createEndpointKey } from './endpointKey';

/**
 * A validated storage query split into endpoint identity and remote path
 */
export interface ParsedQuery {
    query: string;
    scheme: Protocol;
    /** Network location as written in the query (userinfo, host and port) */
    netloc: string;
    key: EndpointKey;
    /** Remote path exactly as written, wildcards included */
    path: string;
}

export type QueryParseResult =
    | { valid: true; parsed: ParsedQuery }
    | { valid: false; query: string; reason: string };

const QUERY_PATTERN = /^([A-Za-z][A-Za-z0-9+.-]*):(?:\/\/([^/?#]*))?([^?#]*)/;

interface HostPort {
    hostname: string;
    port?: number;
}

function invalid(query: string, reason: string): QueryParseResult {
    return { valid: false, query, reason };
}

function splitNetloc(netloc: string): HostPort | string {
    const hostPort = netloc.slice(netloc.lastIndexOf('@') + 1);

    let hostname: string;
    let portText: string;
    if (hostPort.startsWith('[')) {
        const close = hostPort.indexOf(']');
        if (close === -1) {
            return `Invalid IPv6 host in '${netloc}'`;
        }
        hostname = hostPort.slice(1, close);
        const rest = hostPort.slice(close + 1);
        if (rest && !rest.startsWith(':')) {
            return `Unexpected characters after IPv6 host in '${netloc}'`;
        }
        portText = rest.slice(1);
    } else {
        const colon = hostPort.indexOf(':');
        hostname = colon === -1 ? hostPort : hostPort.slice(0, colon);
        portText = colon === -1 ? '' : hostPort.slice(colon + 1);
    }

    if (!portText) {
        return { hostname };
    }

    const port = /^\d+$/.test(portText) ? Number.parseInt(portText, 10) : NaN;
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
        return `Port '${portText}' is not a valid port number`;
    }
    return { hostname, port };
}

/**
 * Parse a query of the form scheme://host[:port]/path.
 * Wildcard placeholders are left untouched; they are resolved by the host before retrieval.
 */
export function parseQuery(query: string): QueryParseResult {
    const match = QUERY_PATTERN.exec(query);
    const scheme = match ? match[1].toLowerCase() : '';

    if (!match || !isProtocol(scheme)) {
        return invalid(query, 'Query does not start with ftp:// or ftps://');
    }

    const netloc = match[2] ?? '';
    const path = match[3];
    if (!path) {
        return invalid(query, 'Query does not contain a path to a file or directory');
    }

    const hostPort = splitNetloc(netloc);
    if (typeof hostPort === 'string') {
        return invalid(query, hostPort);
    }

    return {
        valid: true,
        parsed: {
            query,
            scheme,
            netloc,
            key: createEndpointKey(hostPort.hostname, hostPort.port ?? getDefaultPort(scheme), scheme),
            path
        }
    };
}

/**
 * Parse a query, throwing QueryValidationError when it is invalid
 */
export function requireParsedQuery(query: string): ParsedQuery {
    const result = parseQuery(query);
    if (!result.valid) {
        throw new QueryValidationError(query, result.reason);
    }
    return result.parsed;
}

/**
 * Network location of a query, used as the rate limiter key
 */
export function getNetloc(query: string): string {
    const match = QUERY_PATTERN.exec(query);
    return match?.[2] ?? '';
}
