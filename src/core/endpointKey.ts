import { Protocol } from '../types';

/**
 * Identity of one remote server + protocol combination
 */
export interface EndpointKey {
    readonly hostname: string;
    readonly port: number;
    readonly protocol: Protocol;
}

export function createEndpointKey(hostname: string, port: number, protocol: Protocol): EndpointKey {
    return Object.freeze({
        hostname: hostname.toLowerCase(),
        port,
        protocol
    });
}

/**
 * Stable string form used as the pool map key
 */
export function endpointKeyId(key: EndpointKey): string {
    const host = key.hostname.includes(':') ? `[${key.hostname}]` : key.hostname;
    return `${key.protocol}://${host}:${key.port}`;
}

export function endpointKeysEqual(a: EndpointKey, b: EndpointKey): boolean {
    return endpointKeyId(a) === endpointKeyId(b);
}
