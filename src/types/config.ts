/**
 * Configuration types for the FTP storage provider
 */

export type Protocol = 'ftp' | 'ftps';

export const SUPPORTED_PROTOCOLS: readonly Protocol[] = ['ftp', 'ftps'];

export interface Credentials {
    username?: string;
    password?: string;
}

export interface TransferModeConfig {
    activeMode: boolean;
    rejectUnauthorized: boolean;
    timeout: number;
    debug: boolean;
}

export interface FtpStorageSettings extends Credentials {
    /** Use active instead of passive data connections */
    activeMode: boolean;
    /** Per-operation timeout in milliseconds */
    timeout: number;
    debug: boolean;
    /** Verify the server certificate on FTPS connections */
    rejectUnauthorized: boolean;
}

export const DEFAULT_SETTINGS: FtpStorageSettings = {
    activeMode: false,
    timeout: 30000,
    debug: false,
    rejectUnauthorized: true
};

export function isProtocol(value: string): value is Protocol {
    return (SUPPORTED_PROTOCOLS as readonly string[]).includes(value);
}

// FTPS is explicit TLS (AUTH TLS) on the regular control port
const DEFAULT_PORTS: Record<Protocol, number> = {
    ftp: 21,
    ftps: 21
};

export function getDefaultPort(protocol: Protocol): number {
    return DEFAULT_PORTS[protocol];
}

/**
 * Apply settings layers over the defaults, later layers winning.
 * Undefined values never erase a value from an earlier layer.
 */
export function mergeWithDefaults(...layers: Partial<FtpStorageSettings>[]): FtpStorageSettings {
    const merged: FtpStorageSettings = { ...DEFAULT_SETTINGS };

    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            if (value !== undefined) {
                Object.assign(merged, { [key]: value });
            }
        }
    }

    return merged;
}

export function toCredentials(settings: FtpStorageSettings): Credentials {
    return {
        username: settings.username,
        password: settings.password
    };
}

export function toTransferModeConfig(settings: FtpStorageSettings): TransferModeConfig {
    return {
        activeMode: settings.activeMode,
        rejectUnauthorized: settings.rejectUnauthorized,
        timeout: settings.timeout,
        debug: settings.debug
    };
}
