import { z } from 'zod';
import { FtpStorageSettings, mergeWithDefaults } from '../types';
import { ConfigurationError, Logger } from '../utils';

const TRUE_VALUES = ['1', 'true', 'yes', 'on'];
const FALSE_VALUES = ['0', 'false', 'no', 'off'];

const optionalString = z.string().optional().transform(value => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
});

const booleanField = optionalString.transform((value, ctx) => {
    if (value === undefined) {
        return undefined;
    }
    const normalized = value.toLowerCase();
    if (TRUE_VALUES.includes(normalized)) {
        return true;
    }
    if (FALSE_VALUES.includes(normalized)) {
        return false;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a boolean` });
    return z.NEVER;
});

const intField = optionalString.transform((value, ctx) => {
    if (value === undefined) {
        return undefined;
    }
    const parsed = /^\d+$/.test(value) ? Number.parseInt(value, 10) : NaN;
    if (!Number.isFinite(parsed) || parsed <= 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `'${value}' is not a positive integer` });
        return z.NEVER;
    }
    return parsed;
});

const envSchema = z.object({
    FTP_STORAGE_USERNAME: optionalString,
    FTP_STORAGE_PASSWORD: optionalString,
    FTP_STORAGE_ACTIVE_MODE: booleanField,
    FTP_STORAGE_TIMEOUT: intField,
    FTP_STORAGE_DEBUG: booleanField,
    FTP_STORAGE_REJECT_UNAUTHORIZED: booleanField
});

function formatIssues(error: z.ZodError): string {
    return error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
}

/**
 * Loads provider settings from FTP_STORAGE_* environment variables.
 * Explicit overrides win over the environment, which wins over the defaults.
 */
export class ConfigManager {
    constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

    public resolve(overrides: Partial<FtpStorageSettings> = {}): FtpStorageSettings {
        const settings = mergeWithDefaults(this.loadFromEnv(), overrides);

        Logger.setDebugMode(settings.debug);
        Logger.debug(`Resolved settings: ${describeSettings(settings)}`);
        return settings;
    }

    /**
     * Settings given through FTP_STORAGE_* environment variables
     */
    public loadFromEnv(): Partial<FtpStorageSettings> {
        const result = envSchema.safeParse(this.env);
        if (!result.success) {
            throw new ConfigurationError(`Invalid environment settings: ${formatIssues(result.error)}`);
        }

        const raw = result.data;
        return {
            username: raw.FTP_STORAGE_USERNAME,
            password: raw.FTP_STORAGE_PASSWORD,
            activeMode: raw.FTP_STORAGE_ACTIVE_MODE,
            timeout: raw.FTP_STORAGE_TIMEOUT,
            debug: raw.FTP_STORAGE_DEBUG,
            rejectUnauthorized: raw.FTP_STORAGE_REJECT_UNAUTHORIZED
        };
    }
}

// Never log the password
function describeSettings(settings: FtpStorageSettings): string {
    const user = settings.username ?? 'anonymous';
    return `user=${user} activeMode=${settings.activeMode} timeout=${settings.timeout}ms `
        + `rejectUnauthorized=${settings.rejectUnauthorized}`;
}
