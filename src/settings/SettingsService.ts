import { LogLevel, isLogLevel } from '../logger';

/**
 * All reqfile settings
 */
export interface ReqfileSettings {
    timeout: number;
    followRedirects: boolean;
    maxRedirects: number;
    rejectUnauthorized: boolean;
    saveResponses: boolean;
    logLevel: LogLevel;
}

export type Environment = Record<string, string | undefined>;

/**
 * Default settings values. Invalid certificates are accepted unless
 * REQFILE_REJECT_UNAUTHORIZED (or --strict-tls) says otherwise.
 */
const DEFAULT_SETTINGS: ReqfileSettings = {
    timeout: 30000,
    followRedirects: true,
    maxRedirects: 10,
    rejectUnauthorized: false,
    saveResponses: true,
    logLevel: 'info',
};

const ENV_KEYS: Record<keyof ReqfileSettings, string> = {
    timeout: 'REQFILE_TIMEOUT',
    followRedirects: 'REQFILE_FOLLOW_REDIRECTS',
    maxRedirects: 'REQFILE_MAX_REDIRECTS',
    rejectUnauthorized: 'REQFILE_REJECT_UNAUTHORIZED',
    saveResponses: 'REQFILE_SAVE_RESPONSES',
    logLevel: 'REQFILE_LOG_LEVEL',
};

/**
 * An environment value that could not be used; the default applies instead.
 */
export interface SettingsWarning {
    variable: string;
    value: string;
}

export function parseBoolean(value: string): boolean | undefined {
    switch (value.trim().toLowerCase()) {
        case '1':
        case 'true':
        case 'yes':
        case 'on':
            return true;
        case '0':
        case 'false':
        case 'no':
        case 'off':
            return false;
        default:
            return undefined;
    }
}

export function parseNonNegativeInteger(value: string): number | undefined {
    const trimmed = value.trim();
    if (!/^\d+$/.test(trimmed)) {
        return undefined;
    }
    return parseInt(trimmed, 10);
}

/**
 * Get current settings from the environment, falling back to defaults.
 * Unusable values are reported through `warnings` rather than thrown.
 */
export function getSettings(env: Environment = process.env, warnings: SettingsWarning[] = []): ReqfileSettings {
    const read = <T>(key: keyof ReqfileSettings, parse: (raw: string) => T | undefined, fallback: T): T => {
        const variable = ENV_KEYS[key];
        const raw = env[variable];
        if (raw === undefined || raw.trim() === '') {
            return fallback;
        }
        const parsed = parse(raw);
        if (parsed === undefined) {
            warnings.push({ variable, value: raw });
            return fallback;
        }
        return parsed;
    };

    return {
        timeout: read('timeout', parseNonNegativeInteger, DEFAULT_SETTINGS.timeout),
        followRedirects: read('followRedirects', parseBoolean, DEFAULT_SETTINGS.followRedirects),
        maxRedirects: read('maxRedirects', parseNonNegativeInteger, DEFAULT_SETTINGS.maxRedirects),
        rejectUnauthorized: read('rejectUnauthorized', parseBoolean, DEFAULT_SETTINGS.rejectUnauthorized),
        saveResponses: read('saveResponses', parseBoolean, DEFAULT_SETTINGS.saveResponses),
        logLevel: read<LogLevel>(
            'logLevel',
            raw => {
                const level = raw.trim().toLowerCase();
                return isLogLevel(level) ? level : undefined;
            },
            DEFAULT_SETTINGS.logLevel
        ),
    };
}

/**
 * Get a specific setting value
 */
export function getSetting<K extends keyof ReqfileSettings>(key: K, env: Environment = process.env): ReqfileSettings[K] {
    return getSettings(env)[key];
}

/**
 * Get default settings (useful for reference or reset)
 */
export function getDefaultSettings(): ReqfileSettings {
    return { ...DEFAULT_SETTINGS };
}
