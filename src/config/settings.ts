/**
 * @file Resolver Settings Service
 *
 * Runtime settings for hosts embedding the resolver, with central
 * validation and deterministic precedence (explicit > env > defaults).
 *
 * @module
 */

import { logLevel_parse, logger_create, type LogLevel, type Logger, type LoggerOptions } from '../log/logger.js';

export interface ResolverSettings {
    logLevel: LogLevel;
    defaultGroup: string;
    environmentOverrides: boolean;
}

export type SettingsKey = keyof ResolverSettings;

export type SettingSource = 'explicit' | 'env' | 'default';

export type Environment = Readonly<Record<string, string | undefined>>;

export const SETTINGS_ENV_KEYS: Record<SettingsKey, string> = {
    logLevel: 'BAKE_GRAPH_LOG_LEVEL',
    defaultGroup: 'BAKE_GRAPH_DEFAULT_GROUP',
    environmentOverrides: 'BAKE_GRAPH_ENV_OVERRIDES',
};

const GROUP_NAME_PATTERN: RegExp = /^[A-Za-z0-9_][A-Za-z0-9_.-]*$/;

export class SettingsService {
    private static singleton: SettingsService | null = null;
    private explicit: Partial<ResolverSettings> = {};
    private readonly defaults: ResolverSettings = {
        logLevel: 'warn',
        defaultGroup: 'default',
        environmentOverrides: true,
    };

    constructor(private readonly env: Environment = process.env) {}

    /**
     * Resolve process-global singleton bound to `process.env`.
     */
    public static instance_get(): SettingsService {
        if (!SettingsService.singleton) {
            SettingsService.singleton = new SettingsService();
        }
        return SettingsService.singleton;
    }

    /**
     * Return effective settings.
     */
    public snapshot(): ResolverSettings {
        return {
            logLevel: this.explicit.logLevel ?? this.envLogLevel_resolve() ?? this.defaults.logLevel,
            defaultGroup: this.explicit.defaultGroup ?? this.envDefaultGroup_resolve() ?? this.defaults.defaultGroup,
            environmentOverrides:
                this.explicit.environmentOverrides ??
                this.envEnvironmentOverrides_resolve() ??
                this.defaults.environmentOverrides,
        };
    }

    /**
     * Set one setting with validation.
     */
    public set(key: SettingsKey, value: unknown): { ok: true; value: string | boolean } | { ok: false; error: string } {
        switch (key) {
            case 'logLevel': {
                const level: LogLevel | undefined = logLevel_parse(String(value));
                if (!level) return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
                this.explicit = { ...this.explicit, logLevel: level };
                return { ok: true, value: level };
            }
            case 'defaultGroup': {
                const group: string = String(value).trim();
                if (!GROUP_NAME_PATTERN.test(group)) {
                    return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
                }
                this.explicit = { ...this.explicit, defaultGroup: group };
                return { ok: true, value: group };
            }
            case 'environmentOverrides': {
                const enabled: boolean | undefined = typeof value === 'boolean' ? value : flag_parse(String(value));
                if (enabled === undefined) return { ok: false, error: `Invalid value for ${key}: ${String(value)}` };
                this.explicit = { ...this.explicit, environmentOverrides: enabled };
                return { ok: true, value: enabled };
            }
            default:
                return { ok: false, error: `Unknown setting key: ${String(key)}` };
        }
    }

    /**
     * Remove one explicit setting.
     */
    public unset(key: SettingsKey): void {
        const next: Partial<ResolverSettings> = { ...this.explicit };
        delete next[key];
        this.explicit = next;
    }

    /**
     * Resolve where the effective value of a setting comes from.
     */
    public source_get(key: SettingsKey): SettingSource {
        if (this.explicit[key] !== undefined) return 'explicit';
        const fromEnv: unknown =
            key === 'logLevel'
                ? this.envLogLevel_resolve()
                : key === 'defaultGroup'
                  ? this.envDefaultGroup_resolve()
                  : this.envEnvironmentOverrides_resolve();
        return fromEnv === undefined ? 'default' : 'env';
    }

    /**
     * Build a console logger at the effective log level.
     */
    public logger_build(options: Omit<LoggerOptions, 'level'> = {}): Logger {
        return logger_create({ ...options, level: this.snapshot().logLevel });
    }

    private envLogLevel_resolve(): LogLevel | undefined {
        return logLevel_parse(this.env[SETTINGS_ENV_KEYS.logLevel]);
    }

    private envDefaultGroup_resolve(): string | undefined {
        const raw: string | undefined = this.env[SETTINGS_ENV_KEYS.defaultGroup]?.trim();
        if (!raw || !GROUP_NAME_PATTERN.test(raw)) return undefined;
        return raw;
    }

    private envEnvironmentOverrides_resolve(): boolean | undefined {
        const raw: string | undefined = this.env[SETTINGS_ENV_KEYS.environmentOverrides];
        return raw === undefined ? undefined : flag_parse(raw);
    }
}

function flag_parse(raw: string): boolean | undefined {
    const normalized: string = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return undefined;
}
