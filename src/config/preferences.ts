import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import * as dotenv from 'dotenv';
import { Logger } from '../utils/logger';
import { ConfigurationError, toError } from '../utils/errors';

/**
 * ⚙️ USER PREFERENCES
 * `~/.wordforge/config.json`. Missing or unreadable files fall back to defaults;
 * the CLI must keep working with a broken preferences file.
 */

const PreferencesSchema = z.object({
    default_provider: z.string().min(1).optional(),
    default_wordlist_type: z.string().min(1).default('password'),
    default_wordlist_length: z.number().int().positive().optional(),
    output_directory: z.string().min(1).default('.'),
    append_by_default: z.boolean().default(false),
    default_anthropic_model: z.string().min(1).optional(),
    default_openai_model: z.string().min(1).optional(),
    default_openrouter_model: z.string().min(1).optional(),
    default_custom_model: z.string().min(1).optional(),
});

export type Preferences = z.infer<typeof PreferencesSchema>;
export type PreferenceKey = keyof Preferences;

export const PREFERENCE_KEYS = Object.keys(PreferencesSchema.shape).filter(isPreferenceKey);

export function isPreferenceKey(key: string): key is PreferenceKey {
    return key in PreferencesSchema.shape;
}

export function defaultPreferences(): Preferences {
    return PreferencesSchema.parse({});
}

/** Per-provider model preference, e.g. `default_openrouter_model`. */
export function preferredModel(preferences: Preferences, provider: string): string | undefined {
    const key = `default_${provider}_model`;
    if (!isPreferenceKey(key)) return undefined;
    const value = preferences[key];
    return typeof value === 'string' ? value : undefined;
}

function coerceValue(key: PreferenceKey, raw: string): unknown {
    if (key === 'default_wordlist_length') {
        return Number(raw);
    }
    if (key === 'append_by_default') {
        const normalized = raw.trim().toLowerCase();
        if (['true', 'yes', '1', 'on'].includes(normalized)) return true;
        if (['false', 'no', '0', 'off'].includes(normalized)) return false;
        return raw;
    }
    return raw.trim();
}

export class PreferenceStore {
    constructor(public readonly filePath: string) { }

    static inDirectory(configDir: string): PreferenceStore {
        return new PreferenceStore(path.join(configDir, 'config.json'));
    }

    load(): Preferences {
        if (!fs.existsSync(this.filePath)) return defaultPreferences();

        try {
            const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
            const result = PreferencesSchema.safeParse(raw);
            if (result.success) return result.data;

            Logger.warn(`[Preferences] Ignoring invalid ${this.filePath}`, {
                issues: result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
            });
        } catch (error) {
            Logger.warn(`[Preferences] Could not read ${this.filePath}, using defaults`, { error: toError(error) });
        }
        return defaultPreferences();
    }

    get<K extends PreferenceKey>(key: K): Preferences[K] {
        return this.load()[key];
    }

    /**
     * Sets one preference from its string form (as typed on the command line).
     */
    set(key: string, rawValue: string): Preferences {
        if (!isPreferenceKey(key)) {
            throw new ConfigurationError(`Unknown preference "${key}". Known: ${PREFERENCE_KEYS.join(', ')}`);
        }

        const candidate = { ...this.load(), [key]: coerceValue(key, rawValue) };
        const result = PreferencesSchema.safeParse(candidate);
        if (!result.success) {
            const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
            throw new ConfigurationError(`Invalid value for ${key}: ${issues.join('; ')}`, { issues });
        }

        this.save(result.data);
        return result.data;
    }

    reset(): Preferences {
        const defaults = defaultPreferences();
        this.save(defaults);
        return defaults;
    }

    save(preferences: Preferences): void {
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        fs.writeFileSync(this.filePath, `${JSON.stringify(preferences, null, 2)}\n`, 'utf-8');
    }
}

/**
 * 🔑 API keys persisted as `VAR=value` lines in a .env file.
 */
export class EnvFileStore {
    constructor(public readonly filePath: string) { }

    static inDirectory(configDir: string): EnvFileStore {
        return new EnvFileStore(path.join(configDir, '.env'));
    }

    read(): Record<string, string> {
        if (!fs.existsSync(this.filePath)) return {};
        return dotenv.parse(fs.readFileSync(this.filePath, 'utf-8'));
    }

    /** Replaces an existing assignment in place, or appends one. */
    set(name: string, value: string): void {
        if (!/^[A-Z_][A-Z0-9_]*$/.test(name)) {
            throw new ConfigurationError(`Invalid environment variable name "${name}"`);
        }
        if (/[\r\n]/.test(value)) {
            throw new ConfigurationError(`Value for ${name} must be a single line`);
        }

        const assignment = `${name}=${value}`;
        const lines = fs.existsSync(this.filePath)
            ? fs.readFileSync(this.filePath, 'utf-8').split(/\r?\n/)
            : [];
        const matcher = new RegExp(`^\\s*(?:export\\s+)?${name}\\s*=`);

        let replaced = false;
        const updated = lines.map(line => {
            if (!replaced && matcher.test(line)) {
                replaced = true;
                return assignment;
            }
            return line;
        });

        while (updated.length > 0 && updated[updated.length - 1] === '') updated.pop();
        if (!replaced) updated.push(assignment);

        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        fs.writeFileSync(this.filePath, `${updated.join('\n')}\n`, { encoding: 'utf-8', mode: 0o600 });
    }
}
