import { DEFAULT_MAX_ATTEMPTS, type ScoringMode } from '@termle/engine';

/** Runtime settings for the terminal game */
export interface Config {
    maxAttempts: number;
    scoring: ScoringMode;
    /** Word list path; undefined means the list bundled with the engine */
    wordsFile: string | undefined;
    daily: boolean;
    debug: boolean;
}

export class ConfigError extends Error {
    constructor(
        readonly variable: string,
        message: string,
    ) {
        super(`${variable}: ${message}`);
        this.name = 'ConfigError';
    }
}

type Env = Record<string, string | undefined>;

function readPositiveInt(env: Env, name: string, fallback: number): number {
    const raw = env[name]?.trim();
    if (!raw) return fallback;
    if (!/^\d+$/.test(raw) || Number(raw) < 1) {
        throw new ConfigError(name, `expected a positive integer, got '${raw}'`);
    }
    return Number(raw);
}

function readBoolean(env: Env, name: string): boolean {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return false;
    if (raw === 'true' || raw === '1') return true;
    if (raw === 'false' || raw === '0') return false;
    throw new ConfigError(name, `expected true or false, got '${raw}'`);
}

function readScoring(env: Env, name: string): ScoringMode {
    const raw = env[name]?.trim().toLowerCase();
    if (!raw) return 'uncapped';
    if (raw === 'uncapped' || raw === 'counted') return raw;
    throw new ConfigError(name, `expected 'uncapped' or 'counted', got '${raw}'`);
}

/**
 * Reads TERMLE_* settings from the environment.
 * Callers load `.env` (dotenv) before calling this.
 */
export function loadConfig(env: Env = process.env): Config {
    return {
        maxAttempts: readPositiveInt(env, 'TERMLE_MAX_ATTEMPTS', DEFAULT_MAX_ATTEMPTS),
        scoring: readScoring(env, 'TERMLE_SCORING'),
        wordsFile: env.TERMLE_WORDS_FILE?.trim() || undefined,
        daily: readBoolean(env, 'TERMLE_DAILY'),
        debug: readBoolean(env, 'TERMLE_DEBUG'),
    };
}
