import { cosmiconfig } from 'cosmiconfig';
import { DEFAULT_CONFIG, type PharmaPapersConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Load configuration from pharmapapers.config.json using cosmiconfig.
 * Returns null when no config file is found.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<PharmaPapersConfig> | null> {
    const explorer = cosmiconfig('pharmapapers', {
        searchPlaces: ['pharmapapers.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty && isConfigObject(result.config)) {
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return pickConfigFields(result.config);
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

function isConfigObject(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the keys we understand, with the types we expect.
 */
function pickConfigFields(raw: Record<string, unknown>): Partial<PharmaPapersConfig> {
    const config: Partial<PharmaPapersConfig> = {};

    const numberKeys = ['maxResults', 'batchSize', 'maxRetries', 'timeoutMs'] as const;
    for (const key of numberKeys) {
        const value = raw[key];
        if (typeof value === 'number' && Number.isInteger(value) && value > 0) {
            config[key] = value;
        }
    }

    const stringKeys = ['email', 'apiKey', 'toolName', 'file'] as const;
    for (const key of stringKeys) {
        const value = raw[key];
        if (typeof value === 'string' && value.length > 0) {
            config[key] = value;
        }
    }

    if (typeof raw['stats'] === 'boolean') config.stats = raw['stats'];
    if (typeof raw['jsonLogs'] === 'boolean') config.jsonLogs = raw['jsonLogs'];

    const logLevel = raw['logLevel'];
    if (
        logLevel === 'silent' ||
        logLevel === 'error' ||
        logLevel === 'warn' ||
        logLevel === 'info' ||
        logLevel === 'debug'
    ) {
        config.logLevel = logLevel;
    }

    return config;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): Partial<PharmaPapersConfig> {
    const env: Partial<PharmaPapersConfig> = {};

    const apiKey = process.env['NCBI_API_KEY'];
    if (apiKey) {
        env.apiKey = apiKey;
        getLogger().debug('NCBI_API_KEY detected in environment');
    }

    const email = process.env['NCBI_EMAIL'];
    if (email) {
        env.email = email;
    }

    return env;
}

/**
 * Drop undefined entries so they don't shadow lower-precedence values.
 */
function definedOnly<T extends object>(value: T): Partial<T> {
    const result: Partial<T> = {};
    for (const key in value) {
        if (value[key] !== undefined) {
            result[key] = value[key];
        }
    }
    return result;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: Partial<PharmaPapersConfig>,
    options: { searchFrom?: string } = {}
): Promise<PharmaPapersConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...definedOnly(cliFlags),
    };
}
