import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type SlrSearchConfig } from '../types/index.js';
import { getLogger } from './logger.js';

/**
 * Shape of slrsearch.config.json. Every field is optional.
 */
const ConfigFileSchema = z
    .object({
        maxRequestsPerSecond: z.number().int().positive(),
        windowMs: z.number().int().positive(),
        timeoutMs: z.number().int().positive(),
        pageSize: z.number().int().positive(),
        maxResults: z.number().int().positive(),
        pageConcurrency: z.number().int().positive(),
        retry: z
            .object({
                maxAttempts: z.number().int().positive(),
                baseDelayMs: z.number().nonnegative(),
                factor: z.number().positive(),
                maxDelayMs: z.number().nonnegative(),
                jitter: z.boolean(),
            })
            .partial(),
        evaluation: z
            .object({
                threshold: z.number().min(0).max(1),
                workers: z.number().int().positive(),
                parallelThreshold: z.number().int().nonnegative(),
            })
            .partial(),
        logLevel: z.enum(['error', 'warn', 'info', 'debug', 'silent']),
        jsonLogs: z.boolean(),
    })
    .partial();

export type ConfigOverrides = z.infer<typeof ConfigFileSchema>;

/**
 * Load configuration from slrsearch.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults apply then.
 */
async function loadConfigFile(searchFrom?: string): Promise<ConfigOverrides | null> {
    const explorer = cosmiconfig('slrsearch', {
        searchPlaces: ['slrsearch.config.json', 'package.json'],
    });

    const result = await explorer.search(searchFrom);
    if (!result || result.isEmpty) return null;

    const parsed = ConfigFileSchema.safeParse(result.config);
    if (!parsed.success) {
        throw new Error(
            `Invalid config file ${result.filepath}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
        );
    }

    getLogger().debug({ path: result.filepath }, 'Loaded config file');
    return parsed.data;
}

/**
 * Read relevant environment variables.
 */
function loadEnvVars(): ConfigOverrides {
    const env: ConfigOverrides = {};

    const rate = Number(process.env['SLRSEARCH_MAX_RPS']);
    if (Number.isInteger(rate) && rate > 0) {
        env.maxRequestsPerSecond = rate;
    }

    const level = ConfigFileSchema.shape.logLevel.safeParse(process.env['SLRSEARCH_LOG_LEVEL']);
    if (level.success && level.data !== undefined) {
        env.logLevel = level.data;
    }

    return env;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 */
export async function resolveConfig(
    cliFlags: ConfigOverrides,
    options: { searchFrom?: string } = {}
): Promise<SlrSearchConfig> {
    const fileConfig = await loadConfigFile(options.searchFrom);
    const envConfig = loadEnvVars();

    // Deep merge with precedence
    return {
        ...DEFAULT_CONFIG,
        ...fileConfig,
        ...envConfig,
        ...cliFlags,
        retry: {
            ...DEFAULT_CONFIG.retry,
            ...fileConfig?.retry,
            ...cliFlags.retry,
        },
        evaluation: {
            ...DEFAULT_CONFIG.evaluation,
            ...fileConfig?.evaluation,
            ...cliFlags.evaluation,
        },
    };
}

/**
 * API keys from the environment: `SCOPUS_API_KEYS` (comma separated).
 * Keys are never read from the config file.
 */
export function getApiKeys(env: NodeJS.ProcessEnv = process.env): string[] {
    return (env['SCOPUS_API_KEYS'] ?? '')
        .split(',')
        .map((key) => key.trim())
        .filter((key) => key.length > 0);
}
