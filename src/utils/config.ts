import { cosmiconfig } from 'cosmiconfig';
import { z } from 'zod';
import { DEFAULT_CONFIG, type KindredConfig, type LogLevel } from '../types/index.js';
import { getLogger } from './logger.js';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

const configFileSchema = z
    .object({
        charactersDir: z.string(),
        extensions: z.array(z.string()),
        failOn: z.enum(['any', 'critical', 'never']),
        escalateDanglingReferences: z.boolean(),
        exportFormat: z.enum(['json', 'graphml', 'mermaid', 'csv']),
        logLevel: z.enum(['error', 'warn', 'info', 'debug']),
        jsonLogs: z.boolean(),
    })
    .partial();

/**
 * Load configuration from kindred.config.json using cosmiconfig.
 * Returns null if no config file is found; defaults are used then.
 */
async function loadConfigFile(searchFrom?: string): Promise<Partial<KindredConfig> | null> {
    const explorer = cosmiconfig('kindred', {
        searchPlaces: ['kindred.config.json'],
    });

    try {
        const result = await explorer.search(searchFrom);
        if (result && !result.isEmpty) {
            const parsed = configFileSchema.safeParse(result.config);
            if (!parsed.success) {
                getLogger().warn({ path: result.filepath, issues: parsed.error.issues }, 'Invalid config file, using defaults');
                return null;
            }
            getLogger().debug({ path: result.filepath }, 'Loaded config file');
            return parsed.data;
        }
    } catch (error) {
        getLogger().warn({ error }, 'Failed to load config file, using defaults');
    }

    return null;
}

/**
 * Read relevant environment variables.
 */
export function loadEnvVars(env: NodeJS.ProcessEnv = process.env): Partial<KindredConfig> {
    const config: Partial<KindredConfig> = {};

    const dir = env['KINDRED_CHARACTERS_DIR'];
    if (dir) {
        config.charactersDir = dir;
    }

    const level = env['KINDRED_LOG_LEVEL'];
    if (level) {
        const match = LOG_LEVELS.find((l) => l === level);
        if (match) {
            config.logLevel = match;
        } else {
            getLogger().warn({ level }, 'Ignoring unknown KINDRED_LOG_LEVEL');
        }
    }

    return config;
}

/**
 * Merge configuration from multiple sources.
 * Precedence: CLI flags > environment variables > config file > defaults
 *
 * @param cliFlags - Values given on the command line; undefined entries are ignored
 * @param searchFrom - Directory to start the config file search from (defaults to cwd)
 */
export async function resolveConfig(
    cliFlags: Partial<KindredConfig>,
    searchFrom?: string
): Promise<KindredConfig> {
    const fileConfig = await loadConfigFile(searchFrom);
    const envConfig = loadEnvVars();

    const pick = <K extends keyof KindredConfig>(key: K): KindredConfig[K] =>
        cliFlags[key] ?? envConfig[key] ?? fileConfig?.[key] ?? DEFAULT_CONFIG[key];

    return {
        charactersDir: pick('charactersDir'),
        extensions: pick('extensions'),
        failOn: pick('failOn'),
        escalateDanglingReferences: pick('escalateDanglingReferences'),
        exportFormat: pick('exportFormat'),
        logLevel: pick('logLevel'),
        jsonLogs: pick('jsonLogs'),
    };
}
