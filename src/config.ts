/**
 * Configuration
 *
 * Values are layered, lowest to highest: schema defaults, the YAML config
 * file, environment variables, then explicit overrides (CLI flags).
 */

import * as fs from 'node:fs/promises';
import path from 'node:path';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import {
    DEFAULT_CONFIG_FILE,
    DEFAULT_DEBUG,
    DEFAULT_DOWNLOADER_BINARY,
    DEFAULT_DOWNLOAD_RETRIES,
    DEFAULT_EMBEDDING_MODEL,
    DEFAULT_HOST,
    DEFAULT_INPUT_TOKEN_BUDGET,
    DEFAULT_ITEM_TIMEOUT_MS,
    DEFAULT_MAX_UPLOAD_SIZE,
    DEFAULT_PLAYER_CLIENTS,
    DEFAULT_PORT,
    DEFAULT_SCRATCH_DIRECTORY,
    DEFAULT_SETTLE_ATTEMPTS,
    DEFAULT_SETTLE_INTERVAL_MS,
    DEFAULT_SOCKET_TIMEOUT_SECONDS,
    DEFAULT_SUMMARIZATION_MODEL,
    DEFAULT_SUMMARY_MAX_LENGTH,
    DEFAULT_TRANSCRIPTION_MODEL,
    DEFAULT_UPLOAD_CHUNK_SIZE,
    DEFAULT_VERBOSE,
} from '@/constants';

export const DownloadConfigSchema = z.object({
    binary: z.string().min(1).default(DEFAULT_DOWNLOADER_BINARY),
    retries: z.number().int().min(0).default(DEFAULT_DOWNLOAD_RETRIES),
    socketTimeoutSeconds: z.number().positive().default(DEFAULT_SOCKET_TIMEOUT_SECONDS),
    playerClients: z.array(z.string().min(1)).min(1).default(DEFAULT_PLAYER_CLIENTS),
    settleAttempts: z.number().int().min(1).default(DEFAULT_SETTLE_ATTEMPTS),
    settleIntervalMs: z.number().int().min(0).default(DEFAULT_SETTLE_INTERVAL_MS),
});

export const ConfigSchema = z.object({
    verbose: z.boolean().default(DEFAULT_VERBOSE),
    debug: z.boolean().default(DEFAULT_DEBUG),
    host: z.string().default(DEFAULT_HOST),
    port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
    scratchDirectory: z.string().min(1).default(DEFAULT_SCRATCH_DIRECTORY),
    transcriptionModel: z.string().default(DEFAULT_TRANSCRIPTION_MODEL),
    summarizationModel: z.string().default(DEFAULT_SUMMARIZATION_MODEL),
    embeddingModel: z.string().default(DEFAULT_EMBEDDING_MODEL),
    summaryMaxLength: z.number().int().positive().default(DEFAULT_SUMMARY_MAX_LENGTH),
    inputTokenBudget: z.number().int().positive().default(DEFAULT_INPUT_TOKEN_BUDGET),
    uploadChunkSize: z.number().int().positive().default(DEFAULT_UPLOAD_CHUNK_SIZE),
    maxUploadSize: z.number().int().positive().default(DEFAULT_MAX_UPLOAD_SIZE),
    itemTimeoutMs: z.number().int().min(0).default(DEFAULT_ITEM_TIMEOUT_MS),
    download: DownloadConfigSchema.default({}),
});

export const SecureConfigSchema = z.object({
    openaiApiKey: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type SecureConfig = z.infer<typeof SecureConfigSchema>;

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export interface LoadOptions {
    /** Explicit config file; must exist when given */
    configFile?: string;
    /** Directory searched for the default config file */
    cwd?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: ConfigInput;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

export const readConfigFile = async (filePath: string, required: boolean): Promise<Record<string, unknown>> => {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
        if (required) {
            throw new ConfigError(`Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
        }
        return {};
    }
    const parsed = yaml.load(content);
    if (parsed === undefined || parsed === null) {
        return {};
    }
    if (!isRecord(parsed)) {
        throw new ConfigError(`Config file ${filePath} must contain a mapping at the top level`);
    }
    return parsed;
};

export const fromEnvironment = (env: NodeJS.ProcessEnv): Record<string, unknown> => {
    const values: Record<string, unknown> = {};
    if (env.PORT) {
        const port = Number.parseInt(env.PORT, 10);
        if (!Number.isNaN(port)) values.port = port;
    }
    if (env.VIDSCORE_SCRATCH_DIR) {
        values.scratchDirectory = env.VIDSCORE_SCRATCH_DIR;
    }
    return values;
};

const merge = (...layers: Record<string, unknown>[]): Record<string, unknown> => {
    const result: Record<string, unknown> = {};
    for (const layer of layers) {
        for (const [key, value] of Object.entries(layer)) {
            if (value === undefined) continue;
            const existing = result[key];
            result[key] = isRecord(existing) && isRecord(value) ? merge(existing, value) : value;
        }
    }
    return result;
};

export const parseConfig = (raw: unknown): Config => {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${issues}`);
    }
    return result.data;
};

export const load = async (options: LoadOptions = {}): Promise<[Config, SecureConfig]> => {
    const env = options.env ?? process.env;
    const filePath = options.configFile
        ? path.resolve(options.cwd ?? process.cwd(), options.configFile)
        : path.resolve(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
    const fromFile = await readConfigFile(filePath, Boolean(options.configFile));

    const config = parseConfig(merge(fromFile, fromEnvironment(env), options.overrides ?? {}));
    const secureConfig = SecureConfigSchema.parse({ openaiApiKey: env.OPENAI_API_KEY });
    return [config, secureConfig];
};
