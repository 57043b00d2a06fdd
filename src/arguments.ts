import * as fs from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import { PROGRAM_NAME, VERSION } from '@/constants';
import { InputError, errorMessage } from '@/errors';
import type { ConfigInput } from '@/config';
import type { MediaSource } from '@/acquisition';

export interface CommonOptions {
    config?: string;
    verbose?: boolean;
    debug?: boolean;
}

export interface ServeOptions extends CommonOptions {
    port?: string;
    host?: string;
}

export interface CompareOptions extends CommonOptions {
    topic: string;
    summaryMaxLength?: string;
    itemTimeout?: string;
}

export interface Handlers {
    serve(options: ServeOptions): Promise<void>;
    compare(inputs: string[], options: CompareOptions): Promise<void>;
}

const parseInteger = (value: string, flag: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InputError(`${flag} must be an integer, got "${value}"`);
    }
    return parsed;
};

/**
 * Config overrides for the flags that were given; absent flags leave the
 * file and environment values in place.
 */
export const toOverrides = (options: ServeOptions & Partial<CompareOptions>): ConfigInput => {
    const overrides: ConfigInput = {};
    if (options.verbose) overrides.verbose = true;
    if (options.debug) overrides.debug = true;
    if (options.port !== undefined) overrides.port = parseInteger(options.port, '--port');
    if (options.host !== undefined) overrides.host = options.host;
    if (options.summaryMaxLength !== undefined) {
        overrides.summaryMaxLength = parseInteger(options.summaryMaxLength, '--summary-max-length');
    }
    if (options.itemTimeout !== undefined) {
        overrides.itemTimeoutMs = parseInteger(options.itemTimeout, '--item-timeout') * 1000;
    }
    return overrides;
};

export const isRemote = (input: string): boolean => /^https?:\/\//i.test(input);

/**
 * URLs are downloaded; anything else is a local file read the same way as an upload.
 */
export const toSources = async (inputs: string[]): Promise<MediaSource[]> => Promise.all(inputs.map(async (input): Promise<MediaSource> => {
    if (isRemote(input)) {
        return { kind: 'url', url: input };
    }
    try {
        const blob = await fs.openAsBlob(input);
        return { kind: 'upload', filename: path.basename(input), blob };
    } catch (error) {
        throw new InputError(`Cannot open ${input}: ${errorMessage(error)}`, { cause: error });
    }
}));

export const createProgram = (handlers: Handlers): Command => {
    const program = new Command();
    program
        .name(PROGRAM_NAME)
        .summary('Rank videos by how well their content covers a topic')
        .version(VERSION);

    program
        .command('serve')
        .description('start the HTTP API')
        .option('-p, --port <port>', 'port to listen on (env: PORT)')
        .option('--host <address>', 'address to bind to')
        .option('-c, --config <path>', 'configuration file')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .action((options: ServeOptions) => handlers.serve(options));

    program
        .command('compare')
        .description('compare local video files and/or URLs, printing the report as JSON')
        .argument('<sources...>', 'video files or URLs')
        .requiredOption('-t, --topic <topic>', 'topic to score the videos against')
        .option('--summary-max-length <tokens>', 'upper bound of each summary in tokens')
        .option('--item-timeout <seconds>', 'time limit for each video, 0 for none')
        .option('-c, --config <path>', 'configuration file')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .action((inputs: string[], options: CompareOptions) => handlers.compare(inputs, options));

    return program;
};
