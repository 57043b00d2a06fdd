#!/usr/bin/env node
import 'dotenv/config';
import * as Arguments from '@/arguments';
import * as Config from '@/config';
import * as Logging from '@/logging';
import * as Pipeline from '@/pipeline';
import * as Services from '@/services';
import { startServer } from '@/server';
import { toWire, toWireSkip } from '@/server/app';
import { AggregateFailure, describeError } from '@/errors';

const configure = async (options: Arguments.ServeOptions & Partial<Arguments.CompareOptions>) => {
    const [config, secureConfig] = await Config.load({
        configFile: options.config,
        overrides: Arguments.toOverrides(options),
    });
    if (config.debug) {
        Logging.setLogLevel('debug');
    } else if (config.verbose) {
        Logging.setLogLevel('verbose');
    }

    const logger = Logging.getLogger();
    logger.debug('Configuration: %s', JSON.stringify(config));
    if (!secureConfig.openaiApiKey) {
        logger.warn('OPENAI_API_KEY is not set; transcription, summarization and embedding requests will fail');
    }
    return { config, services: Services.create(config, secureConfig) };
};

const serve = async (options: Arguments.ServeOptions): Promise<void> => {
    const { config, services } = await configure(options);
    await startServer(config, services);
};

const compare = async (inputs: string[], options: Arguments.CompareOptions): Promise<void> => {
    const { config, services } = await configure(options);
    await services.scratch.ensure();
    const pipeline = Pipeline.create({
        summaryMaxLength: config.summaryMaxLength,
        itemTimeoutMs: config.itemTimeoutMs,
    }, services);

    try {
        const report = await pipeline.compare({ topic: options.topic, sources: await Arguments.toSources(inputs) });
        process.stdout.write(`${JSON.stringify(toWire(report), null, 2)}\n`);
    } catch (error) {
        if (!(error instanceof AggregateFailure)) {
            throw error;
        }
        process.stdout.write(`${JSON.stringify({ error: error.message, skipped: error.skipped.map(toWireSkip) }, null, 2)}\n`);
        process.exitCode = 1;
    }
};

Arguments.createProgram({ serve, compare }).parseAsync().catch((error: unknown) => {
    Logging.getLogger().error('%s', describeError(error));
    process.exit(1);
});
