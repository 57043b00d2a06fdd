import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import * as fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import * as Config from '@/config';
import { DEFAULT_CONFIG_FILE, DEFAULT_ITEM_TIMEOUT_MS, DEFAULT_SCRATCH_DIRECTORY } from '@/constants';

describe('Configuration', () => {
    let cwd: string;

    beforeEach(async () => {
        cwd = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
    });

    afterEach(async () => {
        await fs.promises.rm(cwd, { recursive: true, force: true });
    });

    const writeConfig = (content: string, name: string = DEFAULT_CONFIG_FILE) =>
        fs.promises.writeFile(path.join(cwd, name), content, 'utf8');

    test('defaults apply when there is no config file or environment', async () => {
        const [config, secureConfig] = await Config.load({ cwd, env: {} });

        expect(config.port).toBe(8000);
        expect(config.host).toBe('127.0.0.1');
        expect(config.scratchDirectory).toBe(DEFAULT_SCRATCH_DIRECTORY);
        expect(config.transcriptionModel).toBe('whisper-1');
        expect(config.summarizationModel).toBe('gpt-4o-mini');
        expect(config.embeddingModel).toBe('text-embedding-3-small');
        expect(config.summaryMaxLength).toBe(180);
        expect(config.inputTokenBudget).toBe(900);
        expect(config.itemTimeoutMs).toBe(DEFAULT_ITEM_TIMEOUT_MS);
        expect(config.download).toEqual({
            binary: 'yt-dlp',
            retries: 3,
            socketTimeoutSeconds: 30,
            playerClients: ['android', 'web'],
            settleAttempts: 10,
            settleIntervalMs: 200,
        });
        expect(secureConfig.openaiApiKey).toBeUndefined();
    });

    test('file values merge into nested defaults', async () => {
        await writeConfig('port: 9000\ndownload:\n  retries: 5\n');

        const [config] = await Config.load({ cwd, env: {} });

        expect(config.port).toBe(9000);
        expect(config.download.retries).toBe(5);
        expect(config.download.socketTimeoutSeconds).toBe(30);
    });

    test('environment overrides the file and overrides win over both', async () => {
        await writeConfig('port: 9000\nscratchDirectory: /from/file\n');
        const env = { PORT: '9100', VIDSCORE_SCRATCH_DIR: '/from/env', OPENAI_API_KEY: 'test-secret' };

        const [fromEnv, secureConfig] = await Config.load({ cwd, env });
        const [fromOverrides] = await Config.load({ cwd, env, overrides: { port: 9200 } });

        expect(fromEnv.port).toBe(9100);
        expect(fromEnv.scratchDirectory).toBe('/from/env');
        expect(secureConfig.openaiApiKey).toBe('test-secret');
        expect(fromOverrides.port).toBe(9200);
    });

    test('a non-numeric PORT is ignored', () => {
        expect(Config.fromEnvironment({ PORT: 'abc' })).toEqual({});
    });

    test('an explicit config file must exist', async () => {
        await expect(Config.load({ cwd, env: {}, configFile: 'missing.yaml' }))
            .rejects.toThrow(`Cannot read config file ${path.join(cwd, 'missing.yaml')}`);
    });

    test('an explicit config file is read relative to cwd', async () => {
        await writeConfig('summaryMaxLength: 120\n', 'custom.yaml');

        const [config] = await Config.load({ cwd, env: {}, configFile: 'custom.yaml' });

        expect(config.summaryMaxLength).toBe(120);
    });

    test('an empty config file counts as no values', async () => {
        await writeConfig('');

        const [config] = await Config.load({ cwd, env: {} });

        expect(config.port).toBe(8000);
    });

    test('a config file that is not a mapping is rejected', async () => {
        await writeConfig('- port\n- host\n');

        await expect(Config.load({ cwd, env: {} })).rejects.toBeInstanceOf(Config.ConfigError);
    });

    test('invalid values are reported with their path', () => {
        expect(() => Config.parseConfig({ port: 'abc', download: { retries: -1 } }))
            .toThrow('Invalid configuration: port: Expected number, received string; download.retries: Number must be greater than or equal to 0');
    });
});
