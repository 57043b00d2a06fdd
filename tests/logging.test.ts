import { afterAll, beforeEach, describe, expect, test, vi } from 'vitest';
import winston from 'winston';
import { getLogger, setLogLevel, type LogContext } from '@/logging';
import { PROGRAM_NAME } from '@/constants';

const createLoggerSpy = vi.spyOn(winston, 'createLogger');

describe('Logging module', () => {
    beforeEach(() => {
        createLoggerSpy.mockClear();
    });

    afterAll(() => {
        setLogLevel('error');
    });

    test('getLogger returns a logger instance', () => {
        const logger = getLogger();
        expect(typeof logger.info).toBe('function');
        expect(typeof logger.warn).toBe('function');
        expect(typeof logger.error).toBe('function');
        expect(typeof logger.debug).toBe('function');
    });

    test('setLogLevel creates a new logger with the level and service metadata', () => {
        setLogLevel('debug');

        expect(createLoggerSpy).toHaveBeenCalledTimes(1);
        const options = createLoggerSpy.mock.calls[0][0];
        expect(options?.level).toBe('debug');
        expect(options?.defaultMeta).toEqual({ service: PROGRAM_NAME });
        expect(getLogger().level).toBe('debug');
    });

    test('info level uses a different format than the other levels', () => {
        setLogLevel('info');
        setLogLevel('verbose');

        expect(createLoggerSpy).toHaveBeenCalledTimes(2);
        const infoOptions = createLoggerSpy.mock.calls[0][0];
        const verboseOptions = createLoggerSpy.mock.calls[1][0];
        expect(infoOptions?.level).toBe('info');
        expect(verboseOptions?.level).toBe('verbose');
        expect(infoOptions?.format).not.toBe(verboseOptions?.format);
    });

    test('the logger replaced by setLogLevel is the one getLogger returns', () => {
        setLogLevel('warn');
        const first = getLogger();
        setLogLevel('error');
        const second = getLogger();

        expect(first).not.toBe(second);
        expect(second.level).toBe('error');
    });

    test('logging with placeholders and context does not throw', () => {
        setLogLevel('debug');
        const logger = getLogger();
        const infoSpy = vi.spyOn(logger, 'info');
        const context: LogContext = { requestId: 'req-1' };

        expect(() => {
            logger.info('Saved %s (%d bytes)', 'a.mp4', 42, context);
            logger.debug('No metadata');
        }).not.toThrow();
        expect(infoSpy).toHaveBeenCalledWith('Saved %s (%d bytes)', 'a.mp4', 42, context);
    });
});
