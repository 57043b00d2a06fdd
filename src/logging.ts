import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export interface LogContext {
    [key: string]: unknown;
}

const createLogger = (level: string = 'info'): winston.Logger => {
    let format = winston.format.combine(
        winston.format.timestamp(),
        winston.format.splat(),
        winston.format.errors({ stack: true }),
        winston.format.printf(({ timestamp, level, message, service: _service, ...meta }) => {
            const metaString = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} ${level}: ${message}${metaString}`;
        }),
    );

    // Plain messages at info; timestamps and metadata only when digging deeper
    if (level === 'info') {
        format = winston.format.combine(
            winston.format.splat(),
            winston.format.errors({ stack: true }),
            winston.format.printf(({ message }) => `${message}`),
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console({
                // Keep stdout free for command output such as JSON reports
                stderrLevels: ['error', 'warn', 'info', 'verbose', 'debug', 'silly'],
            }),
        ],
    });
};

let logger = createLogger();

export const setLogLevel = (level: string): void => {
    logger = createLogger(level);
};

export const getLogger = (): winston.Logger => logger;
