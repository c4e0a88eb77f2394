import path from 'path';
import winston from 'winston';

const logLevel = process.env.LOG_LEVEL || 'info';
const logDir = process.env.LOG_DIR || 'logs';

const lineFormat = winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    let log = `${timestamp} [${level}]: ${message}`;

    if (Object.keys(meta).length > 0) {
        log += ` ${JSON.stringify(meta)}`;
    }

    if (stack) {
        log += `\n${stack}`;
    }

    return log;
});

const baseFormat = winston.format.combine(
    winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true })
);

export const logger = winston.createLogger({
    level: logLevel,
    silent: process.env.NODE_ENV === 'test',

    format: baseFormat,

    transports: [
        new winston.transports.Console({
            level: logLevel,
            format: winston.format.combine(winston.format.colorize({ all: true }), lineFormat)
        })
    ]
});

// Audit trail: fetch failures, missing records, decisions and saved results.
if (process.env.NODE_ENV !== 'test') {
    logger.add(new winston.transports.File({
        filename: path.join(logDir, 'integration.log'),
        format: lineFormat
    }));
}
