// Logger - winston singleton shared by every component
// Console output by default; a size-rotated file is added once config is loaded

import path from 'path';
import fs from 'fs';
import winston from 'winston';
import { LoggingConfig } from './types';

const { combine, timestamp, errors, splat, printf } = winston.format;

const lineFormat = printf(({ level, message, timestamp: ts, stack }) => {
    const base = `${ts} ${level.toUpperCase().padEnd(5)} ${message}`;
    return typeof stack === 'string' ? `${base}\n${stack}` : base;
});

const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: combine(
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        errors({ stack: true }),
        splat(),
        lineFormat
    ),
    transports: [new winston.transports.Console()],
});

/**
 * Apply the logging section of the copier config. LOG_LEVEL in the
 * environment still wins over the file.
 */
export function configureLogging(config: LoggingConfig): void {
    logger.level = process.env.LOG_LEVEL || config.level;

    if (config.filePath) {
        if (!config.consoleOutput) {
            logger.clear();
        }
        const dir = path.dirname(config.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        logger.add(new winston.transports.File({
            filename: config.filePath,
            maxsize: config.maxFileSizeMb * 1024 * 1024,
            maxFiles: config.backupCount + 1,
            tailable: true,
        }));
    }
}

export default logger;
