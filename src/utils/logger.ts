import winston from 'winston';
import type Transport from 'winston-transport';
import path from 'path';
import type { LoggingConfig } from '../config/schema';

const { combine, timestamp, printf, colorize } = winston.format;

export const DEFAULT_LINE_TEMPLATE = '{timestamp} [{level}]: {message}';

/**
 * Fill a line template such as "{timestamp} - {level} - {message}".
 * Unknown placeholders are left as written.
 */
export function renderLine(template: string, fields: { timestamp: string; level: string; message: string }): string {
    return template.replace(/\{(timestamp|level|message)\}/g, (_match, key: 'timestamp' | 'level' | 'message') => fields[key]);
}

function createLineFormat(template: string) {
    return printf(({ level, message, timestamp }) =>
        renderLine(template, { timestamp: String(timestamp), level, message: String(message) })
    );
}

const lineFormat = createLineFormat(DEFAULT_LINE_TEMPLATE);

const DEFAULT_DATE_FORMAT = 'YYYY-MM-DD HH:mm:ss';

export const logger = winston.createLogger({
    level: process.env.LOG_LEVEL || 'info',
    format: timestamp({ format: DEFAULT_DATE_FORMAT }),
    transports: [
        new winston.transports.Console({ format: combine(colorize(), lineFormat) })
    ],
});

const SIZE_UNITS: Record<string, number> = {
    b: 1,
    kb: 1024,
    mb: 1024 * 1024,
    gb: 1024 * 1024 * 1024
};

/**
 * Parse sizes such as "10MB" or "512 kb" into bytes.
 */
export function parseByteSize(value: string): number {
    const match = /^\s*(\d+(?:\.\d+)?)\s*([kmg]?b)?\s*$/i.exec(value);
    if (!match) {
        throw new Error(`Invalid size "${value}"`);
    }
    const unit = (match[2] || 'b').toLowerCase();
    return Math.floor(parseFloat(match[1]) * SIZE_UNITS[unit]);
}

/**
 * Rebuild the logger's transports from the logging section of the config file.
 */
export function configureLogger(config: LoggingConfig): void {
    const transports: Transport[] = [];
    const configuredFormat = createLineFormat(config.format);

    if (config.console_enabled) {
        transports.push(new winston.transports.Console({ format: combine(colorize(), configuredFormat) }));
    }

    if (config.file_enabled) {
        const dir = path.dirname(config.file_path);
        transports.push(new winston.transports.File({
            dirname: dir,
            filename: path.basename(config.file_path),
            maxsize: parseByteSize(config.max_file_size),
            maxFiles: config.backup_count,
            tailable: true,
            format: configuredFormat
        }));
        transports.push(new winston.transports.File({
            dirname: dir,
            filename: 'error.log',
            level: 'error',
            format: configuredFormat
        }));
    }

    logger.configure({
        level: config.level,
        format: timestamp({ format: config.date_format }),
        transports,
    });
}
