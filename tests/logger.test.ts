import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import winston from 'winston';
import { LoggingConfigSchema } from '../src/config/schema';
import { DEFAULT_LINE_TEMPLATE, configureLogger, logger, parseByteSize, renderLine } from '../src/utils/logger';

describe('parseByteSize', () => {
    it('understands the usual units', () => {
        expect(parseByteSize('10MB')).toBe(10485760);
        expect(parseByteSize('512kb')).toBe(524288);
        expect(parseByteSize('1.5 GB')).toBe(1610612736);
        expect(parseByteSize('100')).toBe(100);
        expect(parseByteSize('64B')).toBe(64);
    });

    it('rejects anything else', () => {
        expect(() => parseByteSize('ten megabytes')).toThrow('Invalid size "ten megabytes"');
        expect(() => parseByteSize('5TB')).toThrow();
    });
});

describe('renderLine', () => {
    const fields = { timestamp: '2026-01-01 00:00:00', level: 'info', message: 'ServoController: Created' };

    it('renders the default template', () => {
        expect(renderLine(DEFAULT_LINE_TEMPLATE, fields)).toBe('2026-01-01 00:00:00 [info]: ServoController: Created');
    });

    it('renders a configured template and leaves unknown placeholders alone', () => {
        expect(renderLine('{timestamp} - {level} - {name} - {message}', fields))
            .toBe('2026-01-01 00:00:00 - info - {name} - ServoController: Created');
    });

    it('defaults the config key to the built-in template', () => {
        expect(LoggingConfigSchema.parse({}).format).toBe(DEFAULT_LINE_TEMPLATE);
    });
});

describe('configureLogger', () => {
    const tmpDirs: string[] = [];

    afterEach(() => {
        logger.configure({ level: 'info', transports: [new winston.transports.Console({ silent: true })] });
        for (const dir of tmpDirs.splice(0)) {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    it('applies the level and drops disabled sinks', () => {
        configureLogger(LoggingConfigSchema.parse({ level: 'DEBUG', console_enabled: false, file_enabled: false }));

        expect(logger.level).toBe('debug');
        expect(logger.transports).toHaveLength(0);
    });

    it('adds a size-capped file sink and an error file', () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'servo-arm-logs-'));
        tmpDirs.push(dir);

        configureLogger(LoggingConfigSchema.parse({
            console_enabled: false,
            file_path: path.join(dir, 'arm.log'),
            max_file_size: '1MB',
            backup_count: 3
        }));

        expect(logger.transports).toHaveLength(2);
        const [main, errors] = logger.transports;
        expect(main).toBeInstanceOf(winston.transports.File);
        expect(main).toMatchObject({ filename: 'arm.log', dirname: dir, maxsize: 1048576, maxFiles: 3 });
        expect(errors).toMatchObject({ filename: 'error.log', level: 'error' });
    });
});
