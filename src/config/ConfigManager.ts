import fs from 'fs';
import yaml from 'yaml';
import path from 'path';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';
import { PwmCalibration } from '../hardware/DutyCycleCodec';
import { ServoDescriptor } from '../hardware/PwmOutput';
import { ConfigurationInvalidError, describeError } from '../hardware/ServoErrors';
import {
    ApiConfig,
    AppConfig,
    AppConfigSchema,
    HardwareConfig,
    LoggingConfig,
    SafetyConfig,
    ServoConfig,
    SystemConfig
} from './schema';

export const CONFIG_PATH_ENV = 'SERVO_ARM_CONFIG';
export const DEFAULT_CONFIG_PATH = path.join('config', 'config.yaml');

/**
 * Loads config/config.yaml, applies environment overrides and validates the
 * result. Constructed once at startup and passed to whatever needs it.
 */
export class ConfigManager {
    private configPath: string;
    private config: AppConfig;

    constructor(customPath?: string) {
        // custom > env > ./config/config.yaml
        this.configPath = path.resolve(process.cwd(), customPath || process.env[CONFIG_PATH_ENV] || DEFAULT_CONFIG_PATH);
        this.config = this.loadConfig();
    }

    private loadConfig(): AppConfig {
        if (!fs.existsSync(this.configPath)) {
            throw new ConfigurationInvalidError(`Configuration file not found: ${this.configPath}`);
        }

        let raw: unknown;
        try {
            raw = yaml.parse(fs.readFileSync(this.configPath, 'utf8'));
        } catch (error) {
            throw new ConfigurationInvalidError(`Failed to parse ${this.configPath}: ${describeError(error)}`);
        }

        if (!raw || typeof raw !== 'object') {
            throw new ConfigurationInvalidError(`Configuration file is empty or invalid: ${this.configPath}`);
        }

        try {
            const config = AppConfigSchema.parse(this.applyEnvOverrides(raw));
            logger.info(`ConfigManager: Loaded config from ${this.configPath}`);
            return config;
        } catch (error) {
            if (error instanceof ZodError) {
                const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
                logger.error(`ConfigManager: Configuration validation failed: ${issues.join('; ')}`);
                throw new ConfigurationInvalidError(`Configuration validation failed for ${this.configPath}`, issues);
            }
            throw error;
        }
    }

    private applyEnvOverrides(raw: object): object {
        const api: Record<string, unknown> = { ...this.section(raw, 'api') };
        const logging: Record<string, unknown> = { ...this.section(raw, 'logging') };

        if (process.env.API_HOST) api.host = process.env.API_HOST;
        if (process.env.API_PORT) api.port = Number(process.env.API_PORT);
        if (process.env.LOG_LEVEL) logging.level = process.env.LOG_LEVEL;

        return { ...raw, api, logging };
    }

    private section(raw: object, key: string): object {
        const value: unknown = Object.getOwnPropertyDescriptor(raw, key)?.value;
        return value && typeof value === 'object' ? value : {};
    }

    public reload(): void {
        logger.info('ConfigManager: Reloading configuration...');
        this.config = this.loadConfig();
    }

    public getConfigPath(): string {
        return this.configPath;
    }

    public getServoConfig(servoId: string): ServoConfig | undefined {
        return this.config.hardware.servos[servoId];
    }

    public getAllServos(): Record<string, ServoConfig> {
        return { ...this.config.hardware.servos };
    }

    public getServoDescriptors(): ServoDescriptor[] {
        return Object.entries(this.config.hardware.servos).map(([id, servo]) => ({
            id,
            name: servo.name,
            pin: servo.pin,
            channel: servo.channel
        }));
    }

    public getCalibration(): PwmCalibration {
        const pwm = this.config.hardware.pwm;
        return {
            frequency: pwm.frequency,
            centerDutyCycle: pwm.center_duty_cycle,
            minDutyCycle: pwm.min_duty_cycle,
            maxDutyCycle: pwm.max_duty_cycle
        };
    }

    public getSafetyConfig(): SafetyConfig {
        return this.config.safety;
    }

    public getApiConfig(): ApiConfig {
        return this.config.api;
    }

    public getLoggingConfig(): LoggingConfig {
        return this.config.logging;
    }

    public getSystemConfig(): SystemConfig {
        return this.config.system;
    }

    public getHardwareConfig(): HardwareConfig {
        return this.config.hardware;
    }

    public isSafetyEnabled(): boolean {
        return this.config.safety.enabled;
    }

    public isEmergencyStopEnabled(): boolean {
        return this.config.safety.emergency_stop_enabled;
    }

    public getServoCount(): number {
        return Object.keys(this.config.hardware.servos).length;
    }

    public toJSON(): AppConfig {
        return structuredClone(this.config);
    }
}
