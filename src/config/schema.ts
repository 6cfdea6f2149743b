import { z } from 'zod';

export const ServoConfigSchema = z.object({
    name: z.string().min(1),
    pin: z.number().int().min(0),
    channel: z.number().int().min(0).optional()
});

export type ServoConfig = z.infer<typeof ServoConfigSchema>;

export const PwmConfigSchema = z.object({
    frequency: z.number().positive().default(50),
    center_duty_cycle: z.number().gt(0).lt(1).default(0.0696),
    min_duty_cycle: z.number().gt(0).lt(1).default(0.05),
    max_duty_cycle: z.number().gt(0).lt(1).default(0.10)
}).refine(
    (pwm) => pwm.min_duty_cycle < pwm.center_duty_cycle && pwm.center_duty_cycle < pwm.max_duty_cycle,
    { message: 'Duty cycles must satisfy min < center < max' }
);

export const HardwareConfigSchema = z.object({
    driver: z.enum(['simulated', 'sysfs']).default('simulated'),
    pwm: PwmConfigSchema.default({}),
    sysfs: z.object({
        root: z.string().default('/sys/class/pwm'),
        chip: z.number().int().min(0).default(0)
    }).default({}),
    gpio: z.record(z.string(), z.unknown()).default({}),
    servos: z.record(z.string(), ServoConfigSchema).default({})
});

export type HardwareConfig = z.infer<typeof HardwareConfigSchema>;

export const SafetyConfigSchema = z.object({
    enabled: z.boolean().default(true),
    emergency_stop_enabled: z.boolean().default(true),
    bounds_checking_enabled: z.boolean().default(true),
    speed_limiting_enabled: z.boolean().default(true),
    timeout_protection_enabled: z.boolean().default(true),
    command_timeout: z.number().int().min(100).max(30000).default(5000),
    movement_timeout: z.number().int().min(1000).max(60000).default(10000),
    emergency_stop_timeout: z.number().int().min(50).max(1000).default(100),
    global_max_speed: z.number().min(0).max(100).default(100),
    global_max_acceleration: z.number().min(0).max(100).default(100),
    power_monitoring_enabled: z.boolean().default(false),
    max_current_draw: z.number().min(0.1).max(10).default(2.0),
    voltage_monitoring_enabled: z.boolean().default(false),
    min_voltage: z.number().min(3).max(6).default(4.5)
});

export type SafetyConfig = z.infer<typeof SafetyConfigSchema>;

export const CorsConfigSchema = z.object({
    enabled: z.boolean().default(true),
    allowed_origins: z.array(z.string()).default(['*']),
    allowed_methods: z.array(z.string()).default(['GET', 'POST', 'PUT', 'DELETE']),
    allowed_headers: z.array(z.string()).default(['*'])
});

export const RateLimitingConfigSchema = z.object({
    enabled: z.boolean().default(true),
    requests_per_minute: z.number().int().min(1).max(1000).default(60),
    burst_limit: z.number().int().min(1).max(100).default(10)
});

// Parsed and reported only; nothing enforces it yet.
export const AuthenticationConfigSchema = z.object({
    enabled: z.boolean().default(false),
    api_key_required: z.boolean().default(false),
    jwt_enabled: z.boolean().default(false)
});

export const ApiConfigSchema = z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().min(1024).max(65535).default(8000),
    debug: z.boolean().default(false),
    cors: CorsConfigSchema.default({}),
    rate_limiting: RateLimitingConfigSchema.default({}),
    authentication: AuthenticationConfigSchema.default({})
});

export type ApiConfig = z.infer<typeof ApiConfigSchema>;

// Also accepts WARNING/CRITICAL/FATAL spellings used by older config files.
const LOG_LEVEL_ALIASES: Record<string, string> = {
    warning: 'warn',
    critical: 'error',
    fatal: 'error'
};

export const LogLevelSchema = z.string()
    .transform((level) => level.toLowerCase())
    .transform((level) => LOG_LEVEL_ALIASES[level] ?? level)
    .pipe(z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']));

export const LoggingConfigSchema = z.object({
    level: LogLevelSchema.default('info'),
    file_enabled: z.boolean().default(true),
    file_path: z.string().default('logs/servo_arm.log'),
    max_file_size: z.string().default('10MB'),
    backup_count: z.number().int().min(1).max(20).default(5),
    console_enabled: z.boolean().default(true),
    // Line template; {timestamp}, {level} and {message} are substituted
    format: z.string().min(1).default('{timestamp} [{level}]: {message}'),
    date_format: z.string().default('YYYY-MM-DD HH:mm:ss')
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const SystemConfigSchema = z.object({
    name: z.string().default('Servo Arm Control'),
    version: z.string().default('1.0.0'),
    description: z.string().default('REST API for controlling a robotic arm')
}).passthrough();

export type SystemConfig = z.infer<typeof SystemConfigSchema>;

export const AppConfigSchema = z.object({
    system: SystemConfigSchema.default({}),
    hardware: HardwareConfigSchema.default({}),
    safety: SafetyConfigSchema.default({}),
    api: ApiConfigSchema.default({}),
    logging: LoggingConfigSchema.default({}),
    mcp: z.record(z.string(), z.unknown()).optional()
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
