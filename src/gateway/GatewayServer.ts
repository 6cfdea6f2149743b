/**
 * Servo Arm REST Gateway
 *
 * Translates REST calls into ServoController operations and controller
 * state into response payloads. Holds no servo state of its own.
 */

import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import http from 'http';
import { AddressInfo } from 'net';
import cors from 'cors';
import crypto from 'crypto';
import { ZodType, ZodTypeDef } from 'zod';
import { ConfigManager } from '../config/ConfigManager';
import { ServoController, isInitialized } from '../hardware/ServoController';
import { logger } from '../utils/logger';
import {
    ErrorResponse,
    ServoSpeedRequestSchema,
    ServoStartRequestSchema,
    SystemStatusResponse,
    toStatusPayloads
} from './models';
import { RateLimiter } from './RateLimiter';

export interface GatewayConfig {
    port: number;
    host: string;
    corsEnabled: boolean;
    corsOrigins: string[];
    corsMethods: string[];
    corsHeaders: string[];
    rateLimitEnabled: boolean;
    rateLimitPerMinute: number;
    rateLimitBurst: number;
}

export interface GatewayOptions extends Partial<GatewayConfig> {
    now?: () => number;
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const RATE_LIMIT_WINDOW_MS = 60_000;

export class GatewayServer {
    private app: express.Application;
    private server: http.Server;
    private controller: ServoController;
    private config: ConfigManager;
    private gatewayConfig: GatewayConfig;
    private now: () => number;
    private rateLimiter: RateLimiter;

    constructor(controller: ServoController, config: ConfigManager, options: GatewayOptions = {}) {
        this.controller = controller;
        this.config = config;
        this.now = options.now ?? Date.now;

        const api = config.getApiConfig();
        this.gatewayConfig = {
            port: options.port ?? api.port,
            host: options.host ?? api.host,
            corsEnabled: options.corsEnabled ?? api.cors.enabled,
            corsOrigins: options.corsOrigins ?? api.cors.allowed_origins,
            corsMethods: options.corsMethods ?? api.cors.allowed_methods,
            corsHeaders: options.corsHeaders ?? api.cors.allowed_headers,
            rateLimitEnabled: options.rateLimitEnabled ?? api.rate_limiting.enabled,
            rateLimitPerMinute: options.rateLimitPerMinute ?? api.rate_limiting.requests_per_minute,
            rateLimitBurst: options.rateLimitBurst ?? api.rate_limiting.burst_limit
        };

        this.rateLimiter = new RateLimiter(
            this.gatewayConfig.rateLimitPerMinute + this.gatewayConfig.rateLimitBurst,
            RATE_LIMIT_WINDOW_MS
        );

        this.app = express();
        this.server = http.createServer(this.app);

        this.setupMiddleware();
        this.setupRoutes();
    }

    private setupMiddleware() {
        this.app.disable('x-powered-by');

        // Request id and timing; X-Process-Time is written by respond()
        this.app.use((req: Request, res: Response, next: NextFunction) => {
            const requestId = String(req.headers['x-request-id'] || crypto.randomUUID());
            res.locals.requestId = requestId;
            res.locals.startedAt = process.hrtime.bigint();
            res.setHeader('X-Request-Id', requestId);
            logger.info(`Gateway: Request ${req.method} ${req.path} Client: ${req.ip || 'unknown'}`);
            res.on('finish', () => {
                logger.info(`Gateway: Response ${res.statusCode} for ${req.method} ${req.path} in ${this.elapsedSeconds(res).toFixed(3)}s`);
            });
            next();
        });

        if (this.gatewayConfig.corsEnabled) {
            const origins = this.gatewayConfig.corsOrigins;
            const headers = this.gatewayConfig.corsHeaders;
            this.app.use(cors({
                origin: origins.includes('*') ? '*' : origins,
                methods: this.gatewayConfig.corsMethods,
                // cors reflects the request's headers when allowedHeaders is unset
                allowedHeaders: headers.includes('*') ? undefined : headers
            }));
        }

        // Basic security headers
        this.app.use((_req: Request, res: Response, next: NextFunction) => {
            res.setHeader('X-Content-Type-Options', 'nosniff');
            res.setHeader('X-Frame-Options', 'SAMEORIGIN');
            res.setHeader('Referrer-Policy', 'no-referrer');
            res.setHeader('Cache-Control', 'no-store');
            next();
        });

        this.app.use(express.json({ limit: '100kb' }));

        if (this.gatewayConfig.rateLimitEnabled) {
            this.app.use('/api', (req: Request, res: Response, next: NextFunction) => {
                const ip = req.ip || req.socket.remoteAddress || 'unknown';
                if (this.rateLimiter.hit(ip, this.now())) {
                    this.fail(res, 429, 'Too many requests. Slow down and retry shortly.');
                    return;
                }
                next();
            });
        }
    }

    private getGatewayCapabilities() {
        return {
            transport: { restBase: '/api' },
            api: {
                status: ['GET /api/status', 'GET /api/health', 'GET /api/servos', 'GET /api/gateway/capabilities'],
                servos: [
                    'POST /api/servos/:id/start',
                    'POST /api/servos/:id/speed',
                    'POST /api/servos/:id/stop',
                    'POST /api/initialize'
                ],
                safety: ['POST /api/emergency-stop', 'POST /api/emergency-stop/clear']
            },
            authentication: this.config.getApiConfig().authentication
        };
    }

    private setupRoutes() {
        const router = express.Router();

        this.app.get('/', (_req: Request, res: Response) => {
            const system = this.config.getSystemConfig();
            this.respond(res, 200, {
                name: system.name,
                version: system.version,
                description: system.description,
                documentation: '/api/gateway/capabilities'
            });
        });

        // ===== STATUS & INFO =====
        router.get('/health', (_req: Request, res: Response) => {
            this.respond(res, 200, {
                status: 'ok',
                timestamp: new Date(this.now()).toISOString(),
                uptimeSeconds: Math.floor(process.uptime())
            });
        });

        router.get('/gateway/capabilities', (_req: Request, res: Response) => {
            this.respond(res, 200, this.getGatewayCapabilities());
        });

        router.get('/status', this.handle(async (_req, res) => {
            const { emergencyStopActive, servos } = await this.controller.snapshot();
            const now = this.now();
            const body: SystemStatusResponse = {
                system_status: emergencyStopActive ? 'emergency_stop' : 'running',
                emergency_stop_active: emergencyStopActive,
                servos: toStatusPayloads(servos, now),
                timestamp: new Date(now).toISOString()
            };
            this.respond(res, 200, body);
        }));

        router.get('/servos', this.handle(async (_req, res) => {
            const servos = await this.controller.statusAll();
            this.respond(res, 200, toStatusPayloads(servos, this.now()));
        }));

        // ===== SERVO CONTROL =====
        router.post('/servos/:id/start', this.handle(async (req, res) => {
            const servoId = req.params.id;
            const body = this.validate(ServoStartRequestSchema, req, res);
            if (!body) return;

            if (!(await this.controller.start(servoId, body.direction))) {
                this.fail(res, 400, `Failed to start servo ${servoId}`);
                return;
            }
            this.respond(res, 200, {
                success: true,
                servo_id: servoId,
                direction: body.direction,
                message: `Started servo ${servoId} ${body.direction}`,
                timestamp: new Date(this.now()).toISOString()
            });
        }));

        router.post('/servos/:id/speed', this.handle(async (req, res) => {
            const servoId = req.params.id;
            const body = this.validate(ServoSpeedRequestSchema, req, res);
            if (!body) return;

            // Echo the speed actually applied, which the speed limit may have reduced
            const speed = await this.controller.applySpeed(servoId, body.speed);
            if (speed === undefined) {
                this.fail(res, 400, `Failed to set speed for servo ${servoId}`);
                return;
            }
            this.respond(res, 200, {
                success: true,
                servo_id: servoId,
                speed,
                message: `Set servo ${servoId} speed to ${speed.toFixed(2)}`
            });
        }));

        router.post('/servos/:id/stop', this.handle(async (req, res) => {
            const servoId = req.params.id;
            if (!(await this.controller.stop(servoId))) {
                this.fail(res, 400, `Failed to stop servo ${servoId}`);
                return;
            }
            this.respond(res, 200, {
                success: true,
                servo_id: servoId,
                speed: 0.0,
                message: `Stopped servo ${servoId}`
            });
        }));

        // ===== SAFETY =====
        router.post('/emergency-stop', this.handle(async (_req, res) => {
            if (!(await this.controller.emergencyStop())) {
                this.fail(res, 500, 'Failed to execute emergency stop');
                return;
            }
            this.respond(res, 200, {
                success: true,
                servo_id: 'all',
                speed: 0.0,
                message: 'Emergency stop activated'
            });
        }));

        router.post('/emergency-stop/clear', this.handle(async (_req, res) => {
            await this.controller.clearEmergencyStop();
            this.respond(res, 200, {
                success: true,
                servo_id: 'all',
                speed: 0.0,
                message: 'Emergency stop cleared'
            });
        }));

        router.post('/initialize', this.handle(async (_req, res) => {
            const outcome = await this.controller.initialize();
            if (!isInitialized(outcome)) {
                if (outcome.status === 'no_servos') {
                    this.fail(res, 500, 'No servos configured');
                } else {
                    const target = outcome.servoId ? ` (servo ${outcome.servoId})` : '';
                    this.fail(res, 500, `Failed to initialize servos${target}`, [outcome.error]);
                }
                return;
            }
            this.respond(res, 200, {
                success: true,
                servo_id: 'all',
                speed: 0.0,
                message: `All servos initialized (${outcome.count})`
            });
        }));

        this.app.use('/api', router);

        this.app.use((req: Request, res: Response) => {
            this.fail(res, 404, `Route not found: ${req.method} ${req.path}`);
        });

        // express identifies error handlers by their four parameters
        this.app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
            const status = this.errorStatus(error);
            if (status >= 500) {
                logger.error(`Gateway: Unhandled error: ${error instanceof Error ? error.stack || error.message : String(error)}`);
            }
            this.fail(res, status, status >= 500 ? 'Internal server error' : 'Invalid request body');
        });
    }

    private handle(fn: AsyncHandler): RequestHandler {
        return (req, res, next) => {
            fn(req, res).catch(next);
        };
    }

    private validate<T>(schema: ZodType<T, ZodTypeDef, unknown>, req: Request, res: Response): T | undefined {
        const result = schema.safeParse(req.body ?? {});
        if (!result.success) {
            const details = result.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`);
            this.fail(res, 422, 'Request validation failed', details);
            return undefined;
        }
        return result.data;
    }

    private errorStatus(error: unknown): number {
        if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
            return error.status >= 400 && error.status < 600 ? error.status : 500;
        }
        return 500;
    }

    private elapsedSeconds(res: Response): number {
        const startedAt: unknown = res.locals.startedAt;
        if (typeof startedAt !== 'bigint') return 0;
        return Number(process.hrtime.bigint() - startedAt) / 1e9;
    }

    private respond(res: Response, status: number, body: object) {
        res.setHeader('X-Process-Time', this.elapsedSeconds(res).toFixed(6));
        res.status(status).json(body);
    }

    private fail(res: Response, status: number, error: string, details?: string[]) {
        const body: ErrorResponse = { success: false, error, requestId: String(res.locals.requestId) };
        if (details) body.details = details;
        if (status >= 500) logger.error(`Gateway: ${error}`);
        else logger.warn(`Gateway: ${error}`);
        this.respond(res, status, body);
    }

    public async start(): Promise<AddressInfo> {
        return new Promise((resolve, reject) => {
            this.server.once('error', reject);
            this.server.listen(this.gatewayConfig.port, this.gatewayConfig.host, () => {
                this.server.off('error', reject);
                const address = this.server.address();
                const bound: AddressInfo = address && typeof address === 'object'
                    ? address
                    : { address: this.gatewayConfig.host, port: this.gatewayConfig.port, family: 'IPv4' };
                logger.info(`Gateway server running at http://${bound.address}:${bound.port}`);
                resolve(bound);
            });
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server.listening) {
                resolve();
                return;
            }
            this.server.close((error) => {
                if (error) {
                    reject(error);
                    return;
                }
                logger.info('Gateway server stopped');
                resolve();
            });
        });
    }
}

export default GatewayServer;
