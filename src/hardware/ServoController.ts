import { logger } from '../utils/logger';
import { Mutex } from '../utils/Mutex';
import { SafetyConfig } from '../config/schema';
import { PwmCalibration, assertValidSpeed, clampSpeed, speedToDutyCycle } from './DutyCycleCodec';
import { PwmOutput, PwmOutputFactory, ServoDescriptor } from './PwmOutput';
import { ServoRegistry } from './ServoRegistry';
import { HardwareFaultError, classifyServoError, describeError } from './ServoErrors';

export type Direction = 'forward' | 'backward';

export type InitializeOutcome =
    | { status: 'initialized'; count: number }
    | { status: 'no_servos' }
    | { status: 'failed'; servoId?: string; error: string };

export interface ServoStatus {
    speed: number;
    isRunning: boolean;
    runningSince?: number;
}

export interface ControllerSnapshot {
    emergencyStopActive: boolean;
    servos: Record<string, ServoStatus>;
}

export interface ServoControllerOptions {
    /** Read at every initialize() so a reloaded config takes effect. */
    loadDescriptors: () => ServoDescriptor[];
    calibration: PwmCalibration;
    safety: SafetyConfig;
    createOutput: PwmOutputFactory;
    now?: () => number;
}

export function isInitialized(outcome: InitializeOutcome): outcome is Extract<InitializeOutcome, { status: 'initialized' }> {
    return outcome.status === 'initialized';
}

/**
 * Sole owner of the servo outputs and the emergency stop interlock.
 *
 * Every public method runs under one exclusive lock for its whole duration,
 * so an emergency stop is totally ordered with any in-flight speed change.
 * Faults never escape: they are logged and reported as a false/failed result.
 * Methods suffixed `Locked` assume the caller already holds the lock.
 */
export class ServoController {
    private readonly registry = new ServoRegistry();
    private readonly mutex = new Mutex();
    private readonly loadDescriptors: () => ServoDescriptor[];
    private readonly calibration: PwmCalibration;
    private readonly safety: SafetyConfig;
    private readonly createOutput: PwmOutputFactory;
    private readonly now: () => number;
    private emergencyStopActive: boolean = false;

    constructor(options: ServoControllerOptions) {
        this.loadDescriptors = options.loadDescriptors;
        this.calibration = options.calibration;
        this.safety = options.safety;
        this.createOutput = options.createOutput;
        this.now = options.now ?? Date.now;
        logger.info('ServoController: Created');
    }

    public initialize(): Promise<InitializeOutcome> {
        return this.mutex.lock<InitializeOutcome>(async () => {
            await this.releaseLocked();

            let descriptors: ServoDescriptor[];
            try {
                descriptors = this.loadDescriptors();
            } catch (error) {
                logger.error(`ServoController: Could not read servo configuration: ${describeError(error)}`);
                return { status: 'failed', error: describeError(error) };
            }

            if (descriptors.length === 0) {
                logger.warn('ServoController: No servos configured');
                return { status: 'no_servos' };
            }

            for (const descriptor of descriptors) {
                try {
                    this.registry.register(descriptor.id, descriptor);
                    this.registry.attach(descriptor.id, this.createOutput(descriptor, this.calibration));
                    logger.info(`ServoController: Initialized servo ${descriptor.id} on pin ${descriptor.pin}`);
                } catch (error) {
                    logger.error(`ServoController: Failed to initialize servo ${descriptor.id}: ${describeError(error)}`);
                    await this.releaseLocked();
                    return { status: 'failed', servoId: descriptor.id, error: describeError(error) };
                }
            }

            logger.info(`ServoController: Successfully initialized ${this.registry.size} servos`);
            return { status: 'initialized', count: this.registry.size };
        });
    }

    public async setSpeed(servoId: string, speed: number): Promise<boolean> {
        return (await this.applySpeed(servoId, speed)) !== undefined;
    }

    /**
     * Like setSpeed, but resolves with the speed actually applied after the
     * safety limits, read under the same lock, or undefined on failure.
     */
    public applySpeed(servoId: string, speed: number): Promise<number | undefined> {
        return this.mutex.lock(() => this.setSpeedLocked(servoId, speed, this.commandTimeout()));
    }

    /**
     * Run at full speed in the given direction; the configured speed limit still applies.
     */
    public start(servoId: string, direction: Direction): Promise<boolean> {
        return this.setSpeed(servoId, direction === 'forward' ? 1.0 : -1.0);
    }

    public stop(servoId: string): Promise<boolean> {
        return this.setSpeed(servoId, 0.0);
    }

    public stopAll(): Promise<boolean> {
        return this.mutex.lock(() => this.stopAllLocked(this.commandTimeout()));
    }

    public emergencyStop(): Promise<boolean> {
        if (this.mutex.isLocked) {
            logger.warn('ServoController: Emergency stop queued behind a command in progress');
        }
        return this.mutex.lock(async () => {
            this.emergencyStopActive = true;
            logger.warn('ServoController: Emergency stop activated');
            const stopped = await this.stopAllLocked(this.emergencyStopTimeout());
            if (!stopped) {
                logger.error('ServoController: Emergency stop could not halt every servo');
            }
            return stopped;
        });
    }

    public clearEmergencyStop(): Promise<boolean> {
        return this.mutex.lock(() => {
            if (this.emergencyStopActive) {
                logger.info('ServoController: Emergency stop cleared');
            }
            this.emergencyStopActive = false;
            return true;
        });
    }

    public isEmergencyStopActive(): Promise<boolean> {
        return this.mutex.lock(() => this.emergencyStopActive);
    }

    public status(servoId: string): Promise<ServoStatus | undefined> {
        return this.mutex.lock(() => this.statusLocked(servoId));
    }

    public statusAll(): Promise<Record<string, ServoStatus>> {
        return this.mutex.lock(() => this.statusAllLocked());
    }

    /**
     * Interlock flag and every servo's status, read under a single lock acquisition.
     */
    public snapshot(): Promise<ControllerSnapshot> {
        return this.mutex.lock(() => ({
            emergencyStopActive: this.emergencyStopActive,
            servos: this.statusAllLocked()
        }));
    }

    /**
     * Stop everything, then release every output. Release runs even if stopping throws.
     */
    public cleanup(): Promise<void> {
        return this.mutex.lock(async () => {
            try {
                await this.stopAllLocked(this.emergencyStopTimeout());
            } finally {
                await this.releaseLocked();
                logger.info('ServoController: Released all servo outputs');
            }
        });
    }

    private async setSpeedLocked(servoId: string, speed: number, timeoutMs?: number): Promise<number | undefined> {
        if (this.emergencyStopActive && speed !== 0) {
            logger.warn(`ServoController: Cannot set speed of ${servoId} while emergency stop is active`);
            return undefined;
        }

        const output = this.registry.getOutput(servoId);
        if (!output) {
            logger.error(`ServoController: Servo ${servoId} not found`);
            return undefined;
        }

        try {
            const applied = this.applySafetyLimits(speed);
            const dutyCycle = speedToDutyCycle(applied, this.calibration);
            await this.writeOutput(servoId, output, dutyCycle, timeoutMs);
            this.registry.updateState(servoId, applied, this.now());
            logger.info(`ServoController: Set servo ${servoId} speed to ${applied.toFixed(2)}`);
            return applied;
        } catch (error) {
            logger.error(`ServoController: Failed to set servo ${servoId} speed (${classifyServoError(error)}): ${describeError(error)}`);
            return undefined;
        }
    }

    private async stopAllLocked(timeoutMs?: number): Promise<boolean> {
        let success = true;
        for (const id of this.registry.ids()) {
            if ((await this.setSpeedLocked(id, 0.0, timeoutMs)) === undefined) {
                success = false;
            }
        }
        return success;
    }

    private statusLocked(servoId: string): ServoStatus | undefined {
        const state = this.registry.getState(servoId);
        if (!state) return undefined;
        return { speed: state.speed, isRunning: state.isRunning, runningSince: state.runningSince };
    }

    private statusAllLocked(): Record<string, ServoStatus> {
        const snapshot: Record<string, ServoStatus> = {};
        for (const id of this.registry.ids()) {
            const status = this.statusLocked(id);
            if (status) snapshot[id] = status;
        }
        return snapshot;
    }

    private async releaseLocked(): Promise<void> {
        await this.registry.closeAll();
        this.registry.clear();
    }

    private applySafetyLimits(speed: number): number {
        if (this.safety.bounds_checking_enabled) {
            assertValidSpeed(speed);
        }
        let applied = clampSpeed(speed);
        if (this.safety.enabled && this.safety.speed_limiting_enabled) {
            const limit = this.safety.global_max_speed / 100;
            if (Math.abs(applied) > limit) {
                logger.warn(`ServoController: Speed ${applied.toFixed(2)} limited to ${limit.toFixed(2)}`);
                applied = clampSpeed(applied, limit);
            }
        }
        // Avoid -0 leaking into state and responses
        return applied === 0 ? 0.0 : applied;
    }

    private async writeOutput(servoId: string, output: PwmOutput, dutyCycle: number, timeoutMs?: number): Promise<void> {
        const write = Promise.resolve().then(() => output.write(dutyCycle));
        if (timeoutMs === undefined) {
            await write;
            return;
        }

        let timer: NodeJS.Timeout | undefined;
        const timeoutError = new HardwareFaultError(`Write to servo ${servoId} timed out after ${timeoutMs}ms`);
        const timeout = new Promise<never>((_resolve, reject) => {
            timer = setTimeout(() => reject(timeoutError), timeoutMs);
        });
        try {
            await Promise.race([write, timeout]);
        } catch (error) {
            if (error === timeoutError) this.restoreAfterLateWrite(servoId, output, write);
            throw error;
        } finally {
            clearTimeout(timer);
        }
    }

    /**
     * A write that timed out may still land later and overwrite a newer duty
     * cycle, an emergency stop included. Once it settles, write the duty cycle
     * of the recorded state again.
     */
    private restoreAfterLateWrite(servoId: string, output: PwmOutput, write: Promise<void>): void {
        const restore = () => this.mutex.lock(() => this.restoreLocked(servoId, output));
        write
            .then(restore, (error: unknown) => {
                logger.warn(`ServoController: Timed out write to servo ${servoId} failed late: ${describeError(error)}`);
                return restore();
            })
            .catch((error: unknown) => {
                logger.error(`ServoController: Could not restore servo ${servoId} after a late write: ${describeError(error)}`);
            });
    }

    private async restoreLocked(servoId: string, output: PwmOutput): Promise<void> {
        // Outputs released or replaced since then are not ours to touch
        if (output.closed || this.registry.getOutput(servoId) !== output) return;
        const state = this.registry.getState(servoId);
        if (!state) return;

        const dutyCycle = speedToDutyCycle(state.speed, this.calibration);
        logger.warn(`ServoController: Restoring servo ${servoId} to speed ${state.speed.toFixed(2)} after a late write`);
        await this.writeOutput(servoId, output, dutyCycle, this.emergencyStopTimeout());
    }

    private commandTimeout(): number | undefined {
        return this.timeoutsEnabled() ? this.safety.command_timeout : undefined;
    }

    private emergencyStopTimeout(): number | undefined {
        return this.timeoutsEnabled() ? this.safety.emergency_stop_timeout : undefined;
    }

    private timeoutsEnabled(): boolean {
        return this.safety.enabled && this.safety.timeout_protection_enabled;
    }
}
