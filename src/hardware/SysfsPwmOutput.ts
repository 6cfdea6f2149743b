import fs from 'fs';
import path from 'path';
import { logger } from '../utils/logger';
import { PwmCalibration } from './DutyCycleCodec';
import { PwmOutput, PwmOutputFactory, ServoDescriptor } from './PwmOutput';
import { ConfigurationInvalidError, HardwareFaultError, describeError } from './ServoErrors';

export const DEFAULT_SYSFS_ROOT = '/sys/class/pwm';

export interface SysfsPwmOptions {
    root?: string;
    chip: number;
    channel: number;
}

/**
 * Drives one channel of the Linux PWM class (/sys/class/pwm/pwmchipN/pwmM).
 * All values written to sysfs are in nanoseconds.
 */
export class SysfsPwmOutput implements PwmOutput {
    public readonly pin: number;
    private readonly calibration: PwmCalibration;
    private readonly chipDir: string;
    private readonly channelDir: string;
    private readonly channel: number;
    private readonly periodNs: number;
    private exportedByUs: boolean = false;
    private _dutyCycle: number;
    private _closed: boolean = false;

    constructor(pin: number, calibration: PwmCalibration, options: SysfsPwmOptions) {
        this.pin = pin;
        this.calibration = calibration;
        this.channel = options.channel;
        this.chipDir = path.join(options.root ?? DEFAULT_SYSFS_ROOT, `pwmchip${options.chip}`);
        this.channelDir = path.join(this.chipDir, `pwm${options.channel}`);
        this.periodNs = Math.round(1e9 / calibration.frequency);
        this._dutyCycle = calibration.centerDutyCycle;

        if (!fs.existsSync(this.chipDir)) {
            throw new HardwareFaultError(`PWM chip not available at ${this.chipDir}`);
        }

        try {
            if (!fs.existsSync(this.channelDir)) {
                fs.writeFileSync(path.join(this.chipDir, 'export'), String(this.channel));
                this.exportedByUs = true;
            }
            if (!fs.existsSync(this.channelDir)) {
                throw new Error(`channel directory ${this.channelDir} did not appear after export`);
            }
            this.writeAttribute('period', this.periodNs);
            this.writeAttribute('duty_cycle', this.toNanoseconds(this._dutyCycle));
            this.writeAttribute('enable', 1);
        } catch (error) {
            throw new HardwareFaultError(`Failed to claim PWM channel ${this.channel} for pin ${pin}: ${describeError(error)}`, error);
        }

        logger.debug(`SysfsPwmOutput: Pin ${pin} bound to ${this.channelDir} (period ${this.periodNs}ns)`);
    }

    public get dutyCycle(): number {
        return this._dutyCycle;
    }

    public get closed(): boolean {
        return this._closed;
    }

    public async write(dutyCycle: number): Promise<void> {
        if (this._closed) {
            throw new HardwareFaultError(`PWM output on pin ${this.pin} is closed`);
        }
        const { minDutyCycle, maxDutyCycle } = this.calibration;
        if (dutyCycle < minDutyCycle || dutyCycle > maxDutyCycle) {
            throw new HardwareFaultError(`Duty cycle ${dutyCycle} outside ${minDutyCycle}..${maxDutyCycle} on pin ${this.pin}`);
        }
        await fs.promises.writeFile(path.join(this.channelDir, 'duty_cycle'), String(this.toNanoseconds(dutyCycle)));
        this._dutyCycle = dutyCycle;
    }

    public close(): void {
        if (this._closed) return;
        this._closed = true;
        this.writeAttribute('enable', 0);
        if (this.exportedByUs) {
            fs.writeFileSync(path.join(this.chipDir, 'unexport'), String(this.channel));
        }
        logger.debug(`SysfsPwmOutput: Released ${this.channelDir}`);
    }

    private toNanoseconds(dutyCycle: number): number {
        return Math.round(dutyCycle * this.periodNs);
    }

    private writeAttribute(name: string, value: number) {
        fs.writeFileSync(path.join(this.channelDir, name), String(value));
    }
}

export function createSysfsOutputFactory(chip: number, root: string = DEFAULT_SYSFS_ROOT): PwmOutputFactory {
    return (descriptor: ServoDescriptor, calibration: PwmCalibration) => {
        if (descriptor.channel === undefined) {
            throw new ConfigurationInvalidError(`Servo ${descriptor.id} has no PWM channel configured`, [
                `hardware.servos.${descriptor.id}.channel`
            ]);
        }
        return new SysfsPwmOutput(descriptor.pin, calibration, { root, chip, channel: descriptor.channel });
    };
}
