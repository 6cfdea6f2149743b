import { logger } from '../utils/logger';
import { PwmCalibration } from './DutyCycleCodec';
import { PwmOutput, PwmOutputFactory, ServoDescriptor } from './PwmOutput';
import { HardwareFaultError } from './ServoErrors';

/**
 * In-memory PWM output for development machines without a PWM controller.
 * Keeps the same contract as the real drivers: range-checked writes, no writes after close.
 */
export class SimulatedPwmOutput implements PwmOutput {
    public readonly pin: number;
    private readonly calibration: PwmCalibration;
    private _dutyCycle: number;
    private _closed: boolean = false;

    constructor(pin: number, calibration: PwmCalibration) {
        this.pin = pin;
        this.calibration = calibration;
        this._dutyCycle = calibration.centerDutyCycle;
        logger.debug(`SimulatedPwmOutput: Claimed pin ${pin} at ${calibration.frequency}Hz`);
    }

    public get dutyCycle(): number {
        return this._dutyCycle;
    }

    public get closed(): boolean {
        return this._closed;
    }

    public write(dutyCycle: number): void {
        if (this._closed) {
            throw new HardwareFaultError(`PWM output on pin ${this.pin} is closed`);
        }
        const { minDutyCycle, maxDutyCycle } = this.calibration;
        if (dutyCycle < minDutyCycle || dutyCycle > maxDutyCycle) {
            throw new HardwareFaultError(`Duty cycle ${dutyCycle} outside ${minDutyCycle}..${maxDutyCycle} on pin ${this.pin}`);
        }
        this._dutyCycle = dutyCycle;
    }

    public close(): void {
        if (this._closed) return;
        this._closed = true;
        logger.debug(`SimulatedPwmOutput: Released pin ${this.pin}`);
    }
}

export const createSimulatedOutput: PwmOutputFactory = (descriptor: ServoDescriptor, calibration: PwmCalibration) =>
    new SimulatedPwmOutput(descriptor.pin, calibration);
