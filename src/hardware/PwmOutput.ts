import { PwmCalibration } from './DutyCycleCodec';

export interface ServoDescriptor {
    id: string;
    name: string;
    pin: number;
    channel?: number;
}

/**
 * A PWM output pin owned by exactly one servo. Writes may complete
 * synchronously or return a promise; the controller awaits both.
 */
export interface PwmOutput {
    readonly pin: number;
    readonly dutyCycle: number;
    readonly closed: boolean;
    write(dutyCycle: number): void | Promise<void>;
    close(): void | Promise<void>;
}

/**
 * Builds the output for a servo at its center duty cycle. Throws when the
 * pin cannot be claimed; construction is synchronous so initialize can fail fast.
 */
export type PwmOutputFactory = (descriptor: ServoDescriptor, calibration: PwmCalibration) => PwmOutput;
