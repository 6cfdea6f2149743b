import { OutOfRangeError } from './ServoErrors';

/**
 * Calibration for a continuous rotation servo driven by PWM.
 * Duty cycles are fractions of the PWM period (pulse width / period).
 */
export interface PwmCalibration {
    frequency: number;
    centerDutyCycle: number;
    minDutyCycle: number;
    maxDutyCycle: number;
}

// 50Hz period is 20ms: 1.0ms = full reverse, 2.0ms = full forward,
// ~1.392ms measured as the stop point on the reference servos.
export const DEFAULT_CALIBRATION: PwmCalibration = {
    frequency: 50,
    centerDutyCycle: 0.0696,
    minDutyCycle: 0.05,
    maxDutyCycle: 0.10
};

export const MIN_SPEED = -1.0;
export const MAX_SPEED = 1.0;

/**
 * Map a speed in [-1, 1] onto the calibrated duty cycle range.
 * Positive speeds interpolate center→max, negative speeds min→center.
 */
export function speedToDutyCycle(speed: number, calibration: PwmCalibration = DEFAULT_CALIBRATION): number {
    assertValidSpeed(speed);

    const { centerDutyCycle: center, minDutyCycle: min, maxDutyCycle: max } = calibration;

    if (speed === 0) return center;
    if (speed > 0) return center + speed * (max - center);
    return center + speed * (center - min);
}

/**
 * Inverse of speedToDutyCycle.
 */
export function dutyCycleToSpeed(dutyCycle: number, calibration: PwmCalibration = DEFAULT_CALIBRATION): number {
    const { centerDutyCycle: center, minDutyCycle: min, maxDutyCycle: max } = calibration;

    if (!Number.isFinite(dutyCycle) || dutyCycle < min || dutyCycle > max) {
        throw new OutOfRangeError(`Duty cycle must be between ${min} and ${max}, got ${dutyCycle}`);
    }

    if (dutyCycle === center) return 0.0;
    if (dutyCycle > center) return (dutyCycle - center) / (max - center);
    return (dutyCycle - center) / (center - min);
}

export function assertValidSpeed(speed: number): void {
    if (!Number.isFinite(speed) || speed < MIN_SPEED || speed > MAX_SPEED) {
        throw new OutOfRangeError(`Speed must be between ${MIN_SPEED} and ${MAX_SPEED}, got ${speed}`);
    }
}

export function clampSpeed(speed: number, limit: number = MAX_SPEED): number {
    const bound = Math.min(Math.abs(limit), MAX_SPEED);
    return Math.max(-bound, Math.min(bound, speed));
}
