import { describe, it, expect } from 'vitest';
import {
    DEFAULT_CALIBRATION,
    PwmCalibration,
    clampSpeed,
    dutyCycleToSpeed,
    speedToDutyCycle
} from '../src/hardware/DutyCycleCodec';
import { OutOfRangeError, ServoErrorType, classifyServoError } from '../src/hardware/ServoErrors';

const SPEEDS = Array.from({ length: 41 }, (_, i) => (i - 20) / 20);

describe('DutyCycleCodec', () => {
    it('maps the speed endpoints onto the calibration', () => {
        expect(speedToDutyCycle(0)).toBe(0.0696);
        expect(speedToDutyCycle(1)).toBeCloseTo(0.10, 12);
        expect(speedToDutyCycle(-1)).toBeCloseTo(0.05, 12);
    });

    it('interpolates each half of the range separately', () => {
        // 0.0696 + 0.5 * (0.10 - 0.0696)
        expect(speedToDutyCycle(0.5)).toBeCloseTo(0.0848, 12);
        // 0.0696 - 0.5 * (0.0696 - 0.05)
        expect(speedToDutyCycle(-0.5)).toBeCloseTo(0.0598, 12);
    });

    it('round-trips every valid speed', () => {
        for (const speed of SPEEDS) {
            const back = dutyCycleToSpeed(speedToDutyCycle(speed));
            expect(Math.abs(back - speed)).toBeLessThan(1e-9);
        }
    });

    it('is monotonic and stays within the duty cycle bounds', () => {
        let previous = -Infinity;
        for (const speed of SPEEDS) {
            const duty = speedToDutyCycle(speed);
            expect(duty).toBeGreaterThanOrEqual(previous);
            expect(duty).toBeGreaterThanOrEqual(DEFAULT_CALIBRATION.minDutyCycle - 1e-12);
            expect(duty).toBeLessThanOrEqual(DEFAULT_CALIBRATION.maxDutyCycle + 1e-12);
            previous = duty;
        }
    });

    it('rejects speeds outside [-1, 1]', () => {
        expect(() => speedToDutyCycle(1.5)).toThrow(OutOfRangeError);
        expect(() => speedToDutyCycle(-1.01)).toThrow(OutOfRangeError);
        expect(() => speedToDutyCycle(Number.NaN)).toThrow(OutOfRangeError);

        let caught: unknown;
        try {
            speedToDutyCycle(1.5);
        } catch (error) {
            caught = error;
        }
        expect(classifyServoError(caught)).toBe(ServoErrorType.OUT_OF_RANGE);
    });

    it('returns exactly zero for the center duty cycle', () => {
        expect(dutyCycleToSpeed(0.0696)).toBe(0);
    });

    it('rejects duty cycles outside the calibration', () => {
        expect(() => dutyCycleToSpeed(0.2)).toThrow(OutOfRangeError);
        expect(() => dutyCycleToSpeed(0.04)).toThrow(OutOfRangeError);
    });

    it('uses the calibration it is given', () => {
        const calibration: PwmCalibration = {
            frequency: 50,
            centerDutyCycle: 0.075,
            minDutyCycle: 0.05,
            maxDutyCycle: 0.1
        };
        expect(speedToDutyCycle(0, calibration)).toBe(0.075);
        expect(speedToDutyCycle(0.5, calibration)).toBeCloseTo(0.0875, 12);
        expect(dutyCycleToSpeed(0.0625, calibration)).toBeCloseTo(-0.5, 12);
    });

    it('clamps speeds to a symmetric limit', () => {
        expect(clampSpeed(1.5)).toBe(1);
        expect(clampSpeed(-0.9, 0.8)).toBe(-0.8);
        expect(clampSpeed(0.3, 0.8)).toBe(0.3);
        expect(clampSpeed(0.5, 2)).toBe(0.5);
    });
});
