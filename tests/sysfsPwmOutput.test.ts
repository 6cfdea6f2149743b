import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import { DEFAULT_CALIBRATION } from '../src/hardware/DutyCycleCodec';
import { SysfsPwmOutput, createSysfsOutputFactory } from '../src/hardware/SysfsPwmOutput';
import { ConfigurationInvalidError, HardwareFaultError } from '../src/hardware/ServoErrors';

vi.mock('../src/utils/logger', () => ({
    logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() }
}));

describe('SysfsPwmOutput', () => {
    let root: string;
    let channelDir: string;

    const read = (name: string) => fs.readFileSync(path.join(channelDir, name), 'utf8');

    beforeEach(() => {
        root = fs.mkdtempSync(path.join(os.tmpdir(), 'servo-arm-pwm-'));
        channelDir = path.join(root, 'pwmchip0', 'pwm0');
        fs.mkdirSync(channelDir, { recursive: true });
    });

    afterEach(() => {
        fs.rmSync(root, { recursive: true, force: true });
    });

    it('programs the period and center duty cycle in nanoseconds', () => {
        new SysfsPwmOutput(18, DEFAULT_CALIBRATION, { root, chip: 0, channel: 0 });

        expect(read('period')).toBe('20000000');
        expect(read('duty_cycle')).toBe('1392000');
        expect(read('enable')).toBe('1');
    });

    it('writes duty cycles and remembers the last one', async () => {
        const output = new SysfsPwmOutput(18, DEFAULT_CALIBRATION, { root, chip: 0, channel: 0 });

        await output.write(0.1);

        expect(read('duty_cycle')).toBe('2000000');
        expect(output.dutyCycle).toBe(0.1);
    });

    it('refuses duty cycles outside the calibration', async () => {
        const output = new SysfsPwmOutput(18, DEFAULT_CALIBRATION, { root, chip: 0, channel: 0 });

        await expect(output.write(0.2)).rejects.toThrow(HardwareFaultError);
        expect(read('duty_cycle')).toBe('1392000');
    });

    it('disables the channel on close and refuses later writes', async () => {
        const output = new SysfsPwmOutput(18, DEFAULT_CALIBRATION, { root, chip: 0, channel: 0 });

        output.close();

        expect(read('enable')).toBe('0');
        expect(output.closed).toBe(true);
        expect(fs.existsSync(path.join(root, 'pwmchip0', 'unexport'))).toBe(false);
        await expect(output.write(0.08)).rejects.toThrow('closed');
    });

    it('fails when the chip does not exist', () => {
        expect(() => new SysfsPwmOutput(18, DEFAULT_CALIBRATION, { root, chip: 3, channel: 0 })).toThrow(HardwareFaultError);
    });

    it('exports a channel that is not yet available', () => {
        expect(() => new SysfsPwmOutput(19, DEFAULT_CALIBRATION, { root, chip: 0, channel: 1 })).toThrow(
            'Failed to claim PWM channel 1 for pin 19'
        );
        expect(fs.readFileSync(path.join(root, 'pwmchip0', 'export'), 'utf8')).toBe('1');
    });

    it('needs a channel on every servo', () => {
        const factory = createSysfsOutputFactory(0, root);

        expect(() => factory({ id: 'base', name: 'base', pin: 18 }, DEFAULT_CALIBRATION)).toThrow(ConfigurationInvalidError);
        expect(factory({ id: 'base', name: 'base', pin: 18, channel: 0 }, DEFAULT_CALIBRATION).pin).toBe(18);
    });
});
