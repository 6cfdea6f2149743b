import { ConfigManager } from '../config/ConfigManager';
import { PwmOutputFactory } from './PwmOutput';
import { ServoController } from './ServoController';
import { createSimulatedOutput } from './SimulatedPwmOutput';
import { createSysfsOutputFactory } from './SysfsPwmOutput';

export function createOutputFactory(config: ConfigManager): PwmOutputFactory {
    const hardware = config.getHardwareConfig();
    if (hardware.driver === 'sysfs') {
        return createSysfsOutputFactory(hardware.sysfs.chip, hardware.sysfs.root);
    }
    return createSimulatedOutput;
}

/**
 * Wire a controller to the servos, calibration and safety limits in the config.
 * Descriptors are re-read on every initialize().
 */
export function createController(config: ConfigManager): ServoController {
    return new ServoController({
        loadDescriptors: () => config.getServoDescriptors(),
        calibration: config.getCalibration(),
        safety: config.getSafetyConfig(),
        createOutput: createOutputFactory(config)
    });
}
