export enum ServoErrorType {
    OUT_OF_RANGE = 'out_of_range',
    NOT_FOUND = 'not_found',
    EMERGENCY_STOP_ACTIVE = 'emergency_stop_active',
    HARDWARE_FAULT = 'hardware_fault',
    CONFIGURATION_INVALID = 'configuration_invalid'
}

/**
 * Base class for every fault the servo core knows how to name.
 * The controller catches these at its boundary and turns them into boolean results.
 */
export class ServoError extends Error {
    public readonly type: ServoErrorType;

    constructor(type: ServoErrorType, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.type = type;
    }
}

export class OutOfRangeError extends ServoError {
    constructor(message: string) {
        super(ServoErrorType.OUT_OF_RANGE, message);
    }
}

export class ServoNotFoundError extends ServoError {
    public readonly servoId: string;

    constructor(servoId: string) {
        super(ServoErrorType.NOT_FOUND, `Servo ${servoId} not found`);
        this.servoId = servoId;
    }
}

export class EmergencyStopActiveError extends ServoError {
    constructor() {
        super(ServoErrorType.EMERGENCY_STOP_ACTIVE, 'Emergency stop active');
    }
}

export class HardwareFaultError extends ServoError {
    constructor(message: string, cause?: unknown) {
        super(ServoErrorType.HARDWARE_FAULT, message, { cause });
    }
}

export class ConfigurationInvalidError extends ServoError {
    public readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(ServoErrorType.CONFIGURATION_INVALID, message);
        this.issues = issues;
    }
}

/**
 * Anything that is not already a ServoError came from below the core,
 * so it is a hardware fault as far as callers are concerned.
 */
export function classifyServoError(error: unknown): ServoErrorType {
    if (error instanceof ServoError) return error.type;
    return ServoErrorType.HARDWARE_FAULT;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
