import { z } from 'zod';
import type { Direction, ServoStatus } from '../hardware/ServoController';

export const ServoStartRequestSchema = z.object({
    direction: z.enum(['forward', 'backward'])
});

export const ServoSpeedRequestSchema = z.object({
    speed: z.number().min(-1.0).max(1.0)
});

export type ServoStartRequest = z.infer<typeof ServoStartRequestSchema>;
export type ServoSpeedRequest = z.infer<typeof ServoSpeedRequestSchema>;

export interface ServoStartResponse {
    success: true;
    servo_id: string;
    direction: Direction;
    message?: string;
    timestamp: string;
}

export interface ServoSpeedResponse {
    success: true;
    servo_id: string;
    speed: number;
    message?: string;
}

export interface ServoStatusPayload {
    status: 'running' | 'stopped';
    direction: Direction | null;
    runtime: number;
    speed: number;
    is_running: boolean;
}

export interface SystemStatusResponse {
    system_status: 'running' | 'emergency_stop';
    emergency_stop_active: boolean;
    servos: Record<string, ServoStatusPayload>;
    timestamp: string;
}

export interface ErrorResponse {
    success: false;
    error: string;
    details?: string[];
    requestId?: string;
}

export function toStatusPayload(status: ServoStatus, now: number): ServoStatusPayload {
    let direction: Direction | null = null;
    if (status.speed > 0) direction = 'forward';
    else if (status.speed < 0) direction = 'backward';

    return {
        status: status.isRunning ? 'running' : 'stopped',
        direction,
        runtime: status.runningSince !== undefined ? Math.max(0, now - status.runningSince) / 1000 : 0,
        speed: status.speed,
        is_running: status.isRunning
    };
}

export function toStatusPayloads(statuses: Record<string, ServoStatus>, now: number): Record<string, ServoStatusPayload> {
    const payloads: Record<string, ServoStatusPayload> = {};
    for (const [id, status] of Object.entries(statuses)) {
        payloads[id] = toStatusPayload(status, now);
    }
    return payloads;
}
