import { logger } from '../utils/logger';
import { PwmOutput, ServoDescriptor } from './PwmOutput';
import { describeError } from './ServoErrors';

export interface ServoRuntimeState {
    speed: number;
    isRunning: boolean;
    runningSince?: number;
}

interface ServoEntry {
    descriptor: ServoDescriptor;
    output?: PwmOutput;
    state?: ServoRuntimeState;
}

/**
 * In-memory map of servo id → descriptor, owned output and runtime state.
 * Not synchronized on its own; ServoController is the only caller and holds the lock.
 */
export class ServoRegistry {
    private entries: Map<string, ServoEntry> = new Map();

    public register(id: string, descriptor: ServoDescriptor): void {
        const existing = this.entries.get(id);
        this.entries.set(id, { ...existing, descriptor });
    }

    public get(id: string): ServoDescriptor | undefined {
        return this.entries.get(id)?.descriptor;
    }

    public has(id: string): boolean {
        return this.entries.has(id);
    }

    public get size(): number {
        return this.entries.size;
    }

    public ids(): string[] {
        return Array.from(this.entries.keys());
    }

    /**
     * Hand ownership of an output to the registry and start the servo in the stopped state.
     */
    public attach(id: string, output: PwmOutput): void {
        const entry = this.entries.get(id);
        if (!entry) {
            throw new Error(`Cannot attach output to unregistered servo ${id}`);
        }
        entry.output = output;
        entry.state = { speed: 0.0, isRunning: false };
    }

    public getOutput(id: string): PwmOutput | undefined {
        return this.entries.get(id)?.output;
    }

    public getState(id: string): ServoRuntimeState | undefined {
        const state = this.entries.get(id)?.state;
        return state ? { ...state } : undefined;
    }

    /**
     * Record the speed the output is now running at. Keeps speed == 0 ⇔ !isRunning.
     */
    public updateState(id: string, speed: number, now: number = Date.now()): void {
        const entry = this.entries.get(id);
        if (!entry?.state) return;

        const wasRunning = entry.state.isRunning;
        const isRunning = speed !== 0;
        entry.state = {
            speed: isRunning ? speed : 0.0,
            isRunning,
            runningSince: isRunning ? (wasRunning ? entry.state.runningSince : now) : undefined
        };
    }

    /**
     * Release every output. A close that fails is logged and the rest still run.
     */
    public async closeAll(): Promise<void> {
        for (const [id, entry] of this.entries) {
            if (!entry.output) continue;
            try {
                await entry.output.close();
            } catch (error) {
                logger.error(`ServoRegistry: Failed to release output for servo ${id}: ${describeError(error)}`);
            }
            entry.output = undefined;
        }
    }

    /**
     * Drop every descriptor and runtime state. Call closeAll first if outputs are attached.
     */
    public clear(): void {
        this.entries.clear();
    }
}
