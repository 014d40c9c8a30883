import { Clock } from '../types';

export const systemClock: Clock = {
    now: () => Math.floor(Date.now() / 1000),
};

/**
 * Deterministic clock for tests and replays.
 */
export class ManualClock implements Clock {
    constructor(private current: number = 1_700_000_000) {}

    now(): number {
        return this.current;
    }

    set(timestamp: number): void {
        this.current = timestamp;
    }

    advance(seconds: number): void {
        this.current += seconds;
    }
}
