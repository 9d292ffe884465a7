import { Timestamp } from '../types';

export interface Clock {
    now(): Timestamp;
}

export const systemClock: Clock = {
    now: () => Date.now(),
};

/** Clock that only moves when told to. Used for simulations and tests. */
export class ManualClock implements Clock {
    private current: Timestamp;

    constructor(start: Timestamp = 0) {
        this.current = start;
    }

    public now(): Timestamp {
        return this.current;
    }

    public advance(ms: number): Timestamp {
        if (ms < 0) {
            throw new RangeError(`Cannot move a clock backwards (${ms}ms)`);
        }
        this.current += ms;
        return this.current;
    }

    public advanceSeconds(seconds: number): Timestamp {
        return this.advance(seconds * 1000);
    }

    public set(timestamp: Timestamp): void {
        this.current = timestamp;
    }
}
