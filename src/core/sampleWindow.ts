import { InvalidInputError } from './errors';

/**
 * Bounded FIFO of recent samples. Pushing into a full window evicts the oldest sample.
 */
export class SampleWindow {
    private readonly samples: number[] = [];
    public readonly capacity: number;

    constructor(capacity: number) {
        if (!Number.isInteger(capacity) || capacity < 1) {
            throw new InvalidInputError(`Window capacity must be a positive integer (got ${capacity})`);
        }
        this.capacity = capacity;
    }

    public push(value: number): void {
        this.samples.push(value);
        if (this.samples.length > this.capacity) {
            this.samples.shift();
        }
    }

    /** Arithmetic mean of held samples, 0 when empty. */
    public mean(): number {
        if (this.samples.length === 0) {
            return 0;
        }
        return this.samples.reduce((sum, value) => sum + value, 0) / this.samples.length;
    }

    /** Mean and size the window would have after pushing `value`, without pushing it. */
    public peek(value: number): { mean: number; size: number } {
        const held = this.samples.length < this.capacity ? this.samples : this.samples.slice(1);
        return {
            mean: (held.reduce((sum, sample) => sum + sample, 0) + value) / (held.length + 1),
            size: held.length + 1,
        };
    }

    public get size(): number {
        return this.samples.length;
    }
}
