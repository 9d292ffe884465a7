import { Logger } from 'winston';
import { BufferState, BufferUpdate } from '../types';
import { Clock, systemClock } from './clock';
import { assertNonNegative } from './errors';
import logger from '../utils/logger';

export interface PlaybackBufferOptions {
    clock?: Clock;
    initialLevelSeconds?: number;
    loggerInstance?: Logger;
}

/**
 * Simulated playback buffer. Elapsed download time drains it, completed segments refill it.
 *
 * Each update debits before it credits, so a segment that arrives late cannot hide the stall
 * that happened while it was in flight. The credit is applied after the stall check, which lets
 * a single update both open and close a stall.
 */
export class PlaybackBufferModel {
    private levelSeconds: number;
    private rebufferCount = 0;
    private totalRebufferSeconds = 0;
    private rebufferStartedAt: number | undefined;
    private readonly clock: Clock;
    private readonly logger: Logger;

    constructor(options: PlaybackBufferOptions = {}) {
        const initialLevelSeconds = options.initialLevelSeconds ?? 0;
        assertNonNegative(initialLevelSeconds, 'Initial buffer level');
        this.levelSeconds = initialLevelSeconds;
        this.clock = options.clock ?? systemClock;
        this.logger = options.loggerInstance || logger;
    }

    public update(elapsedSeconds: number, segmentDurationSeconds: number, isSegmentComplete: boolean): BufferUpdate {
        const result = this.preview(elapsedSeconds, segmentDurationSeconds, isSegmentComplete);
        this.commit(result);
        return result;
    }

    /** Outcome of an update at the current clock time, leaving the model untouched. */
    public preview(elapsedSeconds: number, segmentDurationSeconds: number, isSegmentComplete: boolean): BufferUpdate {
        assertNonNegative(elapsedSeconds, 'Elapsed time');
        assertNonNegative(segmentDurationSeconds, 'Segment duration');

        let { levelSeconds, rebufferCount, totalRebufferSeconds, rebufferStartedAt } = this;
        let wasRebuffering = false;
        let stallResolved = false;

        if (levelSeconds > 0) {
            levelSeconds = Math.max(0, levelSeconds - elapsedSeconds);
        }

        if (levelSeconds <= 0 && rebufferStartedAt === undefined) {
            rebufferStartedAt = this.clock.now();
            rebufferCount++;
            wasRebuffering = true;
        }

        if (isSegmentComplete) {
            levelSeconds += segmentDurationSeconds;
        }

        if (rebufferStartedAt !== undefined && levelSeconds > 0) {
            totalRebufferSeconds += (this.clock.now() - rebufferStartedAt) / 1000;
            rebufferStartedAt = undefined;
            stallResolved = true;
        }

        const state: BufferState = { levelSeconds, rebufferCount, totalRebufferSeconds };
        if (rebufferStartedAt !== undefined) {
            state.rebufferStartedAt = rebufferStartedAt;
        }
        return { wasRebuffering, stallResolved, state };
    }

    /** Applies an outcome obtained from `preview`. */
    public commit({ wasRebuffering, stallResolved, state }: BufferUpdate): void {
        const stalledSeconds = state.totalRebufferSeconds - this.totalRebufferSeconds;
        this.levelSeconds = state.levelSeconds;
        this.rebufferCount = state.rebufferCount;
        this.totalRebufferSeconds = state.totalRebufferSeconds;
        this.rebufferStartedAt = state.rebufferStartedAt;

        if (wasRebuffering) {
            this.logger.warn(`Playback stalled (rebuffer #${this.rebufferCount})`);
        }
        if (stallResolved) {
            this.logger.info(`Playback resumed after ${stalledSeconds.toFixed(3)}s stall`);
        }
    }

    public getState(): BufferState {
        const state: BufferState = {
            levelSeconds: this.levelSeconds,
            rebufferCount: this.rebufferCount,
            totalRebufferSeconds: this.totalRebufferSeconds,
        };
        if (this.rebufferStartedAt !== undefined) {
            state.rebufferStartedAt = this.rebufferStartedAt;
        }
        return state;
    }
}
