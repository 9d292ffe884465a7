import { PlaybackBufferModel } from '../../src/core/playbackBuffer';
import { ManualClock } from '../../src/core/clock';
import { InvalidInputError } from '../../src/core/errors';

describe('PlaybackBufferModel', () => {
    let clock: ManualClock;

    beforeEach(() => {
        clock = new ManualClock(0);
    });

    it('should detect and resolve a stall within one update when starting empty', () => {
        const buffer = new PlaybackBufferModel({ clock });

        const result = buffer.update(1, 2, true);

        expect(result.wasRebuffering).toBe(true);
        expect(result.stallResolved).toBe(true);
        expect(result.state).toEqual({ levelSeconds: 2, rebufferCount: 1, totalRebufferSeconds: 0 });
        expect(buffer.getState().rebufferStartedAt).toBeUndefined();
    });

    it('should debit elapsed time before crediting a completed segment', () => {
        const buffer = new PlaybackBufferModel({ clock, initialLevelSeconds: 1 });

        const result = buffer.update(3, 2, true);

        expect(result.wasRebuffering).toBe(true);
        expect(result.state.levelSeconds).toBe(2);
        expect(result.state.rebufferCount).toBe(1);
    });

    it('should count one stall across several partial updates and time it with the clock', () => {
        const buffer = new PlaybackBufferModel({ clock, initialLevelSeconds: 4 });

        expect(buffer.update(1, 2, false).state.levelSeconds).toBe(3);

        clock.set(10_000);
        const stall = buffer.update(5, 2, false);
        expect(stall.wasRebuffering).toBe(true);
        expect(stall.state.levelSeconds).toBe(0);
        expect(stall.state.rebufferStartedAt).toBe(10_000);

        clock.advance(1500);
        const interim = buffer.update(0.5, 2, false);
        expect(interim.wasRebuffering).toBe(false);
        expect(interim.state.rebufferCount).toBe(1);
        expect(buffer.getState().rebufferStartedAt).toBe(10_000);

        clock.advance(1000);
        const resumed = buffer.update(0.4, 2, true);
        expect(resumed.stallResolved).toBe(true);
        expect(resumed.state).toEqual({ levelSeconds: 2, rebufferCount: 1, totalRebufferSeconds: 2.5 });
    });

    it('should never report a negative level', () => {
        const buffer = new PlaybackBufferModel({ clock });

        for (let i = 0; i < 60; i++) {
            clock.advance(250);
            const elapsed = ((i * 7) % 5) * 0.7;
            const { state } = buffer.update(elapsed, 2, i % 3 === 0);
            expect(state.levelSeconds).toBeGreaterThanOrEqual(0);
        }
    });

    it('should never decrease the accumulated stall time', () => {
        const buffer = new PlaybackBufferModel({ clock });
        let previous = 0;

        for (let i = 0; i < 40; i++) {
            clock.advance(400);
            const { state } = buffer.update(i % 4 === 0 ? 3 : 0.5, 1, i % 2 === 0);
            expect(state.totalRebufferSeconds).toBeGreaterThanOrEqual(previous);
            previous = state.totalRebufferSeconds;
        }
    });

    it('should leave the level untouched by partial updates without a credit', () => {
        const buffer = new PlaybackBufferModel({ clock, initialLevelSeconds: 5 });

        const result = buffer.update(0.5, 2, false);

        expect(result.state.levelSeconds).toBe(4.5);
        expect(result.wasRebuffering).toBe(false);
    });

    it('should reject negative or non-finite elapsed time', () => {
        const buffer = new PlaybackBufferModel({ clock });

        expect(() => buffer.update(-0.1, 2, true)).toThrow(InvalidInputError);
        expect(() => buffer.update(Number.NaN, 2, true)).toThrow(InvalidInputError);
        expect(buffer.getState().rebufferCount).toBe(0);
    });

    it('should preview an update without applying it', () => {
        const buffer = new PlaybackBufferModel({ clock, initialLevelSeconds: 1 });

        const outcome = buffer.preview(3, 2, false);

        expect(outcome.wasRebuffering).toBe(true);
        expect(outcome.state).toEqual({ levelSeconds: 0, rebufferCount: 1, totalRebufferSeconds: 0, rebufferStartedAt: 0 });
        expect(buffer.getState()).toEqual({ levelSeconds: 1, rebufferCount: 0, totalRebufferSeconds: 0 });

        buffer.commit(outcome);

        expect(buffer.getState().rebufferCount).toBe(1);
        expect(buffer.getState().rebufferStartedAt).toBe(0);
    });
});
