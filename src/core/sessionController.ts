import { Logger } from 'winston';
import {
    BufferState,
    MetricRecord,
    MetricSink,
    ProgressEvent,
    Representation,
    SegmentRequest,
    SessionListener,
    SessionState,
    SessionSummary,
} from '../types';
import { AbrPolicy, selectRepresentation } from './abrPolicy';
import { Clock, systemClock } from './clock';
import { InvalidInputError, SessionStateError, assertNonNegative } from './errors';
import { MetricsRecorder, throughputBps } from './metricsRecorder';
import { PlaybackBufferModel } from './playbackBuffer';
import { RepresentationLadder } from './representationLadder';
import { RttEstimator, elapsedRttEstimator } from './rttEstimators';
import { SampleWindow } from './sampleWindow';
import logger from '../utils/logger';

export interface SessionOptions {
    sessionId: string;
    ladder: RepresentationLadder;
    policy: AbrPolicy;
    /** Number of segment indices in the plan; indices run 0..segmentCount-1. */
    segmentCount: number;
    segmentDurationSeconds?: number;
    segmentTimeoutSeconds?: number;
    initialBufferSeconds?: number;
    throughputWindowSize?: number;
    rttWindowSize?: number;
    rttEstimator?: RttEstimator;
    initialRepresentationId?: string;
    clock?: Clock;
    sink?: MetricSink;
    listener?: SessionListener;
    loggerInstance?: Logger;
}

interface InFlightSegment {
    request: SegmentRequest;
    bytesSoFar: number;
    debitedSeconds: number;
}

export const DEFAULT_SEGMENT_DURATION_SECONDS = 2;
export const DEFAULT_SEGMENT_TIMEOUT_SECONDS = 30;

/**
 * Drives one session through request → await → complete/timeout → decide, one segment at a
 * time. Transport adapters call `beginSegment`, then `reportProgress` until a final event, or
 * `reportTimeout` when their deadline passes. Segments are never retried.
 */
export class SessionController {
    public readonly sessionId: string;
    public readonly ladder: RepresentationLadder;
    public readonly policy: AbrPolicy;
    public readonly segmentCount: number;
    public readonly segmentDurationSeconds: number;
    public readonly segmentTimeoutSeconds: number;

    private currentState: SessionState = 'Idle';
    private current: Representation;
    private nextSegmentIndex = 0;
    private inFlight: InFlightSegment | undefined;
    private summary: SessionSummary | undefined;

    private readonly buffer: PlaybackBufferModel;
    private readonly recorder: MetricsRecorder;
    private readonly clock: Clock;
    private readonly sink: MetricSink | undefined;
    private readonly listener: SessionListener;
    private readonly logger: Logger;

    constructor(options: SessionOptions) {
        if (!Number.isInteger(options.segmentCount) || options.segmentCount < 0) {
            throw new InvalidInputError(`Segment count must be a non-negative integer (got ${options.segmentCount})`);
        }

        this.sessionId = options.sessionId;
        this.ladder = options.ladder;
        this.policy = options.policy;
        this.segmentCount = options.segmentCount;
        this.segmentDurationSeconds = options.segmentDurationSeconds ?? DEFAULT_SEGMENT_DURATION_SECONDS;
        this.segmentTimeoutSeconds = options.segmentTimeoutSeconds ?? DEFAULT_SEGMENT_TIMEOUT_SECONDS;
        assertNonNegative(this.segmentDurationSeconds, 'Segment duration');
        assertNonNegative(this.segmentTimeoutSeconds, 'Segment timeout');

        this.clock = options.clock ?? systemClock;
        this.sink = options.sink;
        this.listener = options.listener ?? {};
        this.logger = options.loggerInstance || logger;

        this.current = options.initialRepresentationId
            ? this.ladder.get(options.initialRepresentationId)
            : this.ladder.lowest();

        this.buffer = new PlaybackBufferModel({
            clock: this.clock,
            initialLevelSeconds: options.initialBufferSeconds,
            loggerInstance: this.logger,
        });
        this.recorder = new MetricsRecorder({
            sessionId: this.sessionId,
            segmentDurationSeconds: this.segmentDurationSeconds,
            buffer: this.buffer,
            throughputWindow: new SampleWindow(options.throughputWindowSize ?? 5),
            rttWindow: new SampleWindow(options.rttWindowSize ?? 10),
            rttEstimator: options.rttEstimator ?? elapsedRttEstimator,
            sink: this.sink,
            loggerInstance: this.logger,
        });

        this.listener.onSessionStart?.(this.sessionId, this.clock.now());
        this.logger.info(
            `[${this.sessionId}] Session created: ${this.segmentCount} segments, policy=${this.policy.kind}, ` +
                `starting at ${this.current.id} (${this.current.nominalBitrateBps} bps)`
        );
    }

    public get state(): SessionState {
        return this.currentState;
    }

    public get currentRepresentation(): Representation {
        return this.current;
    }

    /** Index of the segment in flight, or of the next one to request. */
    public get segmentIndex(): number {
        return this.inFlight ? this.inFlight.request.segmentIndex : this.nextSegmentIndex;
    }

    public beginSegment(): SegmentRequest | null {
        if (this.currentState === 'Finished') {
            return null;
        }
        if (this.currentState !== 'Idle' && this.currentState !== 'Requesting') {
            throw new SessionStateError(`[${this.sessionId}] Cannot request a segment while ${this.currentState}`);
        }
        if (this.nextSegmentIndex >= this.segmentCount) {
            this.finish();
            return null;
        }

        this.currentState = 'Requesting';
        const request: SegmentRequest = {
            sessionId: this.sessionId,
            segmentIndex: this.nextSegmentIndex,
            representation: this.current,
            requestedAt: this.clock.now(),
        };
        this.inFlight = { request, bytesSoFar: 0, debitedSeconds: 0 };
        this.currentState = 'Awaiting';

        this.listener.onSegmentRequest?.(request);
        this.logger.info(
            `[${this.sessionId}] Requesting segment ${request.segmentIndex} at ${this.current.id} (${this.current.nominalBitrateBps} bps)`
        );
        return request;
    }

    /**
     * Applies one progress event for the segment in flight. Interim events update the windows
     * and the buffer; only a final event completes the segment and triggers a decision.
     */
    public reportProgress(event: ProgressEvent): MetricRecord {
        const inFlight = this.requireInFlight('report progress');
        const { request } = inFlight;

        if (event.segmentIndex !== request.segmentIndex) {
            throw new InvalidInputError(
                `[${this.sessionId}] Progress for segment ${event.segmentIndex} but segment ${request.segmentIndex} is in flight`
            );
        }
        if (!this.ladder.has(event.representationId)) {
            throw new InvalidInputError(`Unknown representation id: ${event.representationId}`);
        }
        if (event.representationId !== request.representation.id) {
            throw new InvalidInputError(
                `[${this.sessionId}] Progress for ${event.representationId} but ${request.representation.id} was requested`
            );
        }
        assertNonNegative(event.bytesSoFar, 'Byte count');
        assertNonNegative(event.elapsedSoFar, 'Elapsed time');
        if (event.elapsedSoFar < inFlight.debitedSeconds) {
            throw new InvalidInputError(
                `[${this.sessionId}] Elapsed time went backwards (${event.elapsedSoFar}s < ${inFlight.debitedSeconds}s)`
            );
        }
        if (event.bytesSoFar < inFlight.bytesSoFar) {
            throw new InvalidInputError(
                `[${this.sessionId}] Byte count went backwards (${event.bytesSoFar} < ${inFlight.bytesSoFar})`
            );
        }

        this.listener.onProgress?.(event, this.clock.now());

        const record = this.recorder.record({
            segmentIndex: request.segmentIndex,
            representation: request.representation,
            byteCount: event.bytesSoFar,
            elapsedSeconds: event.elapsedSoFar,
            timestamp: this.clock.now(),
            isComplete: event.isFinal,
            bufferDebitSeconds: event.elapsedSoFar - inFlight.debitedSeconds,
        });
        inFlight.debitedSeconds = event.elapsedSoFar;
        inFlight.bytesSoFar = event.bytesSoFar;

        if (event.isFinal) {
            this.currentState = 'Completed';
            this.logger.info(
                `[${this.sessionId}] Segment ${request.segmentIndex} complete: ${event.bytesSoFar} bytes in ` +
                    `${event.elapsedSoFar.toFixed(3)}s, buffer ${record.bufferLevelSeconds.toFixed(2)}s`
            );
            this.decide(record, throughputBps(event.bytesSoFar, event.elapsedSoFar));
        }
        return record;
    }

    /** The segment missed its deadline: record it as incomplete and move on. */
    public reportTimeout(): MetricRecord {
        const inFlight = this.requireInFlight('report a timeout');
        const record = this.recordIncomplete(inFlight, this.segmentTimeoutSeconds);
        this.currentState = 'TimedOut';
        this.logger.warn(
            `[${this.sessionId}] TIMEOUT: segment ${inFlight.request.segmentIndex} after ${this.segmentTimeoutSeconds}s ` +
                `(${inFlight.bytesSoFar} bytes received)`
        );
        this.decide(record, throughputBps(inFlight.bytesSoFar, this.segmentTimeoutSeconds));
        return record;
    }

    /**
     * Stops the session. A segment still in flight is closed with an incomplete record
     * covering the time spent on it so far.
     */
    public abort(): MetricRecord | undefined {
        let record: MetricRecord | undefined;
        if (this.currentState === 'Awaiting' && this.inFlight) {
            record = this.closeAbandoned(this.inFlight);
        }
        this.finish();
        return record;
    }

    public finish(): SessionSummary {
        if (this.summary) {
            return this.summary;
        }
        if (this.currentState === 'Awaiting' && this.inFlight) {
            this.closeAbandoned(this.inFlight);
        }

        this.currentState = 'Finished';
        const summary = this.recorder.summarize();
        this.summary = summary;

        if (this.sink?.writeSummary) {
            try {
                this.sink.writeSummary(summary);
            } catch (error) {
                this.logger.error(`[${this.sessionId}] Failed to persist session summary`, error);
                throw error;
            }
        }

        this.logger.info(
            `[${this.sessionId}] Session finished: ${summary.recordCount} records, ${summary.rebufferCount} rebuffers ` +
                `(${summary.totalRebufferSeconds.toFixed(2)}s), ${summary.switchCount} switches`
        );
        return summary;
    }

    public summarize(): SessionSummary {
        return this.summary ?? this.recorder.summarize();
    }

    public getRecords(): readonly MetricRecord[] {
        return this.recorder.getRecords();
    }

    public getBufferState(): BufferState {
        return this.buffer.getState();
    }

    private requireInFlight(action: string): InFlightSegment {
        if (this.currentState !== 'Awaiting' || !this.inFlight) {
            throw new SessionStateError(`[${this.sessionId}] Cannot ${action} while ${this.currentState}`);
        }
        return this.inFlight;
    }

    private recordIncomplete(inFlight: InFlightSegment, elapsedSeconds: number): MetricRecord {
        const { request } = inFlight;
        this.listener.onSegmentTimeout?.(request, inFlight.bytesSoFar, this.clock.now());

        const record = this.recorder.record({
            segmentIndex: request.segmentIndex,
            representation: request.representation,
            byteCount: inFlight.bytesSoFar,
            elapsedSeconds,
            timestamp: this.clock.now(),
            isComplete: false,
            bufferDebitSeconds: Math.max(0, elapsedSeconds - inFlight.debitedSeconds),
            isTimeout: true,
        });
        inFlight.debitedSeconds = Math.max(inFlight.debitedSeconds, elapsedSeconds);
        return record;
    }

    private closeAbandoned(inFlight: InFlightSegment): MetricRecord {
        const elapsedSeconds = Math.max(
            inFlight.debitedSeconds,
            (this.clock.now() - inFlight.request.requestedAt) / 1000
        );
        const record = this.recordIncomplete(inFlight, elapsedSeconds);
        this.currentState = 'TimedOut';
        this.logger.warn(
            `[${this.sessionId}] Aborted during segment ${inFlight.request.segmentIndex} after ${elapsedSeconds.toFixed(3)}s`
        );
        this.inFlight = undefined;
        return record;
    }

    private decide(record: MetricRecord, segmentThroughputBps: number): void {
        this.currentState = 'Deciding';
        const signal = this.policy.signal === 'smoothed' ? record.smoothedThroughputBps : segmentThroughputBps;
        const next = selectRepresentation(this.policy, this.ladder, this.current, signal);

        if (next.id !== this.current.id) {
            const direction = next.nominalBitrateBps > this.current.nominalBitrateBps ? 'UP' : 'DOWN';
            this.logger.info(`[${this.sessionId}] Switching ${direction} ${this.current.id} -> ${next.id}`);
            this.listener.onRepresentationSwitch?.(this.current, next, record.segmentIndex);
            this.current = next;
        } else {
            this.logger.debug(`[${this.sessionId}] Keeping ${this.current.id}`);
        }

        this.nextSegmentIndex = record.segmentIndex + 1;
        this.inFlight = undefined;

        if (this.nextSegmentIndex >= this.segmentCount) {
            this.finish();
        } else {
            this.currentState = 'Requesting';
        }
    }
}
