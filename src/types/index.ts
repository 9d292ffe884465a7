/** Epoch milliseconds. */
export type Timestamp = number;

export interface Representation {
    readonly id: string;
    readonly nominalBitrateBps: number;
}

export type LadderSpec = ReadonlyArray<{ id: string; nominalBitrateBps: number }>;

export interface BufferState {
    levelSeconds: number;
    rebufferCount: number;
    totalRebufferSeconds: number;
    rebufferStartedAt?: Timestamp;
}

export interface BufferUpdate {
    wasRebuffering: boolean; // a stall started during this update
    stallResolved: boolean;
    state: BufferState;
}

/**
 * Transport-reported progress for the segment in flight. Byte count and elapsed time are
 * cumulative since the segment was requested.
 */
export interface ProgressEvent {
    segmentIndex: number;
    representationId: string;
    bytesSoFar: number;
    elapsedSoFar: number;
    isFirstChunk: boolean;
    isFinal: boolean;
}

export interface SegmentRequest {
    sessionId: string;
    segmentIndex: number;
    representation: Representation;
    requestedAt: Timestamp;
}

// Field order is the persisted column order.
export interface MetricRecord {
    readonly timestamp: Timestamp;
    readonly segmentIndex: number;
    readonly representationId: string;
    readonly bitrateBps: number;
    readonly byteCount: number;
    readonly elapsedSeconds: number;
    readonly throughputBps: number;
    readonly smoothedThroughputBps: number;
    readonly rttSeconds: number;
    readonly bufferLevelSeconds: number;
    readonly rebufferCount: number;
    readonly totalRebufferSeconds: number;
    readonly playbackPositionSeconds: number;
    readonly isRebuffering: boolean;
    readonly bitrateSwitch: boolean;
    readonly goodputBps: number;
    readonly lossEstimate: number;
    readonly isComplete: boolean;
}

export interface RangeStats {
    min: number;
    max: number;
    mean: number;
}

export interface SessionSummary {
    sessionId: string;
    recordCount: number;
    completedSegments: number;
    timedOutSegments: number;
    rebufferCount: number;
    totalRebufferSeconds: number;
    throughput: RangeStats;
    rtt: RangeStats;
    bufferLevel: RangeStats;
    switchCount: number;
    goodputEfficiency: number;
}

export type SessionState =
    | 'Idle'
    | 'Requesting'
    | 'Awaiting'
    | 'Completed'
    | 'TimedOut'
    | 'Deciding'
    | 'Finished';

export interface MetricSink {
    append(record: MetricRecord): void;
    writeSummary?(summary: SessionSummary): void;
}

/** Lifecycle notifications for trace logs and monitors. All callbacks are optional. */
export interface SessionListener {
    onSessionStart?(sessionId: string, at: Timestamp): void;
    onSegmentRequest?(request: SegmentRequest): void;
    onProgress?(event: ProgressEvent, at: Timestamp): void;
    onSegmentTimeout?(request: SegmentRequest, bytesSoFar: number, at: Timestamp): void;
    onRepresentationSwitch?(from: Representation, to: Representation, segmentIndex: number): void;
}
