import { Logger } from 'winston';
import { MetricRecord, MetricSink, RangeStats, Representation, SessionSummary, Timestamp } from '../types';
import { assertNonNegative } from './errors';
import { PlaybackBufferModel } from './playbackBuffer';
import { RttEstimator } from './rttEstimators';
import { SampleWindow } from './sampleWindow';
import logger from '../utils/logger';

export interface RecordInput {
    segmentIndex: number;
    representation: Representation;
    byteCount: number;
    elapsedSeconds: number;
    timestamp: Timestamp;
    isComplete: boolean;
    /** Time to drain from the buffer; defaults to `elapsedSeconds`. */
    bufferDebitSeconds?: number;
    isTimeout?: boolean;
}

export interface MetricsRecorderOptions {
    sessionId: string;
    segmentDurationSeconds: number;
    buffer: PlaybackBufferModel;
    throughputWindow: SampleWindow;
    rttWindow: SampleWindow;
    rttEstimator: RttEstimator;
    sink?: MetricSink;
    loggerInstance?: Logger;
}

export function throughputBps(byteCount: number, elapsedSeconds: number): number {
    return elapsedSeconds > 0 ? (byteCount * 8) / elapsedSeconds : 0;
}

function rangeOf(values: number[]): RangeStats {
    if (values.length === 0) {
        return { min: 0, max: 0, mean: 0 };
    }
    return {
        min: Math.min(...values),
        max: Math.max(...values),
        mean: values.reduce((sum, v) => sum + v, 0) / values.length,
    };
}

export function emptySummary(sessionId: string): SessionSummary {
    return {
        sessionId,
        recordCount: 0,
        completedSegments: 0,
        timedOutSegments: 0,
        rebufferCount: 0,
        totalRebufferSeconds: 0,
        throughput: rangeOf([]),
        rtt: rangeOf([]),
        bufferLevel: rangeOf([]),
        switchCount: 0,
        goodputEfficiency: 0,
    };
}

/**
 * Turns observations into metric records. Every record is persisted through the sink before
 * `record` returns and is then appended to the in-memory log in arrival order.
 */
export class MetricsRecorder {
    private readonly records: MetricRecord[] = [];
    private readonly options: MetricsRecorderOptions;
    private readonly logger: Logger;
    private previousRepresentationId: string | undefined;
    private playbackPositionSeconds = 0;
    private timedOutSegments = 0;

    constructor(options: MetricsRecorderOptions) {
        this.options = options;
        this.logger = options.loggerInstance || logger;
    }

    public record(input: RecordInput): MetricRecord {
        const { segmentIndex, representation, byteCount, elapsedSeconds, timestamp, isComplete } = input;
        const { buffer, throughputWindow, rttWindow, rttEstimator, segmentDurationSeconds } = this.options;

        assertNonNegative(elapsedSeconds, 'Elapsed time');
        assertNonNegative(byteCount, 'Byte count');

        const throughput = throughputBps(byteCount, elapsedSeconds);
        const sampled = elapsedSeconds > 0;
        const rttSample = rttEstimator(elapsedSeconds, byteCount);
        const throughputAfter = sampled
            ? throughputWindow.peek(throughput)
            : { mean: throughputWindow.mean(), size: throughputWindow.size };
        const smoothedThroughput = throughputAfter.mean;
        const rttSeconds = sampled ? rttWindow.peek(rttSample).mean : rttWindow.mean();

        const bufferUpdate = buffer.preview(input.bufferDebitSeconds ?? elapsedSeconds, segmentDurationSeconds, isComplete);
        const { wasRebuffering, state } = bufferUpdate;

        const playbackPositionSeconds = isComplete ? segmentIndex * segmentDurationSeconds : this.playbackPositionSeconds;
        const bitrateSwitch =
            this.previousRepresentationId !== undefined && this.previousRepresentationId !== representation.id;

        const goodput =
            representation.nominalBitrateBps > 0 ? Math.min(throughput, representation.nominalBitrateBps) : throughput;

        let lossEstimate = 0;
        if (sampled && throughputAfter.size > 1 && smoothedThroughput > 0) {
            lossEstimate = Math.min(Math.abs(throughput - smoothedThroughput) / smoothedThroughput, 1);
        }

        const record: MetricRecord = Object.freeze({
            timestamp,
            segmentIndex,
            representationId: representation.id,
            bitrateBps: representation.nominalBitrateBps,
            byteCount,
            elapsedSeconds,
            throughputBps: throughput,
            smoothedThroughputBps: smoothedThroughput,
            rttSeconds,
            bufferLevelSeconds: state.levelSeconds,
            rebufferCount: state.rebufferCount,
            totalRebufferSeconds: state.totalRebufferSeconds,
            playbackPositionSeconds,
            isRebuffering: wasRebuffering,
            bitrateSwitch,
            goodputBps: goodput,
            lossEstimate,
            isComplete,
        });

        // Nothing is committed until the record is persisted
        if (this.options.sink) {
            try {
                this.options.sink.append(record);
            } catch (error) {
                this.logger.error(`[${this.options.sessionId}] Failed to persist metric record for segment ${segmentIndex}`, error);
                throw error;
            }
        }

        if (sampled) {
            throughputWindow.push(throughput);
            rttWindow.push(rttSample);
        }
        buffer.commit(bufferUpdate);
        this.playbackPositionSeconds = playbackPositionSeconds;
        this.previousRepresentationId = representation.id;
        this.records.push(record);
        if (input.isTimeout) {
            this.timedOutSegments++;
        }

        this.logger.debug(
            `[${this.options.sessionId}] seg=${segmentIndex} rep=${representation.id} bytes=${byteCount} ` +
                `time=${elapsedSeconds.toFixed(3)}s tput=${(throughput / 1e6).toFixed(2)}Mbps ` +
                `buffer=${state.levelSeconds.toFixed(2)}s complete=${isComplete}`
        );

        return record;
    }

    public getRecords(): readonly MetricRecord[] {
        return [...this.records];
    }

    public get size(): number {
        return this.records.length;
    }

    public summarize(): SessionSummary {
        const sessionId = this.options.sessionId;
        if (this.records.length === 0) {
            return emptySummary(sessionId);
        }

        const state = this.options.buffer.getState();
        const throughputs = this.records.map(r => r.throughputBps).filter(v => v > 0);
        const rtts = this.records.map(r => r.rttSeconds).filter(v => v > 0);
        const totalThroughput = this.records.reduce((sum, r) => sum + r.throughputBps, 0);
        const totalGoodput = this.records.reduce((sum, r) => sum + r.goodputBps, 0);

        return {
            sessionId,
            recordCount: this.records.length,
            completedSegments: this.records.filter(r => r.isComplete).length,
            timedOutSegments: this.timedOutSegments,
            rebufferCount: state.rebufferCount,
            totalRebufferSeconds: state.totalRebufferSeconds,
            throughput: rangeOf(throughputs),
            rtt: rangeOf(rtts),
            bufferLevel: rangeOf(this.records.map(r => r.bufferLevelSeconds)),
            switchCount: this.records.filter(r => r.bitrateSwitch).length,
            goodputEfficiency: totalThroughput > 0 ? totalGoodput / totalThroughput : 0,
        };
    }
}
