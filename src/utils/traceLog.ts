import fs from 'fs';
import path from 'path';
import { Logger } from 'winston';
import {
    MetricRecord,
    MetricSink,
    ProgressEvent,
    Representation,
    SegmentRequest,
    SessionListener,
    SessionSummary,
    Timestamp,
} from '../types';
import { Clock, systemClock } from '../core/clock';
import { fileTimestamp } from './metricLog';
import logger from './logger';

export interface TraceEvent {
    time: number; // ms since the trace started
    name: string;
    data: Record<string, string | number | boolean>;
}

export interface TraceLogOptions {
    directory: string;
    prefix: string;
    clock?: Clock;
    loggerInstance?: Logger;
}

/**
 * Stream-level event trace, correlated with the metric log by timestamp. Written as one JSON
 * document when the session summary arrives.
 */
export class TraceLog implements MetricSink, SessionListener {
    private readonly events: TraceEvent[] = [];
    private readonly startTime: Timestamp;
    private readonly clock: Clock;
    private readonly options: TraceLogOptions;
    private readonly logger: Logger;
    private cumulativeBytes = 0;
    private savedPath: string | undefined;

    constructor(options: TraceLogOptions) {
        this.options = options;
        this.clock = options.clock ?? systemClock;
        this.logger = options.loggerInstance || logger;
        this.startTime = this.clock.now();
    }

    private log(name: string, at: Timestamp, data: TraceEvent['data']): void {
        this.events.push({ time: at - this.startTime, name, data });
    }

    public onSessionStart(sessionId: string, at: Timestamp): void {
        this.log('session:start', at, { session_id: sessionId });
    }

    public onSegmentRequest(request: SegmentRequest): void {
        this.cumulativeBytes = 0;
        this.log('segment:request', request.requestedAt, {
            segment_index: request.segmentIndex,
            representation_id: request.representation.id,
            bitrate_bps: request.representation.nominalBitrateBps,
        });
    }

    public onProgress(event: ProgressEvent, at: Timestamp): void {
        const bytesReceived = event.bytesSoFar - this.cumulativeBytes;
        this.cumulativeBytes = event.bytesSoFar;
        this.log('segment:data_received', at, {
            segment_index: event.segmentIndex,
            bytes_received: bytesReceived,
            cumulative_bytes: event.bytesSoFar,
            is_first_chunk: event.isFirstChunk,
            is_last_chunk: event.isFinal,
        });

        if (event.isFinal) {
            this.log('segment:transfer_complete', at, {
                segment_index: event.segmentIndex,
                total_bytes: event.bytesSoFar,
                total_time_ms: event.elapsedSoFar * 1000,
                transfer_rate_kbps: event.elapsedSoFar > 0 ? (event.bytesSoFar * 8) / 1000 / event.elapsedSoFar : 0,
            });
        }
    }

    public onSegmentTimeout(request: SegmentRequest, bytesSoFar: number, at: Timestamp): void {
        this.log('segment:timeout', at, {
            segment_index: request.segmentIndex,
            representation_id: request.representation.id,
            bytes_received: bytesSoFar,
        });
    }

    public onRepresentationSwitch(from: Representation, to: Representation, segmentIndex: number): void {
        this.log('abr:switch', this.clock.now(), {
            segment_index: segmentIndex,
            from: from.id,
            to: to.id,
        });
    }

    public append(record: MetricRecord): void {
        this.log('metrics:record', record.timestamp, {
            segment_index: record.segmentIndex,
            representation_id: record.representationId,
            throughput_bps: record.throughputBps,
            smoothed_throughput_bps: record.smoothedThroughputBps,
            rtt_ms: record.rttSeconds * 1000,
            buffer_level_sec: record.bufferLevelSeconds,
            rebuffering_count: record.rebufferCount,
            is_rebuffering: record.isRebuffering,
            is_complete: record.isComplete,
        });
    }

    public writeSummary(summary: SessionSummary): void {
        this.log('session:summary', this.clock.now(), {
            session_id: summary.sessionId,
            record_count: summary.recordCount,
            rebuffer_count: summary.rebufferCount,
            total_rebuffer_sec: summary.totalRebufferSeconds,
            switch_count: summary.switchCount,
        });
        this.save();
    }

    public getEvents(): readonly TraceEvent[] {
        return [...this.events];
    }

    public get filePath(): string | undefined {
        return this.savedPath;
    }

    public save(): string {
        const { directory, prefix } = this.options;
        const filePath = this.savedPath ?? path.join(directory, `${prefix}_${fileTimestamp(new Date(this.startTime))}.trace.json`);
        const document = {
            trace_version: '1.0',
            title: 'ABR session trace',
            description: 'Segment-level transport events with per-record metrics',
            trace: {
                vantage_point: { name: 'abr-session-lab', type: 'client' },
                common_fields: { reference_time: this.startTime, time_units: 'ms' },
                events: this.events,
            },
        };

        try {
            fs.mkdirSync(directory, { recursive: true });
            fs.writeFileSync(filePath, JSON.stringify(document, null, 2));
        } catch (error) {
            this.logger.error(`Failed to write trace log to ${filePath}`, error);
            throw error;
        }

        this.savedPath = filePath;
        this.logger.info(`Trace log saved to: ${filePath}`);
        return filePath;
    }
}
