import fs from 'fs';
import path from 'path';
import { Logger } from 'winston';
import { MetricRecord, MetricSink, SessionSummary } from '../types';
import logger from './logger';

export const METRIC_COLUMNS = [
    'timestamp',
    'segment_index',
    'representation_id',
    'bitrate_bps',
    'segment_size_bytes',
    'download_time_sec',
    'throughput_bps',
    'smoothed_throughput_bps',
    'rtt_sec',
    'buffer_level_sec',
    'rebuffering_count',
    'total_rebuffering_duration_sec',
    'playback_position_sec',
    'is_rebuffering',
    'bitrate_switch',
    'goodput_bps',
    'packet_loss_estimate',
    'is_complete',
] as const;

/** `YYYYMMDD_HHMMSS` in local time, used to name per-session output files. */
export function fileTimestamp(date: Date = new Date()): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return (
        `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
        `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
}

function csvField(value: string | number | boolean): string {
    const text = String(value);
    return /[",\n\r]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsvRow(record: MetricRecord): string {
    return [
        new Date(record.timestamp).toISOString(),
        record.segmentIndex,
        record.representationId,
        record.bitrateBps,
        record.byteCount,
        record.elapsedSeconds,
        record.throughputBps,
        record.smoothedThroughputBps,
        record.rttSeconds,
        record.bufferLevelSeconds,
        record.rebufferCount,
        record.totalRebufferSeconds,
        record.playbackPositionSeconds,
        record.isRebuffering,
        record.bitrateSwitch,
        record.goodputBps,
        record.lossEstimate,
        record.isComplete,
    ]
        .map(csvField)
        .join(',');
}

/**
 * Append-only CSV metric log. Each row is written synchronously so that a crash loses at most
 * the record being written.
 */
export class CsvMetricLog implements MetricSink {
    public readonly filePath: string;
    private logger: Logger;

    constructor(directory: string, prefix: string, options: { fileName?: string; loggerInstance?: Logger } = {}) {
        this.logger = options.loggerInstance || logger;
        this.filePath = path.join(directory, options.fileName ?? `${prefix}_metrics_${fileTimestamp()}.csv`);

        fs.mkdirSync(directory, { recursive: true });
        fs.writeFileSync(this.filePath, METRIC_COLUMNS.join(',') + '\n');
        this.logger.info(`Metric log created: ${this.filePath}`);
    }

    public append(record: MetricRecord): void {
        fs.appendFileSync(this.filePath, toCsvRow(record) + '\n');
    }
}

/** Forwards to each sink in order; the first failure stops the fan-out. */
export class CompositeSink implements MetricSink {
    private readonly sinks: MetricSink[];

    constructor(sinks: MetricSink[]) {
        this.sinks = sinks;
    }

    public append(record: MetricRecord): void {
        for (const sink of this.sinks) {
            sink.append(record);
        }
    }

    public writeSummary(summary: SessionSummary): void {
        for (const sink of this.sinks) {
            sink.writeSummary?.(summary);
        }
    }
}
