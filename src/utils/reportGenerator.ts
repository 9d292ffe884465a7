import fs from 'fs';
import path from 'path';
import { Logger } from 'winston';
import { MetricRecord, MetricSink, SessionSummary } from '../types';
import { SessionRegistry } from '../core/sessionRegistry';
import { fileTimestamp } from './metricLog';
import logger from './logger';

export function formatBitrate(bps: number): string {
    const units = ['bps', 'Kbps', 'Mbps', 'Gbps'];
    let rate = bps;
    let unitIndex = 0;
    while (rate >= 1000 && unitIndex < units.length - 1) {
        rate /= 1000;
        unitIndex++;
    }
    return `${rate.toFixed(2)} ${units[unitIndex]}`;
}

export function formatSummary(summary: SessionSummary): string {
    return [
        `Session: ${summary.sessionId}`,
        `Records: ${summary.recordCount}`,
        `Segments completed: ${summary.completedSegments}`,
        `Segments timed out: ${summary.timedOutSegments}`,
        `Rebuffering events: ${summary.rebufferCount}`,
        `Rebuffering duration: ${summary.totalRebufferSeconds.toFixed(2)} seconds`,
        `\nThroughput:`,
        `Average: ${formatBitrate(summary.throughput.mean)}`,
        `Min: ${formatBitrate(summary.throughput.min)}`,
        `Max: ${formatBitrate(summary.throughput.max)}`,
        `\nLatency:`,
        `Average RTT: ${(summary.rtt.mean * 1000).toFixed(1)} ms`,
        `Min RTT: ${(summary.rtt.min * 1000).toFixed(1)} ms`,
        `Max RTT: ${(summary.rtt.max * 1000).toFixed(1)} ms`,
        `\nBuffer:`,
        `Average level: ${summary.bufferLevel.mean.toFixed(2)} seconds`,
        `Maximum level: ${summary.bufferLevel.max.toFixed(2)} seconds`,
        `\nBitrate switches: ${summary.switchCount}`,
        `Goodput efficiency: ${(summary.goodputEfficiency * 100).toFixed(1)}%`,
    ].join('\n');
}

export class ReportGenerator {
    private registry: SessionRegistry;
    private logger: Logger;

    constructor(registry: SessionRegistry, loggerInstance?: Logger) {
        this.registry = registry;
        this.logger = loggerInstance || logger;
    }

    public generateReport(): string {
        const summaries = this.registry.summaries();
        const totalRecords = summaries.reduce((sum, s) => sum + s.recordCount, 0);
        const totalRebuffers = summaries.reduce((sum, s) => sum + s.rebufferCount, 0);

        const report = [
            '=== ABR Session Report ===',
            `Generated at: ${new Date().toISOString()}`,
            `Sessions: ${summaries.length}`,
            `Total metric records: ${totalRecords}`,
            `Total rebuffering events: ${totalRebuffers}`,
            '\n=== Individual Sessions ===\n',
        ];

        summaries.forEach(summary => {
            report.push(formatSummary(summary), '---');
        });

        return report.join('\n');
    }

    /** Appends a timestamped report to a history file. */
    public saveReport(reportPath: string): void {
        try {
            const timestampedReport = [
                '\n\n========================================',
                `Session Report - ${new Date().toISOString()}`,
                '========================================\n',
                this.generateReport(),
            ].join('\n');

            fs.mkdirSync(path.dirname(reportPath), { recursive: true });
            if (fs.existsSync(reportPath)) {
                fs.appendFileSync(reportPath, timestampedReport);
                this.logger.info(`Session report appended to: ${reportPath}`);
            } else {
                fs.writeFileSync(reportPath, timestampedReport);
                this.logger.info(`Session report created at: ${reportPath}`);
            }
        } catch (error) {
            this.logger.error(`Failed to save session report:`, error);
        }
    }
}

/**
 * Writes the end-of-session summary as a text file next to the metric log. Records pass
 * through untouched.
 */
export class SummaryFileSink implements MetricSink {
    private directory: string;
    private prefix: string;
    private logger: Logger;
    public filePath: string | undefined;

    constructor(directory: string, prefix: string, loggerInstance?: Logger) {
        this.directory = directory;
        this.prefix = prefix;
        this.logger = loggerInstance || logger;
    }

    public append(_record: MetricRecord): void {
        // summary only
    }

    public writeSummary(summary: SessionSummary): void {
        const filePath = path.join(this.directory, `${this.prefix}_summary_${fileTimestamp()}.txt`);
        fs.mkdirSync(this.directory, { recursive: true });
        fs.writeFileSync(filePath, `=== ABR Session Summary ===\n${formatSummary(summary)}\n`);
        this.filePath = filePath;
        this.logger.info(`Summary report saved: ${filePath}`);
    }
}
