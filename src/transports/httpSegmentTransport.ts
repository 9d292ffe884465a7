import axios from 'axios';
import { Logger } from 'winston';
import { SegmentRequest } from '../types';
import { Clock, systemClock } from '../core/clock';
import { ProgressCallback, SegmentTransport } from './segmentTransport';
import logger from '../utils/logger';

export interface HttpSegmentTransportOptions {
    baseUrl: string;
    /** Relative path with `{representationId}` and `{segmentIndex}` placeholders. */
    segmentTemplate: string;
    clock?: Clock;
    loggerInstance?: Logger;
}

export function buildSegmentUrl(baseUrl: string, segmentTemplate: string, request: SegmentRequest): string {
    const relative = segmentTemplate
        .replace(/\{representationId\}/g, encodeURIComponent(request.representation.id))
        .replace(/\{segmentIndex\}/g, String(request.segmentIndex));
    return `${baseUrl.replace(/\/+$/, '')}/${relative.replace(/^\/+/, '')}`;
}

/**
 * Chunked-HTTP delivery: one GET per segment, reported as a single final observation once the
 * whole body has arrived.
 */
export class HttpSegmentTransport implements SegmentTransport {
    public readonly name = 'http';
    private options: HttpSegmentTransportOptions;
    private clock: Clock;
    private logger: Logger;

    constructor(options: HttpSegmentTransportOptions) {
        this.options = options;
        this.clock = options.clock ?? systemClock;
        this.logger = options.loggerInstance || logger;
    }

    public async fetchSegment(request: SegmentRequest, onProgress: ProgressCallback, signal: AbortSignal): Promise<void> {
        const url = buildSegmentUrl(this.options.baseUrl, this.options.segmentTemplate, request);
        this.logger.debug(`Fetching segment ${request.segmentIndex} from ${url}`);

        try {
            const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer', signal });
            const elapsedSeconds = (this.clock.now() - request.requestedAt) / 1000;
            const byteCount = response.data.byteLength;
            this.logger.debug(`Response status: ${response.status}, ${byteCount} bytes in ${elapsedSeconds.toFixed(3)}s`);

            onProgress({
                segmentIndex: request.segmentIndex,
                representationId: request.representation.id,
                bytesSoFar: byteCount,
                elapsedSoFar: elapsedSeconds,
                isFirstChunk: true,
                isFinal: true,
            });
        } catch (error) {
            if (axios.isCancel(error)) {
                this.logger.debug(`Request for segment ${request.segmentIndex} cancelled`);
            } else {
                this.logger.error(`Failed to fetch segment ${request.segmentIndex} from ${url}`, error);
            }
            throw error;
        }
    }
}
