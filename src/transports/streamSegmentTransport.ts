import { Readable } from 'stream';
import { Logger } from 'winston';
import { SegmentRequest } from '../types';
import { Clock, systemClock } from '../core/clock';
import { ProgressCallback, SegmentTransport } from './segmentTransport';
import logger from '../utils/logger';

/** Opens the data stream carrying one segment, e.g. a freshly allocated multiplexed stream. */
export type StreamOpener = (request: SegmentRequest) => Readable | Promise<Readable>;

export interface StreamSegmentTransportOptions {
    open: StreamOpener;
    clock?: Clock;
    loggerInstance?: Logger;
}

/**
 * Multiplexed-stream delivery: every received chunk is reported as interim progress with
 * cumulative bytes and elapsed time, and the end of the stream as the final observation.
 */
export class StreamSegmentTransport implements SegmentTransport {
    public readonly name = 'stream';
    private open: StreamOpener;
    private clock: Clock;
    private logger: Logger;

    constructor(options: StreamSegmentTransportOptions) {
        this.open = options.open;
        this.clock = options.clock ?? systemClock;
        this.logger = options.loggerInstance || logger;
    }

    public async fetchSegment(request: SegmentRequest, onProgress: ProgressCallback, signal: AbortSignal): Promise<void> {
        const stream = await this.open(request);
        const elapsed = () => (this.clock.now() - request.requestedAt) / 1000;

        await new Promise<void>((resolve, reject) => {
            let bytesSoFar = 0;
            let isFirstChunk = true;

            const cleanup = () => {
                signal.removeEventListener('abort', onAbort);
                stream.removeListener('data', onData);
                stream.removeListener('end', onEnd);
                stream.removeListener('error', onError);
            };
            const fail = (error: unknown) => {
                cleanup();
                stream.destroy();
                reject(error);
            };
            const report = (isFinal: boolean) => {
                onProgress({
                    segmentIndex: request.segmentIndex,
                    representationId: request.representation.id,
                    bytesSoFar,
                    elapsedSoFar: elapsed(),
                    isFirstChunk,
                    isFinal,
                });
                isFirstChunk = false;
            };

            const onData = (chunk: Buffer | string) => {
                bytesSoFar += typeof chunk === 'string' ? Buffer.byteLength(chunk) : chunk.length;
                if (isFirstChunk) {
                    this.logger.debug(`First chunk received for segment ${request.segmentIndex}`);
                }
                try {
                    report(false);
                } catch (error) {
                    fail(error);
                }
            };
            const onEnd = () => {
                cleanup();
                try {
                    report(true);
                    resolve();
                } catch (error) {
                    reject(error);
                }
            };
            const onError = (error: Error) => {
                this.logger.error(`Stream for segment ${request.segmentIndex} failed`, error);
                fail(error);
            };
            const onAbort = () => {
                this.logger.debug(`Stream for segment ${request.segmentIndex} aborted after ${bytesSoFar} bytes`);
                fail(new Error(`Segment ${request.segmentIndex} transfer aborted`));
            };

            if (signal.aborted) {
                onAbort();
                return;
            }
            signal.addEventListener('abort', onAbort, { once: true });
            stream.on('data', onData);
            stream.on('end', onEnd);
            stream.on('error', onError);
        });
    }
}
