import { Logger } from 'winston';
import { SegmentRequest, SessionSummary } from '../types';
import { SessionController } from '../core/sessionController';
import { SegmentTransport } from './segmentTransport';
import logger from '../utils/logger';

export interface RunSessionOptions {
    /** Pause between segments, as the multiplexed client did between stream requests. */
    interSegmentDelayMs?: number;
    /** Aborting stops the session; a segment in flight is still recorded. */
    signal?: AbortSignal;
    loggerInstance?: Logger;
}

export type SegmentOutcome = 'completed' | 'timeout' | 'failed' | 'aborted';

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise(resolve => {
        if (signal?.aborted) {
            resolve();
            return;
        }
        const done = () => {
            clearTimeout(timer);
            signal?.removeEventListener('abort', done);
            resolve();
        };
        const timer = setTimeout(done, ms);
        signal?.addEventListener('abort', done, { once: true });
    });
}

/**
 * Runs one segment against the transport under the controller's deadline. Timeouts and
 * transport failures both close the segment through the timeout path.
 */
export async function fetchSegmentWithDeadline(
    controller: SessionController,
    transport: SegmentTransport,
    request: SegmentRequest,
    options: RunSessionOptions = {}
): Promise<SegmentOutcome> {
    const log = options.loggerInstance || logger;
    const { signal } = options;
    const transfer = new AbortController();
    let timer: NodeJS.Timeout | undefined;
    let onSessionAbort: (() => void) | undefined;

    const deadline = new Promise<SegmentOutcome>(resolve => {
        timer = setTimeout(() => resolve('timeout'), controller.segmentTimeoutSeconds * 1000);
    });
    const sessionAborted = new Promise<SegmentOutcome>(resolve => {
        if (!signal) {
            return;
        }
        if (signal.aborted) {
            resolve('aborted');
            return;
        }
        onSessionAbort = () => resolve('aborted');
        signal.addEventListener('abort', onSessionAbort, { once: true });
    });
    const fetched = transport
        .fetchSegment(
            request,
            event => {
                if (!transfer.signal.aborted) {
                    controller.reportProgress(event);
                }
            },
            transfer.signal
        )
        .then(
            (): SegmentOutcome => 'completed',
            (error: unknown): SegmentOutcome => {
                if (!transfer.signal.aborted) {
                    log.error(`[${controller.sessionId}] ${transport.name} transport failed on segment ${request.segmentIndex}`, error);
                }
                return 'failed';
            }
        );

    try {
        const outcome = await Promise.race([fetched, deadline, sessionAborted]);
        if (outcome !== 'completed') {
            transfer.abort();
        }

        if (outcome === 'aborted') {
            controller.abort();
            return outcome;
        }
        if (controller.state === 'Awaiting') {
            if (outcome === 'completed') {
                log.warn(`[${controller.sessionId}] ${transport.name} transport ended segment ${request.segmentIndex} without a final event`);
            }
            controller.reportTimeout();
            return outcome === 'completed' ? 'timeout' : outcome;
        }
        return outcome;
    } finally {
        clearTimeout(timer);
        if (signal && onSessionAbort) {
            signal.removeEventListener('abort', onSessionAbort);
        }
    }
}

/**
 * Drives a session to completion: one segment in flight at a time, no retries.
 */
export async function runSession(
    controller: SessionController,
    transport: SegmentTransport,
    options: RunSessionOptions = {}
): Promise<SessionSummary> {
    const { signal, interSegmentDelayMs = 0 } = options;

    while (!signal?.aborted) {
        const request = controller.beginSegment();
        if (!request) {
            break;
        }

        const outcome = await fetchSegmentWithDeadline(controller, transport, request, options);
        if (outcome === 'aborted' || controller.state === 'Finished') {
            break;
        }
        if (interSegmentDelayMs > 0) {
            await sleep(interSegmentDelayMs, signal);
        }
    }

    if (signal?.aborted) {
        controller.abort();
    }
    return controller.finish();
}
