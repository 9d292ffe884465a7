import { ProgressEvent, SegmentRequest } from '../types';

export type ProgressCallback = (event: ProgressEvent) => void;

/**
 * Fetches the bytes of one segment and reports progress. Implementations must report a final
 * event (`isFinal: true`) on success and stop reporting once `signal` is aborted.
 */
export interface SegmentTransport {
    readonly name: string;
    fetchSegment(request: SegmentRequest, onProgress: ProgressCallback, signal: AbortSignal): Promise<void>;
}
