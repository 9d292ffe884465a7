/**
 * Per-observation RTT heuristic supplied by the transport adapter. The engine never sees
 * packets, so each adapter turns what it can observe into a latency figure.
 */
export type RttEstimator = (elapsedSeconds: number, byteCount: number) => number;

export const elapsedRttEstimator: RttEstimator = (elapsedSeconds) => elapsedSeconds;

export interface SizeScaledRttOptions {
    smallPayloadBytes?: number;
    scale?: number;
}

/** Small payloads are mostly latency; larger ones count a fixed fraction of their elapsed time. */
export function createSizeScaledRttEstimator(options: SizeScaledRttOptions = {}): RttEstimator {
    const smallPayloadBytes = options.smallPayloadBytes ?? 10000;
    const scale = options.scale ?? 0.1;
    return (elapsedSeconds, byteCount) =>
        byteCount < smallPayloadBytes ? elapsedSeconds : elapsedSeconds * scale;
}

export type RttEstimatorKind = 'elapsed' | 'size-scaled';

export function createRttEstimator(kind: RttEstimatorKind, options: SizeScaledRttOptions = {}): RttEstimator {
    return kind === 'size-scaled' ? createSizeScaledRttEstimator(options) : elapsedRttEstimator;
}
