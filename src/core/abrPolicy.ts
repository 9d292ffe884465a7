import { Representation } from '../types';
import { RepresentationLadder } from './representationLadder';

/** Which throughput figure a policy decides on. */
export type ThroughputSignal = 'smoothed' | 'segment';

export interface ThresholdPolicy {
    kind: 'threshold';
    signal: ThroughputSignal;
    safetyFactor: number;
}

export interface HysteresisPolicy {
    kind: 'hysteresis';
    signal: ThroughputSignal;
    upFactor: number;
    downFactor: number;
}

export type AbrPolicy = ThresholdPolicy | HysteresisPolicy;

export type AbrPolicyConfig =
    | { kind: 'threshold'; safetyFactor?: number; signal?: ThroughputSignal }
    | { kind: 'hysteresis'; upFactor?: number; downFactor?: number; signal?: ThroughputSignal };

export const DEFAULT_SAFETY_FACTOR = 0.8;
export const DEFAULT_UP_FACTOR = 1.5;
export const DEFAULT_DOWN_FACTOR = 0.8;

export function createAbrPolicy(config: AbrPolicyConfig): AbrPolicy {
    switch (config.kind) {
        case 'threshold':
            return {
                kind: 'threshold',
                signal: config.signal ?? 'smoothed',
                safetyFactor: config.safetyFactor ?? DEFAULT_SAFETY_FACTOR,
            };
        case 'hysteresis':
            return {
                kind: 'hysteresis',
                signal: config.signal ?? 'segment',
                upFactor: config.upFactor ?? DEFAULT_UP_FACTOR,
                downFactor: config.downFactor ?? DEFAULT_DOWN_FACTOR,
            };
    }
}

/**
 * Highest rung with `bitrate < throughput * safetyFactor`, or the lowest rung when nothing fits.
 */
export function selectByThreshold(
    ladder: RepresentationLadder,
    throughputBps: number,
    safetyFactor: number = DEFAULT_SAFETY_FACTOR
): Representation {
    return ladder.highestAffordable(throughputBps * safetyFactor) ?? ladder.lowest();
}

/**
 * Moves at most one rung per call. Above `current * upFactor` steps up, below
 * `current * downFactor` steps down, anything in between holds.
 */
export function selectByHysteresis(
    ladder: RepresentationLadder,
    current: Representation,
    throughputBps: number,
    upFactor: number = DEFAULT_UP_FACTOR,
    downFactor: number = DEFAULT_DOWN_FACTOR
): Representation {
    const bitrate = ladder.get(current.id).nominalBitrateBps;

    if (throughputBps > bitrate * upFactor) {
        return ladder.stepUp(current) ?? current;
    }
    if (throughputBps < bitrate * downFactor) {
        return ladder.stepDown(current) ?? current;
    }
    return current;
}

export function selectRepresentation(
    policy: AbrPolicy,
    ladder: RepresentationLadder,
    current: Representation,
    throughputBps: number
): Representation {
    switch (policy.kind) {
        case 'threshold':
            return selectByThreshold(ladder, throughputBps, policy.safetyFactor);
        case 'hysteresis':
            return selectByHysteresis(ladder, current, throughputBps, policy.upFactor, policy.downFactor);
    }
}
