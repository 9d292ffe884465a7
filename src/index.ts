export * from './types';
export { AbrError, InvalidInputError, SessionStateError } from './core/errors';
export { Clock, ManualClock, systemClock } from './core/clock';
export { SampleWindow } from './core/sampleWindow';
export { RepresentationLadder } from './core/representationLadder';
export { PlaybackBufferModel, PlaybackBufferOptions } from './core/playbackBuffer';
export {
    AbrPolicy,
    AbrPolicyConfig,
    HysteresisPolicy,
    ThresholdPolicy,
    ThroughputSignal,
    createAbrPolicy,
    selectByHysteresis,
    selectByThreshold,
    selectRepresentation,
} from './core/abrPolicy';
export {
    RttEstimator,
    createRttEstimator,
    createSizeScaledRttEstimator,
    elapsedRttEstimator,
} from './core/rttEstimators';
export { MetricsRecorder, RecordInput, emptySummary, throughputBps } from './core/metricsRecorder';
export { SessionController, SessionOptions } from './core/sessionController';
export { SessionRegistry, SessionEntry, SessionStatus } from './core/sessionRegistry';
export { SegmentTransport, ProgressCallback } from './transports/segmentTransport';
export { HttpSegmentTransport, buildSegmentUrl } from './transports/httpSegmentTransport';
export { StreamSegmentTransport, StreamOpener } from './transports/streamSegmentTransport';
export { runSession, fetchSegmentWithDeadline, SegmentOutcome } from './transports/sessionRunner';
export { CsvMetricLog, CompositeSink, METRIC_COLUMNS, toCsvRow } from './utils/metricLog';
export { TraceLog } from './utils/traceLog';
export { ReportGenerator, SummaryFileSink, formatSummary } from './utils/reportGenerator';
export { createSession, createLauncher, abrPolicyFromConfig } from './utils/sessionFactory';
export { createApp } from './app';
