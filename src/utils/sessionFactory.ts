import { Logger } from 'winston';
import { LadderSpec, MetricSink, SessionSummary } from '../types';
import { AbrPolicy, createAbrPolicy } from '../core/abrPolicy';
import { Clock, systemClock } from '../core/clock';
import { RepresentationLadder } from '../core/representationLadder';
import { createRttEstimator } from '../core/rttEstimators';
import { SessionController } from '../core/sessionController';
import { SessionEntry, SessionRegistry } from '../core/sessionRegistry';
import { HttpSegmentTransport } from '../transports/httpSegmentTransport';
import { SegmentTransport } from '../transports/segmentTransport';
import { runSession } from '../transports/sessionRunner';
import { AbrConfig, AbrPolicyName, AppConfig } from './configLoader';
import { CompositeSink, CsvMetricLog } from './metricLog';
import { SummaryFileSink } from './reportGenerator';
import { TraceLog } from './traceLog';
import logger from './logger';

export interface SessionOverrides {
    sessionId: string;
    ladder?: LadderSpec;
    policy?: AbrPolicyName;
    segmentCount?: number;
    baseUrl?: string;
}

export interface SessionDependencies {
    clock?: Clock;
    transport?: SegmentTransport;
    sink?: MetricSink;
    loggerInstance?: Logger;
}

export interface PreparedSession {
    controller: SessionController;
    transport: SegmentTransport;
}

export type SessionLauncher = (overrides: SessionOverrides) => SessionEntry;

export function abrPolicyFromConfig(abr: AbrConfig, name: AbrPolicyName = abr.policy): AbrPolicy {
    return name === 'hysteresis'
        ? createAbrPolicy({ kind: 'hysteresis', upFactor: abr.upFactor, downFactor: abr.downFactor })
        : createAbrPolicy({ kind: 'threshold', safetyFactor: abr.safetyFactor });
}

function defaultSink(config: AppConfig, sessionId: string, clock: Clock, log: Logger): { sink: MetricSink; trace?: TraceLog } {
    const prefix = `${config.metrics.filePrefix}_${sessionId}`;
    const sinks: MetricSink[] = [
        new CsvMetricLog(config.metrics.path, prefix, { loggerInstance: log }),
        new SummaryFileSink(config.metrics.path, prefix, log),
    ];
    if (!config.metrics.trace.enabled) {
        return { sink: new CompositeSink(sinks) };
    }
    const trace = new TraceLog({ directory: config.metrics.trace.path, prefix, clock, loggerInstance: log });
    sinks.push(trace);
    return { sink: new CompositeSink(sinks), trace };
}

/** Builds a controller and its transport from configuration plus per-session overrides. */
export function createSession(config: AppConfig, overrides: SessionOverrides, deps: SessionDependencies = {}): PreparedSession {
    const clock = deps.clock ?? systemClock;
    const log = deps.loggerInstance || logger;
    const ladder = RepresentationLadder.from(overrides.ladder ?? config.ladder);

    let sink = deps.sink;
    let trace: TraceLog | undefined;
    if (!sink) {
        ({ sink, trace } = defaultSink(config, overrides.sessionId, clock, log));
    }

    const controller = new SessionController({
        sessionId: overrides.sessionId,
        ladder,
        policy: abrPolicyFromConfig(config.abr, overrides.policy),
        segmentCount: overrides.segmentCount ?? config.session.segmentCount,
        segmentDurationSeconds: config.session.segmentDurationSeconds,
        segmentTimeoutSeconds: config.session.segmentTimeoutSeconds,
        initialBufferSeconds: config.session.initialBufferSeconds,
        throughputWindowSize: config.session.throughputWindowSize,
        rttWindowSize: config.session.rttWindowSize,
        rttEstimator: createRttEstimator(config.rtt.estimator, config.rtt),
        clock,
        sink,
        listener: trace,
        loggerInstance: log,
    });

    const transport =
        deps.transport ??
        new HttpSegmentTransport({
            baseUrl: overrides.baseUrl ?? config.source.baseUrl,
            segmentTemplate: config.source.segmentTemplate,
            clock,
            loggerInstance: log,
        });

    return { controller, transport };
}

/**
 * Returns a launcher that registers each new session and drives it in the background. The
 * registry entry's abort controller stops the loop.
 */
export function createLauncher(
    registry: SessionRegistry,
    config: AppConfig,
    deps: SessionDependencies = {}
): SessionLauncher {
    const log = deps.loggerInstance || logger;

    return (overrides: SessionOverrides): SessionEntry => {
        const { controller, transport } = createSession(config, overrides, deps);
        const entry = registry.register(controller);

        entry.completion = runSession(controller, transport, {
            interSegmentDelayMs: config.session.interSegmentDelayMs,
            signal: entry.abortController.signal,
            loggerInstance: log,
        })
            .catch((error: unknown): SessionSummary => {
                log.error(`[${controller.sessionId}] Session loop failed`, error);
                return controller.summarize();
            })
            .then(summary => {
                registry.retire(controller.sessionId, summary);
                return summary;
            });

        return entry;
    };
}
