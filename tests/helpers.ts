import { MetricRecord, MetricSink, SessionSummary } from '../src/types';
import { createAbrPolicy } from '../src/core/abrPolicy';
import { ManualClock } from '../src/core/clock';
import { RepresentationLadder } from '../src/core/representationLadder';
import { SessionController, SessionOptions } from '../src/core/sessionController';

export class MemorySink implements MetricSink {
    public records: MetricRecord[] = [];
    public summaries: SessionSummary[] = [];

    append(record: MetricRecord): void {
        this.records.push(record);
    }

    writeSummary(summary: SessionSummary): void {
        this.summaries.push(summary);
    }
}

export const testLadder = () =>
    RepresentationLadder.from([
        { id: 'low', nominalBitrateBps: 1_000_000 },
        { id: 'mid', nominalBitrateBps: 2_000_000 },
        { id: 'high', nominalBitrateBps: 4_000_000 },
    ]);

export interface TestSession {
    controller: SessionController;
    clock: ManualClock;
    sink: MemorySink;
}

export function createTestSession(overrides: Partial<SessionOptions> = {}): TestSession {
    const clock = new ManualClock(0);
    const sink = new MemorySink();
    const controller = new SessionController({
        sessionId: 'test-session',
        ladder: testLadder(),
        policy: createAbrPolicy({ kind: 'threshold' }),
        segmentCount: 3,
        clock,
        sink,
        ...overrides,
    });
    return { controller, clock, sink };
}
