import fs from 'fs';
import os from 'os';
import path from 'path';
import { TraceLog } from '../../src/utils/traceLog';
import { ManualClock } from '../../src/core/clock';
import { createAbrPolicy } from '../../src/core/abrPolicy';
import { SessionController } from '../../src/core/sessionController';
import { testLadder } from '../helpers';

describe('TraceLog', () => {
    let tmpDir: string;
    let clock: ManualClock;
    let trace: TraceLog;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'abr-trace-'));
        clock = new ManualClock(0);
        trace = new TraceLog({ directory: tmpDir, prefix: 'abr_t1', clock });
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    const runOneSegment = () => {
        const controller = new SessionController({
            sessionId: 't1',
            ladder: testLadder(),
            policy: createAbrPolicy({ kind: 'threshold' }),
            segmentCount: 1,
            clock,
            sink: trace,
            listener: trace,
        });
        const request = controller.beginSegment();
        if (!request) {
            throw new Error('expected a segment request');
        }
        clock.advance(1000);
        controller.reportProgress({
            segmentIndex: 0,
            representationId: 'low',
            bytesSoFar: 100000,
            elapsedSoFar: 1,
            isFirstChunk: true,
            isFinal: true,
        });
        return controller;
    };

    it('should trace a session from start to summary in order', () => {
        runOneSegment();

        const events = trace.getEvents();
        expect(events.map(e => e.name)).toEqual([
            'session:start',
            'segment:request',
            'segment:data_received',
            'segment:transfer_complete',
            'metrics:record',
            'session:summary',
        ]);
        expect(events.map(e => e.time)).toEqual([0, 0, 1000, 1000, 1000, 1000]);
        expect(events[3].data).toEqual({
            segment_index: 0,
            total_bytes: 100000,
            total_time_ms: 1000,
            transfer_rate_kbps: 800,
        });
    });

    it('should save the trace document when the summary is written', () => {
        runOneSegment();

        const filePath = trace.filePath;
        expect(filePath).toBeDefined();
        if (!filePath) {
            return;
        }
        expect(path.dirname(filePath)).toBe(tmpDir);
        const document = JSON.parse(fs.readFileSync(filePath, 'utf8'));
        expect(document.trace_version).toBe('1.0');
        expect(document.trace.common_fields).toEqual({ reference_time: 0, time_units: 'ms' });
        expect(document.trace.events).toHaveLength(6);
    });

    it('should report bytes received since the previous chunk', () => {
        const request = {
            sessionId: 't1',
            segmentIndex: 4,
            representation: { id: 'mid', nominalBitrateBps: 2_000_000 },
            requestedAt: 0,
        };
        trace.onSegmentRequest(request);
        trace.onProgress({ segmentIndex: 4, representationId: 'mid', bytesSoFar: 1200, elapsedSoFar: 0.1, isFirstChunk: true, isFinal: false }, 100);
        trace.onProgress({ segmentIndex: 4, representationId: 'mid', bytesSoFar: 3000, elapsedSoFar: 0.2, isFirstChunk: false, isFinal: false }, 200);
        trace.onRepresentationSwitch(request.representation, { id: 'high', nominalBitrateBps: 4_000_000 }, 4);

        const events = trace.getEvents();
        expect(events.map(e => e.data.bytes_received)).toEqual([undefined, 1200, 1800, undefined]);
        expect(events[3]).toEqual({ time: 0, name: 'abr:switch', data: { segment_index: 4, from: 'mid', to: 'high' } });
    });
});
