import fs from 'fs';
import os from 'os';
import path from 'path';
import { abrPolicyFromConfig, createLauncher, createSession } from '../../src/utils/sessionFactory';
import { AppConfig, ConfigLoader } from '../../src/utils/configLoader';
import { SessionRegistry } from '../../src/core/sessionRegistry';
import { ManualClock } from '../../src/core/clock';
import { HttpSegmentTransport } from '../../src/transports/httpSegmentTransport';
import { SegmentTransport } from '../../src/transports/segmentTransport';
import { MemorySink } from '../helpers';

const completingTransport = (clock: ManualClock): SegmentTransport => ({
    name: 'fake',
    fetchSegment: async (request, onProgress) => {
        clock.advance(1000);
        onProgress({
            segmentIndex: request.segmentIndex,
            representationId: request.representation.id,
            bytesSoFar: 100000,
            elapsedSoFar: 1,
            isFirstChunk: true,
            isFinal: true,
        });
    },
});

describe('session factory', () => {
    let tmpDir: string;
    let config: AppConfig;
    let clock: ManualClock;

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'abr-factory-'));
        config = ConfigLoader.parse(
            [
                'metrics:',
                `  path: ${JSON.stringify(path.join(tmpDir, 'results'))}`,
                '  trace:',
                `    path: ${JSON.stringify(path.join(tmpDir, 'qlog'))}`,
                'session:',
                '  segmentCount: 2',
                'abr:',
                '  safetyFactor: 0.5',
            ].join('\n')
        );
        clock = new ManualClock(0);
    });

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should build policies from configuration', () => {
        expect(abrPolicyFromConfig(config.abr)).toEqual({ kind: 'threshold', signal: 'smoothed', safetyFactor: 0.5 });
        expect(abrPolicyFromConfig(config.abr, 'hysteresis')).toEqual({
            kind: 'hysteresis',
            signal: 'segment',
            upFactor: 1.5,
            downFactor: 0.8,
        });
    });

    it('should apply per-session overrides', () => {
        const { controller, transport } = createSession(
            config,
            {
                sessionId: 's1',
                ladder: [{ id: 'only', nominalBitrateBps: 100000 }],
                policy: 'hysteresis',
                segmentCount: 7,
            },
            { clock, sink: new MemorySink() }
        );

        expect(controller.segmentCount).toBe(7);
        expect(controller.policy.kind).toBe('hysteresis');
        expect(controller.currentRepresentation.id).toBe('only');
        expect(transport).toBeInstanceOf(HttpSegmentTransport);
    });

    it('should write CSV, summary and trace files by default', () => {
        const { controller } = createSession(config, { sessionId: 's1' }, { clock, transport: completingTransport(clock) });

        controller.finish();

        const results = fs.readdirSync(path.join(tmpDir, 'results')).sort();
        expect(results).toHaveLength(2);
        expect(results[0]).toMatch(/^abr_s1_metrics_\d{8}_\d{6}\.csv$/);
        expect(results[1]).toMatch(/^abr_s1_summary_\d{8}_\d{6}\.txt$/);
        expect(fs.readdirSync(path.join(tmpDir, 'qlog'))).toEqual([expect.stringMatching(/^abr_s1_\d{8}_\d{6}\.trace\.json$/)]);
    });

    it('should register and drive launched sessions', async () => {
        const registry = new SessionRegistry();
        const sink = new MemorySink();
        const launch = createLauncher(registry, config, { clock, sink, transport: completingTransport(clock) });

        const entry = launch({ sessionId: 'l1' });
        const summary = await entry.completion;

        expect(summary?.recordCount).toBe(2);
        expect(summary?.completedSegments).toBe(2);
        expect(sink.summaries).toHaveLength(1);
    });

    it('should retire a session from the registry once its loop settles', async () => {
        const registry = new SessionRegistry();
        const launch = createLauncher(registry, config, { clock, sink: new MemorySink(), transport: completingTransport(clock) });

        const entry = launch({ sessionId: 'l1' });
        expect(registry.has('l1')).toBe(true);
        const summary = await entry.completion;

        expect(registry.has('l1')).toBe(false);
        expect(registry.size).toBe(0);
        expect(registry.getSummary('l1')).toBe(summary);
        expect(registry.getSummary('l1')?.recordCount).toBe(2);

        const relaunched = launch({ sessionId: 'l1', segmentCount: 0 });
        expect(registry.get('l1')).toBe(relaunched);
        await relaunched.completion;
    });

    it('should reject a duplicate session id', () => {
        const registry = new SessionRegistry();
        const launch = createLauncher(registry, config, { clock, sink: new MemorySink(), transport: completingTransport(clock) });
        launch({ sessionId: 'l1', segmentCount: 0 });

        expect(() => launch({ sessionId: 'l1' })).toThrow('Session already registered: l1');
    });
});
