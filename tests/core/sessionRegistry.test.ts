import { SessionRegistry } from '../../src/core/sessionRegistry';
import { InvalidInputError } from '../../src/core/errors';
import { createTestSession } from '../helpers';

describe('SessionRegistry', () => {
    let registry: SessionRegistry;

    beforeEach(() => {
        registry = new SessionRegistry();
    });

    it('should register and list sessions', () => {
        const { controller } = createTestSession({ sessionId: 'alpha' });
        registry.register(controller);

        expect(registry.has('alpha')).toBe(true);
        expect(registry.size).toBe(1);
        expect(registry.list()).toEqual([
            {
                sessionId: 'alpha',
                state: 'Idle',
                segmentIndex: 0,
                segmentCount: 3,
                representationId: 'low',
                recordCount: 0,
                policy: 'threshold',
            },
        ]);
    });

    it('should refuse a duplicate session id', () => {
        registry.register(createTestSession({ sessionId: 'alpha' }).controller);

        expect(() => registry.register(createTestSession({ sessionId: 'alpha' }).controller)).toThrow(
            new InvalidInputError('Session already registered: alpha')
        );
    });

    it('should keep sessions independent', () => {
        const a = createTestSession({ sessionId: 'a' });
        const b = createTestSession({ sessionId: 'b' });
        registry.register(a.controller);
        registry.register(b.controller);

        a.controller.beginSegment();

        const [statusA, statusB] = registry.list();
        expect(statusA.state).toBe('Awaiting');
        expect(statusB.state).toBe('Idle');
    });

    it('should abort running sessions and wait for their loops', async () => {
        const { controller } = createTestSession({ sessionId: 'alpha' });
        const entry = registry.register(controller);
        entry.completion = new Promise(resolve => {
            entry.abortController.signal.addEventListener('abort', () => {
                controller.abort();
                resolve(controller.finish());
            });
        });
        controller.beginSegment();

        await registry.abortAll();

        expect(entry.abortController.signal.aborted).toBe(true);
        expect(controller.state).toBe('Finished');
        expect(registry.summaries()[0].timedOutSegments).toBe(1);
    });

    it('should retire a settled session and keep only its summary', () => {
        const { controller } = createTestSession({ sessionId: 'alpha' });
        registry.register(controller);
        const summary = controller.finish();

        expect(registry.retire('alpha', summary)).toBe(true);
        expect(registry.has('alpha')).toBe(false);
        expect(registry.get('alpha')).toBeUndefined();
        expect(registry.size).toBe(0);
        expect(registry.list()).toEqual([]);
        expect(registry.getSummary('alpha')).toBe(summary);
        expect(registry.summaries()).toEqual([summary]);
        expect(registry.retire('alpha', summary)).toBe(false);
    });

    it('should allow an id to be reused once retired', () => {
        const first = createTestSession({ sessionId: 'alpha' }).controller;
        registry.register(first);
        registry.retire('alpha', first.finish());

        const second = createTestSession({ sessionId: 'alpha' }).controller;
        registry.register(second);

        expect(registry.get('alpha')?.controller).toBe(second);
        expect(registry.getSummary('alpha')?.recordCount).toBe(0);
    });

    it('should drop the oldest retired summaries beyond the limit', () => {
        registry = new SessionRegistry({ retainedSummaries: 2 });
        for (const id of ['a', 'b', 'c']) {
            const { controller } = createTestSession({ sessionId: id });
            registry.register(controller);
            registry.retire(id, controller.finish());
        }

        expect(registry.getSummary('a')).toBeUndefined();
        expect(registry.summaries().map(s => s.sessionId)).toEqual(['b', 'c']);
        expect(() => new SessionRegistry({ retainedSummaries: -1 })).toThrow(InvalidInputError);
    });
});
