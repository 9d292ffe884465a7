import { SessionState, SessionSummary } from '../types';
import { InvalidInputError } from './errors';
import { SessionController } from './sessionController';

export interface SessionEntry {
    controller: SessionController;
    registeredAt: number;
    abortController: AbortController;
    /** Settles when the driving loop returns. */
    completion?: Promise<SessionSummary>;
}

export interface SessionStatus {
    sessionId: string;
    state: SessionState;
    segmentIndex: number;
    segmentCount: number;
    representationId: string;
    recordCount: number;
    policy: string;
}

export interface SessionRegistryOptions {
    /** How many summaries of retired sessions to keep. Oldest are dropped first. */
    retainedSummaries?: number;
}

export const DEFAULT_RETAINED_SUMMARIES = 100;

/**
 * Sessions hosted by one process. Each controller is registered once and driven by exactly one
 * loop; sessions share no mutable state. A settled session is retired: its controller is released
 * and only its summary is kept.
 */
export class SessionRegistry {
    private readonly sessions = new Map<string, SessionEntry>();
    private readonly retired = new Map<string, SessionSummary>();
    private readonly retainedSummaries: number;

    constructor(options: SessionRegistryOptions = {}) {
        const retainedSummaries = options.retainedSummaries ?? DEFAULT_RETAINED_SUMMARIES;
        if (!Number.isInteger(retainedSummaries) || retainedSummaries < 0) {
            throw new InvalidInputError(`Retained summaries must be a non-negative integer (got ${retainedSummaries})`);
        }
        this.retainedSummaries = retainedSummaries;
    }

    public register(controller: SessionController): SessionEntry {
        if (this.sessions.has(controller.sessionId)) {
            throw new InvalidInputError(`Session already registered: ${controller.sessionId}`);
        }
        const entry: SessionEntry = {
            controller,
            registeredAt: Date.now(),
            abortController: new AbortController(),
        };
        this.sessions.set(controller.sessionId, entry);
        return entry;
    }

    public has(sessionId: string): boolean {
        return this.sessions.has(sessionId);
    }

    public get(sessionId: string): SessionEntry | undefined {
        return this.sessions.get(sessionId);
    }

    /** Drops a settled session, keeping its summary. Returns false when the id is not live. */
    public retire(sessionId: string, summary: SessionSummary): boolean {
        if (!this.sessions.delete(sessionId)) {
            return false;
        }
        this.retired.delete(sessionId);
        this.retired.set(sessionId, summary);
        while (this.retired.size > this.retainedSummaries) {
            const oldest = this.retired.keys().next();
            if (oldest.done) {
                break;
            }
            this.retired.delete(oldest.value);
        }
        return true;
    }

    /** Summary of a live session, or the kept summary of a retired one. */
    public getSummary(sessionId: string): SessionSummary | undefined {
        const entry = this.sessions.get(sessionId);
        return entry ? entry.controller.summarize() : this.retired.get(sessionId);
    }

    public get size(): number {
        return this.sessions.size;
    }

    public list(): SessionStatus[] {
        return Array.from(this.sessions.values()).map(({ controller }) => ({
            sessionId: controller.sessionId,
            state: controller.state,
            segmentIndex: controller.segmentIndex,
            segmentCount: controller.segmentCount,
            representationId: controller.currentRepresentation.id,
            recordCount: controller.getRecords().length,
            policy: controller.policy.kind,
        }));
    }

    public summaries(): SessionSummary[] {
        return [
            ...this.retired.values(),
            ...Array.from(this.sessions.values()).map(({ controller }) => controller.summarize()),
        ];
    }

    /** Signals every running session to stop; resolves once their loops have returned. */
    public async abortAll(): Promise<void> {
        const pending: Promise<SessionSummary>[] = [];
        for (const entry of this.sessions.values()) {
            if (entry.controller.state !== 'Finished') {
                entry.abortController.abort();
            }
            if (entry.completion) {
                pending.push(entry.completion);
            }
        }
        await Promise.allSettled(pending);
    }
}
