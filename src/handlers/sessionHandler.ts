import { Request, Response } from 'express';
import { Logger } from 'winston';
import { z } from 'zod';
import { AbrError } from '../core/errors';
import { SessionRegistry } from '../core/sessionRegistry';
import { ABR_POLICIES, ladderEntrySchema } from '../utils/configLoader';
import { SessionLauncher } from '../utils/sessionFactory';
import logger from '../utils/logger';

export const createSessionSchema = z.object({
    sessionId: z.string().regex(/^[A-Za-z0-9_-]{1,64}$/, 'sessionId may only contain letters, digits, "_" and "-"'),
    ladder: z.array(ladderEntrySchema).min(1).optional(),
    policy: z.enum(ABR_POLICIES).optional(),
    segmentCount: z.number().int().nonnegative().optional(),
    baseUrl: z.string().url().optional(),
});

export class SessionHandler {
    private registry: SessionRegistry;
    private launch: SessionLauncher;
    private logger: Logger;

    constructor(registry: SessionRegistry, launch: SessionLauncher, loggerInstance?: Logger) {
        this.registry = registry;
        this.launch = launch;
        this.logger = loggerInstance || logger;
    }

    public handleList = (req: Request, res: Response): void => {
        res.status(200).json({ sessions: this.registry.list() });
    };

    public handleMetrics = (req: Request, res: Response): void => {
        const entry = this.registry.get(req.params.sessionId);
        if (!entry) {
            res.status(404).json({ error: 'Session not found' });
            return;
        }
        res.status(200).json({
            sessionId: entry.controller.sessionId,
            state: entry.controller.state,
            records: entry.controller.getRecords(),
        });
    };

    public handleSummary = (req: Request, res: Response): void => {
        const summary = this.registry.getSummary(req.params.sessionId);
        if (!summary) {
            res.status(404).json({ error: 'Session not found' });
            return;
        }
        res.status(200).json(summary);
    };

    public handleCreate = (req: Request, res: Response): void => {
        try {
            const data = createSessionSchema.parse(req.body);
            if (this.registry.has(data.sessionId)) {
                res.status(409).json({ error: 'Session already exists', sessionId: data.sessionId });
                return;
            }

            const entry = this.launch(data);
            this.logger.info(`[${data.sessionId}] Session started via control API`);
            res.status(202).json({
                sessionId: entry.controller.sessionId,
                state: entry.controller.state,
                representationId: entry.controller.currentRepresentation.id,
            });
        } catch (error) {
            if (error instanceof z.ZodError) {
                res.status(400).json({ error: 'Invalid request', details: error.errors });
                return;
            }
            if (error instanceof AbrError) {
                res.status(error.code === 'INVALID_STATE' ? 409 : 400).json({ error: error.message, code: error.code });
                return;
            }
            this.logger.error('Failed to start session:', error);
            res.status(500).json({ error: 'Failed to start session' });
        }
    };

    public handleAbort = (req: Request, res: Response): void => {
        const entry = this.registry.get(req.params.sessionId);
        if (!entry) {
            res.status(404).json({ error: 'Session not found' });
            return;
        }
        entry.abortController.abort();
        this.logger.info(`[${entry.controller.sessionId}] Abort requested via control API`);
        res.status(202).json({ sessionId: entry.controller.sessionId, state: entry.controller.state });
    };
}
