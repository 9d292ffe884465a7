import express, { Request, Response, NextFunction } from 'express';
import { Logger } from 'winston';
import { SessionRegistry } from './core/sessionRegistry';
import { SessionHandler } from './handlers/sessionHandler';
import { ReportGenerator } from './utils/reportGenerator';
import { SessionLauncher } from './utils/sessionFactory';
import { isLogLevel, LOG_LEVELS } from './utils/configLoader';
import defaultLogger from './utils/logger';

export interface AppDependencies {
    registry: SessionRegistry;
    launch: SessionLauncher;
    reportGenerator: ReportGenerator;
    loggerInstance?: Logger;
}

export function createApp({ registry, launch, reportGenerator, loggerInstance }: AppDependencies): express.Express {
    const logger = loggerInstance || defaultLogger;
    const sessionHandler = new SessionHandler(registry, launch, logger);
    const app = express();

    app.use(express.json());

    // Log all requests
    app.use((req: Request, res: Response, next: NextFunction) => {
        logger.http(`[${req.method}] ${req.originalUrl}`);
        next();
    });

    app.get('/', (req: Request, res: Response) => {
        res.send('ABR session lab is running.');
    });

    app.get('/sessions', sessionHandler.handleList);
    app.post('/sessions', sessionHandler.handleCreate);
    app.get('/sessions/:sessionId/metrics', sessionHandler.handleMetrics);
    app.get('/sessions/:sessionId/summary', sessionHandler.handleSummary);
    app.delete('/sessions/:sessionId', sessionHandler.handleAbort);

    app.get('/report', (req: Request, res: Response) => {
        res.setHeader('Content-Type', 'text/plain');
        res.send(reportGenerator.generateReport());
    });

    app.post('/config/loglevel', (req: Request, res: Response) => {
        const newLogLevel = req.query.level;

        if (typeof newLogLevel !== 'string' || !newLogLevel) {
            res.status(400).json({ error: 'Log level not provided', message: 'Please provide a log level as a query parameter' });
            return;
        }
        if (!isLogLevel(newLogLevel)) {
            res.status(400).json({
                error: 'Invalid log level',
                message: `Log level must be one of: ${LOG_LEVELS.join(', ')}`
            });
            return;
        }

        logger.level = newLogLevel;
        logger.info(`Log level changed to: ${newLogLevel}`);
        res.status(200).json({ success: true, message: `Log level set to: ${newLogLevel}` });
    });

    // Error handler
    app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
        logger.error('Unhandled error:', err);
        res.status(500).send('Internal Server Error');
    });

    return app;
}
