import path from 'path';
import { createApp } from './app';
import { SessionRegistry } from './core/sessionRegistry';
import { ConfigLoader } from './utils/configLoader';
import { ReportGenerator } from './utils/reportGenerator';
import { createLauncher } from './utils/sessionFactory';
import logger, { reloadLoggerConfig } from './utils/logger';

// Load configuration
const configLoader = ConfigLoader.getInstance();
const config = configLoader.getConfig();
const serverConfig = configLoader.getServerConfig();
const reportsConfig = configLoader.getReportsConfig();

const registry = new SessionRegistry({ retainedSummaries: reportsConfig.retainedSummaries });
const reportGenerator = new ReportGenerator(registry, logger);
const launch = createLauncher(registry, config, { loggerInstance: logger });

const app = createApp({ registry, launch, reportGenerator, loggerInstance: logger });

let reportTimer: NodeJS.Timeout | undefined;
if (reportsConfig.enabled) {
    reportTimer = setInterval(() => {
        reportGenerator.saveReport(path.join(reportsConfig.path, 'session_history.txt'));
    }, reportsConfig.intervalMinutes * 60 * 1000);
}

const server = app.listen(serverConfig.port, serverConfig.host, () => {
    logger.info(`ABR session lab listening on ${serverConfig.host}:${serverConfig.port}`);
    logger.info(`Metric logs are written to: ${config.metrics.path}`);
    logger.info(`ABR policy: ${config.abr.policy}, ladder: ${config.ladder.map(r => `${r.id}@${r.nominalBitrateBps}`).join(', ')}`);
});

async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down...`);
    clearInterval(reportTimer);
    // Running sessions still record the segment they were waiting on
    await registry.abortAll();
    if (reportsConfig.enabled) {
        reportGenerator.saveReport(path.join(reportsConfig.path, 'session_history.txt'));
    }
    server.close(() => process.exit(0));
}

// Re-read config.yaml and apply its log level
process.on('SIGHUP', () => {
    reloadLoggerConfig();
});

process.on('SIGINT', () => {
    shutdown('SIGINT').catch(error => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
    });
});

process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch(error => {
        logger.error('Error during shutdown:', error);
        process.exit(1);
    });
});
