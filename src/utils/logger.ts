import winston from 'winston';
import fs from 'fs';
import path from 'path';
import { ConfigLoader, LogLevel } from './configLoader';

const configLoader = ConfigLoader.getInstance();
const serverConfig = configLoader.getServerConfig();
const isTest = process.env.NODE_ENV === 'test';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.printf(({ level, message, timestamp }) => {
        return `${timestamp} ${level}: ${message}`;
      })
    ),
  }),
];

// Test runs keep the working tree clean
if (!isTest) {
  const logsDir = serverConfig.logDir;
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }
  transports.push(
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error'
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log')
    })
  );
}

const logger = winston.createLogger({
  level: serverConfig.logLevel,
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.json()
  ),
  defaultMeta: { service: 'abr-session-lab' },
  transports,
});

// Re-reads the configuration and applies its log level
export function reloadLoggerConfig(): LogLevel {
  const refreshedConfig = configLoader.reloadConfig();
  const logLevel = refreshedConfig.server.logLevel;

  logger.level = logLevel;
  logger.info(`Logger configuration reloaded. Log level set to: ${logLevel}`);
  return logLevel;
}

export default logger;
