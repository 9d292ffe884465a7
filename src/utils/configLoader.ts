import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export const ABR_POLICIES = ['threshold', 'hysteresis'] as const;

const serverSchema = z.object({
  port: z.number().int().min(0).max(65535).default(8080),
  host: z.string().default('0.0.0.0'),
  logLevel: z.enum(LOG_LEVELS).default('info'),
  logDir: z.string().default('./logs'),
});

const sessionSchema = z.object({
  segmentCount: z.number().int().nonnegative().default(4),
  segmentDurationSeconds: z.number().positive().default(2),
  segmentTimeoutSeconds: z.number().positive().default(30),
  initialBufferSeconds: z.number().nonnegative().default(0),
  throughputWindowSize: z.number().int().positive().default(5),
  rttWindowSize: z.number().int().positive().default(10),
  interSegmentDelayMs: z.number().int().nonnegative().default(0),
});

const abrSchema = z.object({
  policy: z.enum(ABR_POLICIES).default('threshold'),
  safetyFactor: z.number().positive().default(0.8),
  upFactor: z.number().positive().default(1.5),
  downFactor: z.number().positive().default(0.8),
});

const rttSchema = z.object({
  estimator: z.enum(['elapsed', 'size-scaled']).default('elapsed'),
  smallPayloadBytes: z.number().int().nonnegative().default(10000),
  scale: z.number().positive().default(0.1),
});

const metricsSchema = z.object({
  path: z.string().default(path.join(process.cwd(), 'results')),
  filePrefix: z.string().min(1).default('abr'),
  trace: z.object({
    enabled: z.boolean().default(true),
    path: z.string().default(path.join(process.cwd(), 'qlog')),
  }).default({}),
});

const reportsSchema = z.object({
  enabled: z.boolean().default(true),
  path: z.string().default(path.join(process.cwd(), 'reports')),
  intervalMinutes: z.number().positive().default(5),
  retainedSummaries: z.number().int().nonnegative().default(100),
});

const sourceSchema = z.object({
  baseUrl: z.string().url().default('http://localhost:8080'),
  segmentTemplate: z.string().default('{representationId}/segment_{segmentIndex}.m4s'),
});

export const ladderEntrySchema = z.object({
  id: z.string().min(1),
  nominalBitrateBps: z.number().int().nonnegative(),
});

const DEFAULT_LADDER = [
  { id: 'low', nominalBitrateBps: 360000 },
  { id: 'medium', nominalBitrateBps: 720000 },
  { id: 'high', nominalBitrateBps: 1080000 },
];

export const appConfigSchema = z.object({
  server: serverSchema.default({}),
  session: sessionSchema.default({}),
  abr: abrSchema.default({}),
  rtt: rttSchema.default({}),
  metrics: metricsSchema.default({}),
  reports: reportsSchema.default({}),
  source: sourceSchema.default({}),
  ladder: z.array(ladderEntrySchema).min(1).default(DEFAULT_LADDER),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type ServerConfig = AppConfig['server'];
export type SessionConfig = AppConfig['session'];
export type AbrConfig = AppConfig['abr'];
export type RttConfig = AppConfig['rtt'];
export type MetricsConfig = AppConfig['metrics'];
export type ReportsConfig = AppConfig['reports'];
export type SourceConfig = AppConfig['source'];
export type LogLevel = ServerConfig['logLevel'];
export type AbrPolicyName = AbrConfig['policy'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function isAbrPolicyName(value: string): value is AbrPolicyName {
  return ABR_POLICIES.some(policy => policy === value);
}

export class ConfigLoader {
  private static instance: ConfigLoader | undefined;
  private config: AppConfig;
  private configPath: string;

  private constructor(configPath: string) {
    this.configPath = configPath;
    this.config = this.loadConfig();
  }

  public static getInstance(configPath?: string): ConfigLoader {
    if (!ConfigLoader.instance) {
      const defaultPath = process.env.ABR_CONFIG || path.join(process.cwd(), 'config.yaml');
      ConfigLoader.instance = new ConfigLoader(configPath || defaultPath);
    }
    return ConfigLoader.instance;
  }

  // Parses a YAML document without touching the singleton
  public static parse(contents: string): AppConfig {
    return appConfigSchema.parse(yaml.load(contents) ?? {});
  }

  private loadConfig(): AppConfig {
    try {
      if (!fs.existsSync(this.configPath)) {
        console.warn(`Configuration file not found at ${this.configPath}, using default values`);
        const defaults = this.getDefaultConfig();
        this.applyEnvironmentOverrides(defaults);
        return defaults;
      }

      const fileContents = fs.readFileSync(this.configPath, 'utf8');
      const config = ConfigLoader.parse(fileContents);

      this.applyEnvironmentOverrides(config);

      console.info('Configuration loaded successfully');
      return config;
    } catch (error) {
      if (error instanceof z.ZodError) {
        console.error(`Invalid configuration in ${this.configPath}:`);
        error.errors.forEach(issue => {
          console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
        });
      } else {
        console.error(`Error loading configuration: ${error instanceof Error ? error.message : 'Unknown error'}`);
      }
      return this.getDefaultConfig();
    }
  }

  private getDefaultConfig(): AppConfig {
    return appConfigSchema.parse({});
  }

  private applyEnvironmentOverrides(config: AppConfig): void {
    if (process.env.SERVER_PORT) {
      const port = parseInt(process.env.SERVER_PORT, 10);
      if (!isNaN(port)) {
        config.server.port = port;
      }
    }
    if (process.env.SERVER_HOST) {
      config.server.host = process.env.SERVER_HOST;
    }
    const logLevel = process.env.LOG_LEVEL;
    if (logLevel && isLogLevel(logLevel)) {
      config.server.logLevel = logLevel;
    }
    if (process.env.METRICS_PATH) {
      config.metrics.path = process.env.METRICS_PATH;
    }
    const policy = process.env.ABR_POLICY;
    if (policy && isAbrPolicyName(policy)) {
      config.abr.policy = policy;
    }
  }

  public getConfig(): AppConfig {
    return this.config;
  }

  public reloadConfig(): AppConfig {
    this.config = this.loadConfig();
    return this.config;
  }

  public getServerConfig(): ServerConfig {
    return this.config.server;
  }

  public getSessionConfig(): SessionConfig {
    return this.config.session;
  }

  public getAbrConfig(): AbrConfig {
    return this.config.abr;
  }

  public getRttConfig(): RttConfig {
    return this.config.rtt;
  }

  public getMetricsConfig(): MetricsConfig {
    return this.config.metrics;
  }

  public getReportsConfig(): ReportsConfig {
    return this.config.reports;
  }

  public getSourceConfig(): SourceConfig {
    return this.config.source;
  }

  public getLadder(): AppConfig['ladder'] {
    return this.config.ladder;
  }
}
