import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigValidationError, errorMessage } from './errors';
import { CopierConfig, ORDER_TYPES } from './types';

const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../config/copier.json');

const venueSchema = z.object({
  name: z.string().trim().min(1),
  bridgeUrl: z.string().url(),
  apiKeyEnv: z.string().min(1).optional(),
  timeoutMs: z.number().int().positive().default(10000),
});

const terminalSchema = venueSchema.extend({
  lotMultiplier: z.number().positive(),
  minLot: z.number().nonnegative().default(0.01),
  maxLot: z.number().positive().default(100),
  allowedOrderTypes: z.array(z.enum(ORDER_TYPES)).nonempty(),
  symbolMapping: z.record(z.string().trim().min(1)).default({}),
  orphanPolicy: z.object({
    act: z.boolean(),
    actOnPositions: z.boolean().optional(),
    thresholdRuns: z.number().int().min(1),
  }).default({ act: false, thresholdRuns: 3 }),
  maxPendingOrders: z.object({
    enabled: z.boolean(),
    limit: z.number().int().min(0),
  }).default({ enabled: false, limit: 0 }),
}).refine(t => t.minLot <= t.maxLot, {
  message: 'minLot must not exceed maxLot',
  path: ['minLot'],
});

const copierSchema = z.object({
  source: venueSchema,
  targets: z.array(terminalSchema).min(1),
  schedule: z.object({
    mode: z.enum(['scheduled', 'continuous']).default('scheduled'),
    timeframe: z.enum(['M1', 'M5', 'M15', 'M30', 'H1', 'H4', 'D1']).default('M5'),
    offsetSeconds: z.number().int().min(0).default(60),
    continuousDelaySeconds: z.number().int().min(1).default(5),
    maxRuntimeHours: z.number().min(0).default(0),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    filePath: z.string().min(1).optional(),
    maxFileSizeMb: z.number().positive().default(10),
    backupCount: z.number().int().min(0).default(5),
    consoleOutput: z.boolean().default(true),
  }).default({}),
  state: z.object({
    dbPath: z.string().min(1).default('./data/copier.db'),
  }).default({}),
  gateway: z.object({
    retryAttempts: z.number().int().min(0).default(3),
    retryBaseDelayMs: z.number().int().min(0).default(1000),
    circuitBreakerThreshold: z.number().int().min(1).default(5),
    circuitBreakerResetMs: z.number().int().min(0).default(60000),
  }).default({}),
  matching: z.object({
    priceTolerance: z.number().nonnegative().default(1e-5),
  }).default({}),
}).superRefine((config, ctx) => {
  const seen = new Set<string>([config.source.name]);
  config.targets.forEach((target, index) => {
    if (seen.has(target.name)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `duplicate venue name "${target.name}"`,
        path: ['targets', index, 'name'],
      });
    }
    seen.add(target.name);
  });
});

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Validate a raw config object. Every issue is reported at once so a
 * broken file can be fixed in one pass.
 */
export function parseCopierConfig(raw: unknown): CopierConfig {
  const result = copierSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }

  const config: CopierConfig = result.data;

  // Environment overrides
  if (process.env.COPIER_DB_PATH) {
    config.state = { dbPath: process.env.COPIER_DB_PATH };
  }

  return deepFreeze(config);
}

export class ConfigManager {
  private configPath: string;
  private config: CopierConfig | null = null;

  constructor(configPath?: string) {
    this.configPath = configPath || process.env.COPIER_CONFIG_PATH || DEFAULT_CONFIG_PATH;
  }

  /**
   * Read and validate the config file once. Failures surface at startup.
   */
  load(): CopierConfig {
    if (this.config) return this.config;

    if (!fs.existsSync(this.configPath)) {
      throw new ConfigValidationError([`config file not found: ${this.configPath}`]);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.configPath, 'utf8'));
    } catch (error) {
      throw new ConfigValidationError([`${this.configPath}: ${errorMessage(error)}`]);
    }

    this.config = parseCopierConfig(raw);
    return this.config;
  }

  getPath(): string {
    return this.configPath;
  }

  /**
   * Resolve the API key of a venue from the environment, if it names one.
   */
  static resolveApiKey(venue: { name: string; apiKeyEnv?: string }): string | undefined {
    if (!venue.apiKeyEnv) return undefined;
    const key = process.env[venue.apiKeyEnv];
    if (!key) {
      throw new ConfigValidationError([`${venue.name}: environment variable ${venue.apiKeyEnv} is not set`]);
    }
    return key;
  }
}
