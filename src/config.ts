/**
 * Centralized Configuration Module
 *
 * Type-safe, validated configuration for the study planner. Values are read
 * from environment variables once at module load and validated with zod.
 *
 * Besides server and database settings this module holds the tunable
 * heuristics of the analytics pipeline: the performance-score weights, the
 * cognitive-load normalisation and ceiling, the analysis window and the
 * snapshot timeout. Core components never import this module directly; the
 * service layer passes the relevant sections into their constructors.
 *
 * Usage:
 *   import { config, validateConfig } from './config';
 *
 *   console.log(config.server.port);
 *   console.log(config.analysis.weights.quiz);
 *
 *   validateConfig();
 *
 * @module config
 */

import { z } from 'zod';

// =============================================================================
// Configuration Schema
// =============================================================================

const NODE_ENVS = ['development', 'production', 'test'] as const;
type NodeEnv = (typeof NODE_ENVS)[number];

/**
 * Weights of the five components of the overall performance score.
 * Validated to sum to 1 by {@link validateConfig}.
 */
const weightsSchema = z.object({
  quiz: z.number().min(0).max(1).default(0.3),
  progress: z.number().min(0).max(1).default(0.25),
  flashcards: z.number().min(0).max(1).default(0.2),
  sessions: z.number().min(0).max(1).default(0.15),
  engagement: z.number().min(0).max(1).default(0.1),
});

/**
 * Zod schema for validating environment configuration.
 */
const configSchema = z.object({
  // Server configuration
  server: z.object({
    port: z.number().int().positive().default(3000),
    host: z.string().default('0.0.0.0'),
    nodeEnv: z.enum(NODE_ENVS).default('development'),
  }),

  // Database configuration (SQLite file path)
  database: z.object({
    path: z.string().default('./data/study-planner.db'),
    explicit: z.boolean().default(false),
  }),

  // CORS configuration
  cors: z.object({
    allowedOrigins: z.array(z.string()).default([]),
  }),

  // Performance analysis tunables
  analysis: z.object({
    windowDays: z.number().int().positive().default(30),
    trendPoints: z.number().int().min(1).max(52).default(4),
    snapshotTimeoutMs: z.number().int().positive().default(2000),
    weights: weightsSchema.default({}),
  }),

  // Schedule construction tunables
  scheduling: z.object({
    dailyLoadCeiling: z.number().positive().max(100).default(85),
    loadNormalizationHours: z.number().positive().default(3),
  }),

  // Completion prediction tunables
  prediction: z.object({
    noHistoryConfidenceCap: z.number().min(0).lt(0.3).default(0.25),
    defaultTargetMastery: z.number().int().min(1).max(5).default(4),
  }),
});

// TypeScript type inferred from the Zod schema
export type Config = z.infer<typeof configSchema>;
export type PerformanceWeights = z.infer<typeof weightsSchema>;

// =============================================================================
// Environment Variable Loading
// =============================================================================

/**
 * Parse a comma-separated string into an array of trimmed strings.
 * Returns an empty array if the input is undefined or empty.
 */
function parseCommaSeparated(value: string | undefined): string[] {
  if (!value || value.trim() === '') {
    return [];
  }
  return value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

/**
 * Parse an integer from an environment variable string.
 * Returns undefined if the value is not a valid integer.
 */
function parseIntOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? undefined : parsed;
}

/**
 * Parse a float from an environment variable string.
 * Returns undefined if the value is not a valid number.
 */
function parseFloatOrUndefined(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? undefined : parsed;
}

function parseNodeEnv(value: string | undefined): NodeEnv | undefined {
  return NODE_ENVS.find((env) => env === value);
}

/**
 * Parse `PERFORMANCE_WEIGHTS` given as `quiz=0.3,progress=0.25,...`.
 * Unknown keys and malformed pairs are ignored so the defaults apply.
 */
function parseWeights(value: string | undefined): Partial<PerformanceWeights> {
  const weights: Partial<PerformanceWeights> = {};
  for (const pair of parseCommaSeparated(value)) {
    const [key, raw] = pair.split('=').map((s) => s.trim());
    const weight = parseFloatOrUndefined(raw);
    if (weight === undefined) continue;
    switch (key) {
      case 'quiz':
      case 'progress':
      case 'flashcards':
      case 'sessions':
      case 'engagement':
        weights[key] = weight;
        break;
    }
  }
  return weights;
}

/**
 * Load configuration from environment variables.
 */
function loadFromEnvironment(): z.input<typeof configSchema> {
  return {
    server: {
      port: parseIntOrUndefined(process.env.PORT) ?? 3000,
      host: process.env.HOST ?? '0.0.0.0',
      nodeEnv: parseNodeEnv(process.env.NODE_ENV) ?? 'development',
    },
    database: {
      path: process.env.DATABASE_PATH ?? './data/study-planner.db',
      explicit: process.env.DATABASE_PATH !== undefined,
    },
    cors: {
      allowedOrigins: parseCommaSeparated(process.env.ALLOWED_ORIGINS),
    },
    analysis: {
      windowDays: parseIntOrUndefined(process.env.ANALYSIS_WINDOW_DAYS) ?? 30,
      trendPoints: parseIntOrUndefined(process.env.ANALYSIS_TREND_POINTS) ?? 4,
      snapshotTimeoutMs: parseIntOrUndefined(process.env.SNAPSHOT_TIMEOUT_MS) ?? 2000,
      weights: parseWeights(process.env.PERFORMANCE_WEIGHTS),
    },
    scheduling: {
      dailyLoadCeiling: parseFloatOrUndefined(process.env.DAILY_LOAD_CEILING) ?? 85,
      loadNormalizationHours: parseFloatOrUndefined(process.env.LOAD_NORMALIZATION_HOURS) ?? 3,
    },
    prediction: {
      noHistoryConfidenceCap:
        parseFloatOrUndefined(process.env.PREDICTION_NO_HISTORY_CONFIDENCE_CAP) ?? 0.25,
      defaultTargetMastery: parseIntOrUndefined(process.env.PREDICTION_TARGET_MASTERY) ?? 4,
    },
  };
}

// =============================================================================
// Configuration Validation
// =============================================================================

/**
 * Configuration validation error with detailed information about missing/invalid values.
 */
export class ConfigValidationError extends Error {
  public readonly missingVars: string[];
  public readonly invalidVars: { name: string; reason: string }[];

  constructor(
    message: string,
    missingVars: string[] = [],
    invalidVars: { name: string; reason: string }[] = []
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    this.missingVars = missingVars;
    this.invalidVars = invalidVars;
  }
}

/**
 * Cross-field checks the schema cannot express.
 *
 * - The performance weights must sum to 1.
 * - In production, DATABASE_PATH must be set explicitly.
 *
 * @throws {ConfigValidationError} If any check fails
 */
export function validateConfig(target: Config = config): void {
  const missingVars: string[] = [];
  const invalidVars: { name: string; reason: string }[] = [];

  const { quiz, progress, flashcards, sessions, engagement } = target.analysis.weights;
  const weightSum = quiz + progress + flashcards + sessions + engagement;
  if (Math.abs(weightSum - 1) > 0.001) {
    invalidVars.push({
      name: 'PERFORMANCE_WEIGHTS',
      reason: `weights must sum to 1 (got ${weightSum.toFixed(3)})`,
    });
  }

  if (target.server.nodeEnv === 'production' && !target.database.explicit) {
    missingVars.push('DATABASE_PATH');
  }

  if (missingVars.length > 0 || invalidVars.length > 0) {
    const errorParts: string[] = [];

    if (missingVars.length > 0) {
      errorParts.push(`Missing required environment variables: ${missingVars.join(', ')}`);
    }

    if (invalidVars.length > 0) {
      const invalidDescriptions = invalidVars
        .map((v) => `${v.name}: ${v.reason}`)
        .join('; ');
      errorParts.push(`Invalid configuration: ${invalidDescriptions}`);
    }

    const fullMessage = [
      '╔═══════════════════════════════════════════════════════════════════════╗',
      '║  CONFIGURATION ERROR                                                  ║',
      '╠═══════════════════════════════════════════════════════════════════════╣',
      `║  ${errorParts.join('\n║  ')}`,
      '╚═══════════════════════════════════════════════════════════════════════╝',
    ].join('\n');

    throw new ConfigValidationError(fullMessage, missingVars, invalidVars);
  }
}

/**
 * Parse a raw configuration object, applying defaults. Exposed so tests and
 * embedders can build a configuration without touching process.env.
 */
export function parseConfig(raw: z.input<typeof configSchema>): Config {
  return configSchema.parse(raw);
}

// =============================================================================
// Configuration Export
// =============================================================================

const parseResult = configSchema.safeParse(loadFromEnvironment());

if (!parseResult.success) {
  console.error('Invalid configuration schema:');
  console.error(parseResult.error.format());
  process.exit(1);
}

/**
 * The validated, type-safe configuration object.
 */
export const config: Config = parseResult.data;
