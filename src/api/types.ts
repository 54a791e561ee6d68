/**
 * API Response Types and Request Schemas
 *
 * Every endpoint answers with one of two envelopes:
 *
 * ```json
 * { "success": true, "data": { ... } }
 * { "success": false, "error": { "code": "NOT_FOUND", "message": "...", "details": { ... } } }
 * ```
 *
 * Request bodies and query strings are validated with the Zod schemas below.
 * Dates arrive as ISO 8601 strings and are parsed into `Date` objects.
 */

import { z } from 'zod';

// ============================================================================
// Response Types
// ============================================================================

export interface ApiResponse<T> {
  success: true;
  data: T;
}

export interface ApiError {
  /** Machine-readable code, e.g. 'VALIDATION_ERROR' or 'CONFLICT' */
  code: string;
  message: string;
  /** Field-level validation failures or other context */
  details?: unknown;
}

export interface ApiErrorResponse {
  success: false;
  error: ApiError;
}

export type ApiResult<T> = ApiResponse<T> | ApiErrorResponse;

/** One failed field of a rejected body or query string. */
export interface ValidationErrorDetail {
  /** Dot-notation path to the invalid field (e.g. 'data.sessionId') */
  path: string;
  message: string;
}

// ============================================================================
// Shared Field Schemas
// ============================================================================

const id = z.string().min(1, 'Id is required');

/** ISO 8601 date or date-time, parsed into a Date. */
const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'Invalid date')
  .transform((value) => new Date(value));

const difficulty = z.enum(['easy', 'medium', 'hard']);

// ============================================================================
// Plan Schemas
// ============================================================================

/**
 * Numeric preferences are only required to be finite; the plan generator
 * replaces non-positive values with its defaults.
 */
export const planPreferencesSchema = z.object({
  dailyHours: z.number().finite().optional(),
  studyDaysPerWeek: z.number().finite().optional(),
  sessionLengthMinutes: z.number().finite().optional(),
  intensityMultiplier: z.number().finite().optional(),
  preferShortSessions: z.boolean().optional(),
  includeWeekends: z.boolean().optional(),
});

export const generatePlanSchema = z.object({
  learnerId: id,
  courseId: id,
  planType: z.enum(['weekly', 'monthly', 'exam_prep', 'custom']),
  targetDate: isoDate.nullable().optional(),
  preferences: planPreferencesSchema.optional(),
});

/**
 * Override bodies. Value ranges (difficulty delta, review interval, known
 * session ids) are checked by the plan itself, which answers an out-of-range
 * request with `accepted: false` rather than a validation error.
 */
export const overrideSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('schedule'),
    data: z.object({
      sessionId: id,
      date: z.string().optional(),
      startTime: z.string().optional(),
    }),
    reason: z.string().min(1, 'Reason is required'),
  }),
  z.object({
    type: z.literal('difficulty'),
    data: z.object({ delta: z.number() }),
    reason: z.string().min(1, 'Reason is required'),
  }),
  z.object({
    type: z.literal('review_frequency'),
    data: z.object({ everySessions: z.number() }),
    reason: z.string().min(1, 'Reason is required'),
  }),
]);

export const sessionStatusSchema = z.object({
  status: z.enum(['completed', 'skipped']),
});

// ============================================================================
// Activity Schemas
// ============================================================================

const quizActivity = z.object({
  kind: z.literal('quiz'),
  score: z.number().min(0).max(100),
  startedAt: isoDate,
  difficulty: difficulty.default('medium'),
});

const sessionActivity = z.object({
  kind: z.literal('session'),
  scheduledStart: isoDate,
  scheduledEnd: isoDate,
  actualStart: isoDate.nullable().default(null),
  actualEnd: isoDate.nullable().default(null),
  status: z.enum(['scheduled', 'in_progress', 'completed', 'skipped', 'cancelled']),
  productivityRating: z.number().int().min(1).max(5).nullable().default(null),
});

/** Activity reported alongside a plan adaptation; scoped to the plan. */
export const adaptPlanSchema = z.object({
  recentActivity: z.array(z.discriminatedUnion('kind', [quizActivity, sessionActivity])).default([]),
});

const scope = { learnerId: id, courseId: id };

export const activitySchema = z.discriminatedUnion('kind', [
  quizActivity.extend(scope),
  sessionActivity.extend(scope),
]);

export const progressSchema = z.object({
  ...scope,
  identifier: id,
  masteryLevel: z.number(),
  completionPercentage: z.number(),
});

// ============================================================================
// Flashcard Schemas
// ============================================================================

/** Out-of-range qualities are clamped to 0-5 when the review is applied. */
export const reviewSchema = z.object({
  quality: z.number(),
  responseTimeSeconds: z.number().min(0).default(0),
});

// ============================================================================
// Query Schemas
// ============================================================================

export const analysisQuerySchema = z.object({
  courseId: id.optional(),
  windowDays: z.coerce.number().int().positive().max(365).optional(),
});

export const predictionQuerySchema = z.object({
  targetMastery: z.coerce.number().int().min(1).max(5).optional(),
});

export const feasibilityQuerySchema = z.object({
  targetDate: isoDate,
  weeklyHours: z.coerce.number(),
});

export const reviewQueueQuerySchema = z.object({
  courseId: id.optional(),
  availableMinutes: z.coerce.number().int().positive().optional(),
});

export const reviewLoadQuerySchema = z
  .object({
    courseId: id.optional(),
    targetDaily: z.coerce.number().int().positive().optional(),
    maxDaily: z.coerce.number().int().positive().optional(),
  })
  .refine(
    (query) => query.targetDaily === undefined || query.maxDaily === undefined || query.targetDaily <= query.maxDaily,
    { message: 'targetDaily cannot exceed maxDaily', path: ['targetDaily'] }
  );
