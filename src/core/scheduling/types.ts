/**
 * Scheduling Type Definitions
 *
 * Inputs and outputs of the time-slot optimizer, the plan generator and the
 * plan adapter. Domain types shared with storage (StudyPlan, StudySession)
 * live in ../models.
 */

import type { Adaptation, AdaptationEntry, Course, LearningProgress, PlanType, StudyPlan } from '../models';
import type { AnalysisResult } from '../analysis/types';
import type { PerformanceSnapshot, SessionMetrics } from '../metrics/types';
import type { Weekday } from '../utils/dates';

/**
 * The part of a learner's session history the optimizer reads.
 */
export type ProductivityProfile = Pick<SessionMetrics, 'hourlyProductivity' | 'optimalSessionMinutes'>;

export interface TimeSlot {
  day: Weekday;
  /** `HH:MM`, UTC */
  startTime: string;
  durationMinutes: number;
  /** Mean productivity rating of the hour, 1-5 */
  productivityScore: number;
}

export interface SlotOptions {
  /** Fixed session length; defaults to the learner's best length bucket */
  sessionLengthMinutes?: number;
  maxSessionsPerDay?: number;
}

export interface SchedulingConfig {
  /** Highest total cognitive load allowed on one day, 0-100 */
  dailyLoadCeiling: number;
  /** Study hours of medium-difficulty, neutral-type work that equal a load of 100 */
  loadNormalizationHours: number;
}

/**
 * Learner preferences for plan generation. Missing or non-positive numbers
 * fall back to defaults.
 */
export interface PlanPreferences {
  dailyHours?: number;
  studyDaysPerWeek?: number;
  sessionLengthMinutes?: number;
  intensityMultiplier?: number;
  preferShortSessions?: boolean;
  includeWeekends?: boolean;
}

export interface PlanRequest {
  /** Identifier for the new plan */
  id: string;
  learnerId: string;
  course: Course;
  planType: PlanType;
  targetDate: Date | null;
  preferences: PlanPreferences;
  /** Snapshot and analysis of the learner at generation time */
  snapshot: PerformanceSnapshot;
  analysis: AnalysisResult;
  /** Current topic mastery of the learner in this course */
  progress: LearningProgress[];
  now: Date;
}

export interface AdaptationOutcome {
  plan: StudyPlan;
  adaptations: Adaptation[];
  /** The history entry appended by this pass, null when nothing changed */
  entry: AdaptationEntry | null;
}
