/**
 * Scheduling Module - Barrel Export
 *
 * Study plan generation, cognitive load balancing, time-slot placement,
 * performance-driven adaptation and manual overrides.
 *
 * @example
 * ```typescript
 * import { StudyPlanGenerator } from '@/core/scheduling';
 *
 * const generator = new StudyPlanGenerator(config.scheduling);
 * const plan = generator.generate(request);
 * const { plan: adapted, adaptations } = generator.adapt(plan, snapshot, analysis, new Date());
 * ```
 */

export {
  StudyPlanGenerator,
  PLAN_TYPE_WEEKS,
  DEFAULT_DAILY_HOURS,
  DEFAULT_STUDY_DAYS,
  partitionTopics,
  learningProfile,
  reviewFrequency,
  type OverrideOutcome,
} from './study-plan-generator';
export { TimeSlotOptimizer, rankHours, DEFAULT_HOUR_RANKING } from './time-slot-optimizer';
export {
  cognitiveLoad,
  dailyLoads,
  summarizeLoad,
  rebalanceLoad,
  DIFFICULTY_MULTIPLIERS,
  TASK_TYPE_MULTIPLIERS,
} from './cognitive-load';
export { adaptPlan, identifyAdaptations } from './plan-adapter';
export { effectiveSchedule, rejectionReason, withSessionStatus } from './overrides';
export { performanceMark, snapshotFingerprint } from './performance-mark';
export type {
  TimeSlot,
  SlotOptions,
  SchedulingConfig,
  PlanPreferences,
  PlanRequest,
  ProductivityProfile,
  AdaptationOutcome,
} from './types';
