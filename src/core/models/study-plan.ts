/**
 * StudyPlan Domain Types
 *
 * A StudyPlan is an ordered collection of dated StudySessions plus the
 * parameters they were generated from. Plans evolve in two ways:
 *
 * 1. Automatic adaptation: fresh performance data produces a new revision of
 *    the base schedule. The superseded revision is archived, and an entry is
 *    appended to `adaptationHistory`.
 * 2. Manual overrides: timestamped, reason-carrying records layered on top of
 *    the base schedule. The effective `schedule` is always the base schedule
 *    with every override applied in order, so overrides win over adaptation.
 *
 * Schedule dates are ISO calendar dates (`YYYY-MM-DD`, UTC) and start times
 * are `HH:MM` strings, since sessions are stored as JSON.
 */

import type { Difficulty } from './records';
import type { Recommendation } from './recommendation';

export type PlanType = 'weekly' | 'monthly' | 'exam_prep' | 'custom';

/**
 * Plan lifecycle. A learner has at most one `active` plan per course;
 * generating a new one pauses the previous. `completed` and `cancelled` are
 * terminal.
 */
export type PlanStatus = 'active' | 'paused' | 'completed' | 'cancelled';

export type TaskType = 'reading' | 'practice' | 'quiz' | 'project' | 'review';

export interface StudyTask {
  id: string;
  type: TaskType;
  title: string;
  durationMinutes: number;
  difficulty: Difficulty;
  isOptional: boolean;
}

export interface SessionContent {
  focusTopic: string;
  tasks: StudyTask[];
  learningObjectives: string[];
}

export type StudySessionStatus = 'scheduled' | 'completed' | 'skipped';

export type StudySessionType = 'study' | 'review';

export interface StudySession {
  /** `w{week}_s{n}` for generated sessions, `review_{id}` for injected reviews */
  id: string;
  /** 1-based plan week */
  week: number;
  date: string;
  startTime: string;
  durationMinutes: number;
  content: SessionContent;
  /** 0-100, always derived from `content.tasks` */
  cognitiveLoad: number;
  /** Expected productivity for the slot, 0-1 */
  productivityPrediction: number;
  sessionType: StudySessionType;
  status: StudySessionStatus;
  isMandatory: boolean;
  canReschedule: boolean;
  /** Set when the session's day exceeds the daily load ceiling */
  needsRebalancing: boolean;
  /** Plan revision that produced this version of the session */
  revision: number;
}

export type LearningProfile =
  | 'high_performer'
  | 'steady_learner'
  | 'needs_motivation'
  | 'needs_repetition'
  | 'developing';

export type DifficultyAdaptation = 'easier' | 'maintain' | 'harder';

export interface PlanParameters {
  dailyHours: number;
  studyDaysPerWeek: number;
  sessionLengthMinutes: number;
  sessionsPerDay: number;
  totalWeeks: number;
  includeWeekends: boolean;
  /** Overall performance score at generation time */
  performanceScore: number;
  learningProfile: LearningProfile;
  difficultyAdaptation: DifficultyAdaptation;
  reviewFrequencyDays: number;
  /** Minutes of study between breaks, 0 when sessions are short enough */
  breakFrequencyMinutes: number;
}

/**
 * The subset of a performance snapshot a plan remembers, so the next
 * adaptation pass can compare against it.
 */
export interface PerformanceMark {
  overallScore: number;
  completionRate: number;
  learningVelocity: number;
  retentionRate: number;
  hasSessionData: boolean;
  hasProgressData: boolean;
  /** Stable digest of the snapshot signals, timestamps excluded */
  fingerprint: string;
  takenAt: string;
}

export type AdaptationType =
  | 'reduce_difficulty'
  | 'increase_challenge'
  | 'reduce_session_length'
  | 'increase_review_frequency';

export interface Adaptation {
  type: AdaptationType;
  reason: string;
  severity: 'high' | 'medium' | 'low';
  sessionsAffected: number;
}

/** One append-only entry of a plan's adaptation history. */
export interface AdaptationEntry {
  appliedAt: string;
  revision: number;
  adaptations: Adaptation[];
  trigger: {
    previousScore: number;
    currentScore: number;
    scoreChange: number;
    completionRate: number;
    learningVelocity: number;
  };
}

export type OverrideType = 'schedule' | 'difficulty' | 'review_frequency';

export interface ScheduleOverrideData {
  sessionId: string;
  date?: string;
  startTime?: string;
}

export interface DifficultyOverrideData {
  /** -2 (much easier) to 2 (much harder) */
  delta: number;
}

export interface ReviewFrequencyOverrideData {
  /** Insert a review session after every N study sessions */
  everySessions: number;
}

interface OverrideBase {
  id: string;
  reason: string;
  createdAt: string;
}

export type PlanOverride =
  | (OverrideBase & { type: 'schedule'; data: ScheduleOverrideData })
  | (OverrideBase & { type: 'difficulty'; data: DifficultyOverrideData })
  | (OverrideBase & { type: 'review_frequency'; data: ReviewFrequencyOverrideData });

/** Override request before it is stamped with an id and timestamp. */
export type OverrideRequest =
  | { type: 'schedule'; data: ScheduleOverrideData; reason: string }
  | { type: 'difficulty'; data: DifficultyOverrideData; reason: string }
  | { type: 'review_frequency'; data: ReviewFrequencyOverrideData; reason: string };

export interface DailyLoad {
  date: string;
  load: number;
}

export interface LoadSummary {
  dailyLoads: DailyLoad[];
  averageDailyLoad: number;
  maxDailyLoad: number;
  minDailyLoad: number;
  /** Days still above the ceiling after rebalancing */
  overloadedDays: string[];
}

export interface StudyPlan {
  id: string;
  learnerId: string;
  courseId: string;
  title: string;
  planType: PlanType;
  status: PlanStatus;
  startDate: string;
  endDate: string;
  targetDate: string | null;
  parameters: PlanParameters;
  /** Generated or adapted sessions, before overrides */
  baseSchedule: StudySession[];
  /** Effective sessions: base schedule with overrides applied */
  schedule: StudySession[];
  overrides: PlanOverride[];
  adaptationHistory: AdaptationEntry[];
  /** Performance at generation time */
  baseline: PerformanceMark;
  /** Performance at the last generation or adaptation pass */
  lastMark: PerformanceMark;
  recommendations: Recommendation[];
  loadSummary: LoadSummary;
  /** Schedule revision, incremented by every adaptation */
  revision: number;
  /** Optimistic-concurrency token, incremented by every write */
  version: number;
  createdAt: Date;
  updatedAt: Date;
}
