/**
 * Study Engine - Service Facade over the Analytics and Planning Core
 *
 * The StudyEngine is the single entry point the HTTP and CLI layers use. It
 * loads data through the StudyRepository, runs the pure components
 * (MetricsAggregator, PerformanceAnalyzer, StudyPlanGenerator,
 * ProgressPredictor, SM2Scheduler, ReviewQueue) and performs the only two
 * writes of the system:
 *
 * 1. **Review state**: advancing a flashcard's SM-2 state on a review.
 * 2. **Study plans**: generating, adapting, overriding and marking sessions.
 *
 * Both writes are conditional on the stored version. A write that loses a
 * race is retried once against freshly loaded data, then reported as a
 * `conflict` error.
 *
 * Snapshot reads run under a timeout; see {@link SnapshotReader}.
 *
 * Operations return `Result` values: unknown learners, courses, plans,
 * sessions and cards are `not_found`, requests that cannot apply are
 * `invalid_request`. Repository failures are thrown unchanged.
 *
 * @example
 * ```typescript
 * const engine = new StudyEngine({ repository }, config.analysis);
 *
 * const generated = await engine.generatePlan({
 *   learnerId: 'learner-1',
 *   courseId: 'course-1',
 *   planType: 'weekly',
 * });
 * if (generated.ok) {
 *   const adapted = await engine.adaptPlan(generated.value.id);
 * }
 * ```
 */

import { randomUUID } from 'node:crypto';
import { MetricsAggregator, consistencyScore, type PerformanceSnapshot } from '../metrics';
import { PerformanceAnalyzer, evaluateActivity } from '../analysis';
import { StudyPlanGenerator } from '../scheduling';
import { ProgressPredictor, type PlanSuccessEstimate, type ScheduleFeasibility } from '../prediction';
import { ReviewQueue, SM2Scheduler, type DailyReviewPlan, type ReviewLoadOptions, type ReviewQueueResult } from '../sm2';
import { clamp } from '../metrics/statistics';
import { startOfUtcDay } from '../utils/dates';
import { fail, notFound, ok, type Result, type ServiceError } from '../result';
import type { StudyRepository } from '../repository';
import type {
  ActivityRecord,
  Flashcard,
  LearningProgress,
  OverrideRequest,
  StudyPlan,
  StudySessionStatus,
} from '../models';
import { SnapshotReader } from './snapshot-reader';
import type {
  GeneratePlanInput,
  OverrideResult,
  PerformanceReport,
  PlanAdaptationResult,
  PredictionReport,
  RecordableActivity,
  RecordedActivity,
  ReviewOutcome,
  SeriesRead,
  StudyEngineConfig,
  StudyEngineDependencies,
} from './types';

const DEFAULT_CONFIG: StudyEngineConfig = {
  windowDays: 30,
  trendPoints: 4,
  snapshotTimeoutMs: 2000,
};

/** One attempt plus one retry against fresh data. */
export const MAX_WRITE_ATTEMPTS = 2;

const DEFAULT_REVIEW_MINUTES = 20;

/** A proposed change to a plan; `changed: false` means nothing to write. */
interface PlanChange<T> {
  plan: StudyPlan;
  changed: boolean;
  detail: T;
}

export class StudyEngine {
  private repository: StudyRepository;
  private analyzer: PerformanceAnalyzer;
  private generator: StudyPlanGenerator;
  private predictor: ProgressPredictor;
  private scheduler: SM2Scheduler;
  private reviewQueue: ReviewQueue;
  private snapshots: SnapshotReader;
  private clock: () => Date;
  private generateId: () => string;
  private config: StudyEngineConfig;

  constructor(dependencies: StudyEngineDependencies, config?: Partial<StudyEngineConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.repository = dependencies.repository;
    this.analyzer = dependencies.analyzer ?? new PerformanceAnalyzer();
    this.generator = dependencies.generator ?? new StudyPlanGenerator();
    this.predictor = dependencies.predictor ?? new ProgressPredictor();
    this.scheduler = dependencies.scheduler ?? new SM2Scheduler();
    this.reviewQueue = dependencies.reviewQueue ?? new ReviewQueue(this.scheduler);
    this.clock = dependencies.clock ?? (() => new Date());
    this.generateId = dependencies.generateId ?? randomUUID;
    this.snapshots = new SnapshotReader(
      dependencies.aggregator ?? new MetricsAggregator(this.repository),
      this.config.snapshotTimeoutMs
    );
  }

  // ==========================================================================
  // Plans
  // ==========================================================================

  /**
   * Generates and stores a new active plan. The learner's previous active
   * plan for the course, if any, is paused.
   */
  async generatePlan(input: GeneratePlanInput): Promise<Result<StudyPlan>> {
    const learner = await this.repository.findLearner(input.learnerId);
    if (!learner) return notFound('learner', input.learnerId);
    const course = await this.repository.findCourse(input.courseId);
    if (!course) return notFound('course', input.courseId);

    const now = this.clock();
    const { series } = await this.readSeries(learner.id, course.id, now);
    const progress = await this.repository.fetchLearningProgress(learner.id, course.id);

    const plan = this.generator.generate({
      id: this.generateId(),
      learnerId: learner.id,
      course,
      planType: input.planType,
      targetDate: input.targetDate ?? null,
      preferences: input.preferences ?? {},
      snapshot: latest(series),
      analysis: this.analyzer.analyze(series),
      progress,
      now,
    });

    const created = await this.repository.createPlan(plan);
    console.log(
      `[StudyEngine] Generated ${created.planType} plan ${created.id} for ${learner.id}: ` +
        `${created.schedule.length} sessions, ${created.startDate} to ${created.endDate}`
    );
    return ok(created);
  }

  async getPlan(planId: string): Promise<Result<StudyPlan>> {
    const plan = await this.repository.findPlan(planId);
    return plan ? ok(plan) : notFound('plan', planId);
  }

  /**
   * Records any recent activity, then re-adapts the plan to the learner's
   * fresh snapshot. Returns the plan unchanged when no adaptation applies.
   */
  async adaptPlan(
    planId: string,
    recentActivity: readonly RecordableActivity[] = []
  ): Promise<Result<PlanAdaptationResult>> {
    const initial = await this.repository.findPlan(planId);
    if (!initial) return notFound('plan', planId);
    if (initial.status !== 'active') return inactive(initial);

    const now = this.clock();
    const feedback =
      recentActivity.length > 0
        ? await this.recordAll(initial.learnerId, initial.courseId, recentActivity, now)
        : [];

    const { series, source } = await this.readSeries(initial.learnerId, initial.courseId, now);
    if (source === 'default') {
      // The plan's last mark stands in for the missing snapshot
      console.warn(`[StudyEngine] Skipped adapting plan ${initial.id}: no snapshot available`);
      return ok({ plan: initial, adaptations: [], feedback: feedback.map((entry) => entry.feedback), source });
    }
    const snapshot = latest(series);
    const analysis = this.analyzer.analyze(series);

    const result = await this.updatePlan(planId, (plan) => {
      if (plan.status !== 'active') return inactive(plan);
      const outcome = this.generator.adapt(plan, snapshot, analysis, now);
      return ok({ plan: outcome.plan, changed: outcome.entry !== null, detail: outcome.adaptations });
    });
    if (!result.ok) return result;

    const { plan, detail: adaptations } = result.value;
    if (adaptations.length > 0) {
      console.log(
        `[StudyEngine] Adapted plan ${plan.id} to revision ${plan.revision}: ` +
          adaptations.map((a) => `${a.type} (${a.sessionsAffected} sessions)`).join(', ')
      );
    }

    return ok({ plan, adaptations, feedback: feedback.map((entry) => entry.feedback), source });
  }

  /**
   * Applies a manual override. A request the plan cannot take (unknown
   * session, out-of-range value, inactive plan) is answered with
   * `accepted: false` and the reason.
   */
  async applyOverride(planId: string, request: OverrideRequest): Promise<Result<OverrideResult>> {
    const now = this.clock();
    const overrideId = this.generateId();

    const result = await this.updatePlan(planId, (plan) => {
      const outcome = this.generator.applyOverride(plan, request, overrideId, now);
      return outcome.accepted
        ? ok({ plan: outcome.plan, changed: true, detail: null })
        : ok({ plan, changed: false, detail: outcome.reason });
    });
    if (!result.ok) return result;

    const { plan, detail: reason } = result.value;
    if (reason === null) {
      console.log(`[StudyEngine] Applied ${request.type} override ${overrideId} to plan ${plan.id}: ${request.reason}`);
    } else {
      console.log(`[StudyEngine] Rejected ${request.type} override for plan ${plan.id}: ${reason}`);
    }
    return ok({ accepted: reason === null, reason, plan });
  }

  /** Marks one session of a plan completed or skipped. */
  async updateSessionStatus(
    planId: string,
    sessionId: string,
    status: Exclude<StudySessionStatus, 'scheduled'>
  ): Promise<Result<StudyPlan>> {
    const now = this.clock();
    const result = await this.updatePlan(planId, (plan) => {
      const updated = this.generator.markSession(plan, sessionId, status, now);
      return updated ? ok({ plan: updated, changed: true, detail: null }) : notFound('session', sessionId);
    });
    return result.ok ? ok(result.value.plan) : result;
  }

  // ==========================================================================
  // Analysis and prediction
  // ==========================================================================

  async analyzePerformance(
    learnerId: string,
    courseId: string | null,
    windowDays: number = this.config.windowDays
  ): Promise<Result<PerformanceReport>> {
    const missing = await this.checkScope(learnerId, courseId);
    if (missing) return fail(missing);

    const { series, source } = await this.readSeries(learnerId, courseId, this.clock(), windowDays);
    return ok({
      learnerId,
      courseId,
      windowDays: latest(series).windowDays,
      snapshot: latest(series),
      analysis: this.analyzer.analyze(series),
      source,
    });
  }

  async predictCompletion(
    learnerId: string,
    courseId: string,
    targetMastery?: number
  ): Promise<Result<PredictionReport>> {
    const learner = await this.repository.findLearner(learnerId);
    if (!learner) return notFound('learner', learnerId);
    const course = await this.repository.findCourse(courseId);
    if (!course) return notFound('course', courseId);

    const now = this.clock();
    const { series, source } = await this.readSeries(learnerId, courseId, now);
    const progress = await this.repository.fetchLearningProgress(learnerId, courseId);

    const prediction = this.predictor.predictCompletion({
      learnerId,
      course,
      progress,
      series,
      targetMastery,
      now,
    });
    return ok({ ...prediction, source });
  }

  async assessPlanSuccess(planId: string): Promise<Result<PlanSuccessEstimate>> {
    const plan = await this.repository.findPlan(planId);
    if (!plan) return notFound('plan', planId);

    const quizzes = await this.repository.fetchQuizAttempts(plan.learnerId, null, new Date(0));
    const planStatuses = await this.repository.listPlanStatuses(plan.learnerId);
    const quizScores = quizzes.map((quiz) => quiz.score);

    return ok(
      this.predictor.assessPlanSuccess({
        plan,
        quizScores,
        planStatuses,
        consistencyScore: consistencyScore(quizScores),
      })
    );
  }

  async assessScheduleFeasibility(
    learnerId: string,
    courseId: string,
    targetDate: Date,
    weeklyHours: number
  ): Promise<Result<ScheduleFeasibility>> {
    const learner = await this.repository.findLearner(learnerId);
    if (!learner) return notFound('learner', learnerId);
    const course = await this.repository.findCourse(courseId);
    if (!course) return notFound('course', courseId);

    const now = this.clock();
    if (startOfUtcDay(targetDate).getTime() <= startOfUtcDay(now).getTime()) {
      return fail({ kind: 'invalid_request', message: 'Target date must be after today' });
    }
    if (!(weeklyHours > 0)) {
      return fail({ kind: 'invalid_request', message: 'Weekly hours must be positive' });
    }

    const { series } = await this.readSeries(learnerId, courseId, now);
    const progress = await this.repository.fetchLearningProgress(learnerId, courseId);

    return ok(
      this.predictor.assessFeasibility({
        course,
        progress,
        profile: latest(series).sessions,
        targetDate,
        weeklyHours,
        now,
      })
    );
  }

  // ==========================================================================
  // Flashcards
  // ==========================================================================

  /**
   * Applies one review to a card. Out-of-range qualities are clamped to
   * [0, 5]. The new state and the review event are written together.
   */
  async reviewItem(cardId: string, quality: number, responseTimeSeconds = 0): Promise<Result<ReviewOutcome>> {
    const grade = clamp(Math.round(quality), 0, 5);

    for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
      const card = await this.repository.findFlashcard(cardId);
      if (!card) return notFound('flashcard', cardId);

      const now = this.clock();
      const reviewState = this.scheduler.advance(card.reviewState, grade, now);
      const saved = await this.repository.saveReviewState(cardId, reviewState, card.version, {
        kind: 'review',
        learnerId: card.learnerId,
        courseId: card.courseId,
        cardId,
        quality: grade,
        responseTimeSeconds: Math.max(0, responseTimeSeconds),
        createdAt: now,
      });

      if (saved) {
        const successful = this.scheduler.isSuccessful(grade);
        const updated: Flashcard = {
          ...card,
          reviewState,
          totalReviews: card.totalReviews + 1,
          successfulReviews: card.successfulReviews + (successful ? 1 : 0),
          lastReviewedAt: now,
          version: card.version + 1,
          updatedAt: now,
        };
        return ok({ card: updated, previousState: card.reviewState, quality: grade });
      }

      console.warn(`[StudyEngine] Version conflict reviewing card ${cardId} (attempt ${attempt}/${MAX_WRITE_ATTEMPTS})`);
    }

    return fail({ kind: 'conflict', resource: 'flashcard', id: cardId, attempts: MAX_WRITE_ATTEMPTS });
  }

  async getReviewQueue(
    learnerId: string,
    courseId: string | null,
    availableMinutes: number = DEFAULT_REVIEW_MINUTES
  ): Promise<Result<ReviewQueueResult<Flashcard>>> {
    const missing = await this.checkScope(learnerId, courseId);
    if (missing) return fail(missing);

    const cards = await this.repository.listFlashcards(learnerId, courseId);
    const lastReviewAt = await this.repository.findLastReviewAt(learnerId);
    return ok(this.reviewQueue.build(cards, availableMinutes, lastReviewAt, this.clock()));
  }

  /**
   * Review counts for the coming days, with overloaded days spread over the
   * days after them. Nothing is written; the plan is advisory.
   */
  async optimizeReviewLoad(
    learnerId: string,
    courseId: string | null,
    options: Partial<ReviewLoadOptions> = {}
  ): Promise<Result<DailyReviewPlan>> {
    const missing = await this.checkScope(learnerId, courseId);
    if (missing) return fail(missing);

    const cards = await this.repository.listFlashcards(learnerId, courseId);
    return ok(this.reviewQueue.optimizeDailyLoad(cards, this.clock(), options));
  }

  // ==========================================================================
  // Activity
  // ==========================================================================

  /**
   * Stores a quiz attempt or study session log and judges it against the
   * learner's snapshot from before the record.
   */
  async recordActivity(record: RecordableActivity): Promise<Result<RecordedActivity>> {
    const missing = await this.checkScope(record.learnerId, record.courseId);
    if (missing) return fail(missing);

    const [recorded] = await this.recordAll(record.learnerId, record.courseId, [record], this.clock());
    return ok(recorded);
  }

  async recordProgress(update: Omit<LearningProgress, 'id' | 'updatedAt'>): Promise<Result<LearningProgress>> {
    const missing = await this.checkScope(update.learnerId, update.courseId);
    if (missing) return fail(missing);

    const course = await this.repository.findCourse(update.courseId);
    if (course && !course.topics.includes(update.identifier)) {
      return fail({ kind: 'invalid_request', message: `Unknown topic for course ${course.id}: ${update.identifier}` });
    }

    const saved = await this.repository.upsertProgress({
      ...update,
      masteryLevel: clamp(Math.round(update.masteryLevel), 1, 5),
      completionPercentage: clamp(update.completionPercentage, 0, 100),
      updatedAt: this.clock(),
    });
    return ok(saved);
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private readSeries(
    learnerId: string,
    courseId: string | null,
    now: Date,
    windowDays: number = this.config.windowDays
  ): Promise<SeriesRead> {
    return this.snapshots.read({ learnerId, courseId, windowDays, points: this.config.trendPoints, now });
  }

  private async recordAll(
    learnerId: string,
    courseId: string,
    records: readonly RecordableActivity[],
    now: Date
  ): Promise<RecordedActivity[]> {
    const { series } = await this.readSeries(learnerId, courseId, now);
    const before = latest(series);

    const recorded: RecordedActivity[] = [];
    for (const record of records) {
      const stored = await this.repository.recordActivity({ ...record, learnerId, courseId });
      recorded.push({ recordId: stored.id, feedback: evaluateActivity(stored, before) });
    }
    console.log(`[StudyEngine] Recorded ${describe(recorded.length, records)} for ${learnerId}`);
    return recorded;
  }

  /**
   * Loads the plan, applies `mutate` and writes the result conditionally on
   * the loaded version, retrying once on a version conflict.
   */
  private async updatePlan<T>(
    planId: string,
    mutate: (plan: StudyPlan) => Result<PlanChange<T>>
  ): Promise<Result<PlanChange<T>>> {
    for (let attempt = 1; attempt <= MAX_WRITE_ATTEMPTS; attempt++) {
      const current = await this.repository.findPlan(planId);
      if (!current) return notFound('plan', planId);

      const change = mutate(current);
      if (!change.ok || !change.value.changed) return change;

      const next: StudyPlan = { ...change.value.plan, version: current.version + 1 };
      if (await this.repository.saveStudyPlan(next, current.version)) {
        return ok({ ...change.value, plan: next });
      }

      console.warn(`[StudyEngine] Version conflict on plan ${planId} (attempt ${attempt}/${MAX_WRITE_ATTEMPTS})`);
    }

    return fail({ kind: 'conflict', resource: 'plan', id: planId, attempts: MAX_WRITE_ATTEMPTS });
  }

  private async checkScope(learnerId: string, courseId: string | null): Promise<ServiceError | null> {
    if (!(await this.repository.findLearner(learnerId))) {
      return { kind: 'not_found', resource: 'learner', id: learnerId };
    }
    if (courseId !== null && !(await this.repository.findCourse(courseId))) {
      return { kind: 'not_found', resource: 'course', id: courseId };
    }
    return null;
  }
}

function latest(series: readonly PerformanceSnapshot[]): PerformanceSnapshot {
  return series[series.length - 1];
}

function inactive(plan: StudyPlan): Result<never> {
  return fail({ kind: 'invalid_request', message: `Plan ${plan.id} is ${plan.status}` });
}

function describe(count: number, records: readonly Pick<ActivityRecord, 'kind'>[]): string {
  const kinds = [...new Set(records.map((record) => record.kind))].join('/');
  return `${count} ${kinds} record${count === 1 ? '' : 's'}`;
}
