/**
 * Plan adaptation tests.
 *
 * The base plan is generated for a learner scoring 70.5 (quiz 75, mastery 3,
 * retention 80, completion 80, engagement 50) with 'matrices' at mastery 1,
 * so every second session carries hard tasks. Each test then adapts it with
 * a snapshot that changes one signal.
 */

import { describe, it, expect } from 'vitest';
import { PerformanceAnalyzer } from '../analysis';
import type { PerformanceSnapshot } from '../metrics';
import type { StudyPlan } from '../models';
import { StudyPlanGenerator } from './study-plan-generator';
import { NOW, buildSnapshot, daysFromNow, generatePlan, progressRow, type SnapshotValues } from '../../../tests/helpers';

const baselineValues: SnapshotValues = {
  quiz: 75,
  mastery: 3,
  retention: 80,
  completion: 80,
  engagement: 50,
  velocity: 1,
};

const snapshotWith = (values: SnapshotValues): PerformanceSnapshot => buildSnapshot({ ...baselineValues, ...values });

const generator = new StudyPlanGenerator();
const analyzer = new PerformanceAnalyzer();

function adapt(plan: StudyPlan, snapshot: PerformanceSnapshot, now: Date = NOW) {
  return generator.adapt(plan, snapshot, analyzer.analyze([snapshot]), now);
}

function basePlan(): StudyPlan {
  return generatePlan(snapshotWith({}), { progress: [progressRow('matrices', 1)] });
}

const session = (plan: StudyPlan, id: string) => plan.schedule.find((s) => s.id === id);

describe('plan adaptation', () => {
  it('changes nothing for the snapshot the plan was generated from', () => {
    const plan = basePlan();
    const outcome = adapt(plan, snapshotWith({}));

    expect(outcome.adaptations).toEqual([]);
    expect(outcome.entry).toBeNull();
    expect(outcome.plan).toBe(plan);
  });

  it('reduces difficulty after a score drop', () => {
    const plan = basePlan();
    const outcome = adapt(plan, snapshotWith({ quiz: 20 }));

    expect(outcome.adaptations).toEqual([
      { type: 'reduce_difficulty', reason: 'Overall score dropped 16.5 points', severity: 'high', sessionsAffected: 10 },
    ]);

    const first = session(outcome.plan, 'w1_s1');
    expect(first?.durationMinutes).toBe(34);
    expect(first?.content.tasks.map((t) => t.durationMinutes)).toEqual([23, 11]);
    expect(first?.revision).toBe(2);

    const hard = session(outcome.plan, 'w1_s2');
    expect(hard?.content.tasks.map((t) => [t.difficulty, t.isOptional])).toEqual([
      ['medium', true],
      ['medium', true],
    ]);
  });

  it('records the pass in the adaptation history', () => {
    const outcome = adapt(basePlan(), snapshotWith({ quiz: 20 }));

    expect(outcome.plan.revision).toBe(2);
    expect(outcome.plan.adaptationHistory).toHaveLength(1);
    expect(outcome.entry).toEqual({
      appliedAt: NOW.toISOString(),
      revision: 2,
      adaptations: outcome.adaptations,
      trigger: {
        previousScore: 70.5,
        currentScore: 54,
        scoreChange: -16.5,
        completionRate: 80,
        learningVelocity: 1,
      },
    });
    expect(outcome.plan.lastMark.overallScore).toBe(54);
    expect(outcome.plan.baseline.overallScore).toBe(70.5);
  });

  it('is idempotent for an unchanged snapshot', () => {
    const dropped = snapshotWith({ quiz: 20 });
    const first = adapt(basePlan(), dropped);
    const second = adapt(first.plan, dropped);

    expect(second.adaptations).toEqual([]);
    expect(second.entry).toBeNull();
    expect(second.plan).toBe(first.plan);
    expect(second.plan.adaptationHistory).toHaveLength(1);
  });

  it('adds challenge after a score rise', () => {
    const outcome = adapt(
      basePlan(),
      snapshotWith({ quiz: 100, mastery: 5, retention: 100, completion: 100, engagement: 100 })
    );

    expect(outcome.adaptations.map((a) => [a.type, a.reason])).toEqual([
      ['increase_challenge', 'Overall score rose 29.5 points'],
    ]);

    const first = session(outcome.plan, 'w1_s1');
    expect(first?.durationMinutes).toBe(56);
    expect(first?.content.tasks.map((t) => t.durationMinutes)).toEqual([38, 19, 15]);
    expect(first?.content.tasks[2]).toEqual({
      id: 'challenge_w1_s1',
      type: 'practice',
      title: 'Challenge problems: vectors',
      durationMinutes: 15,
      difficulty: 'hard',
      isOptional: true,
    });
  });

  it('shortens sessions when completion is low', () => {
    const outcome = adapt(basePlan(), snapshotWith({ completion: 50 }));

    expect(outcome.adaptations.map((a) => [a.type, a.reason])).toEqual([
      ['reduce_session_length', 'Session completion rate is 50%'],
    ]);

    const first = session(outcome.plan, 'w1_s1');
    expect(first?.durationMinutes).toBe(31);
    expect(first?.content.tasks.map((t) => t.durationMinutes)).toEqual([21, 11]);
  });

  it('injects a review after every third study session when velocity is low', () => {
    const outcome = adapt(basePlan(), snapshotWith({ velocity: 0.2 }));

    expect(outcome.adaptations).toEqual([
      {
        type: 'increase_review_frequency',
        reason: 'Learning velocity is 0.2 topics per week',
        severity: 'medium',
        sessionsAffected: 3,
      },
    ]);
    expect(outcome.plan.schedule.filter((s) => s.sessionType === 'review').map((s) => s.id)).toEqual([
      'review_w1_s3',
      'review_w1_s6',
      'review_w1_s9',
    ]);
    expect(session(outcome.plan, 'review_w1_s3')).toMatchObject({
      date: '2024-03-05',
      startTime: '09:45',
      durationMinutes: 20,
      isMandatory: false,
      revision: 2,
    });
  });

  it('does not inject the same reviews twice', () => {
    const first = adapt(basePlan(), snapshotWith({ velocity: 0.2 }));
    const second = adapt(first.plan, snapshotWith({ velocity: 0.3 }));

    expect(second.adaptations).toEqual([]);
    expect(second.plan.schedule).toHaveLength(13);
  });

  it('leaves past and finished sessions alone', () => {
    const later = adapt(basePlan(), snapshotWith({ quiz: 20 }), daysFromNow(2));
    expect(later.adaptations[0].sessionsAffected).toBe(6);
    expect(session(later.plan, 'w1_s1')?.durationMinutes).toBe(45);

    const plan = basePlan();
    const withDone = generator.markSession(plan, 'w1_s5', 'completed', NOW);
    expect(withDone).not.toBeNull();
    if (!withDone) return;

    const outcome = adapt(withDone, snapshotWith({ quiz: 20 }));
    expect(outcome.adaptations[0].sessionsAffected).toBe(9);
    expect(session(outcome.plan, 'w1_s5')?.durationMinutes).toBe(45);
  });

  it('skips adaptation types an override owns', () => {
    const overridden = generator.applyOverride(
      basePlan(),
      { type: 'difficulty', data: { delta: -1 }, reason: 'Exam week' },
      'override-1',
      NOW
    );
    expect(overridden.accepted).toBe(true);
    if (!overridden.accepted) return;

    const outcome = adapt(overridden.plan, snapshotWith({ quiz: 20 }));
    expect(outcome.adaptations).toEqual([]);
  });

  it('keeps overrides on top of adapted sessions', () => {
    const overridden = generator.applyOverride(
      basePlan(),
      { type: 'schedule', data: { sessionId: 'w1_s1', date: '2024-03-09', startTime: '07:00' }, reason: 'Busy Monday' },
      'override-1',
      NOW
    );
    if (!overridden.accepted) throw new Error(overridden.reason);

    const outcome = adapt(overridden.plan, snapshotWith({ quiz: 20 }));

    expect(session(outcome.plan, 'w1_s1')).toMatchObject({ date: '2024-03-09', startTime: '07:00', durationMinutes: 34 });
    expect(outcome.plan.baseSchedule.find((s) => s.id === 'w1_s1')?.date).toBe('2024-03-04');
  });
});
