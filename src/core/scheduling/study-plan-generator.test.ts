/**
 * StudyPlanGenerator Unit Tests
 *
 * Parameter derivation per performance tier, preference fallbacks and bounds,
 * schedule construction across weeks, topic partitioning and the plan's
 * derived fields. All plans start on Monday 2024-03-04.
 */

import { describe, it, expect } from 'vitest';
import { partitionTopics } from './study-plan-generator';
import { TEST_COURSE, buildSnapshot, generatePlan, progressRow } from '../../../tests/helpers';

const struggling = buildSnapshot({ quiz: 40, consistency: 50, mastery: 1.5, retention: 50, completion: 40, engagement: 10 });
const advanced = buildSnapshot({ quiz: 95, mastery: 5, retention: 95, completion: 100, engagement: 80 });
const newLearner = buildSnapshot();

describe('StudyPlanGenerator', () => {
  describe('parameters', () => {
    it('gives struggling learners more, shorter sessions', () => {
      expect(generatePlan(struggling).parameters).toEqual({
        dailyHours: 2.6,
        studyDaysPerWeek: 5,
        sessionLengthMinutes: 36,
        sessionsPerDay: 3,
        totalWeeks: 1,
        includeWeekends: false,
        performanceScore: 36.5,
        learningProfile: 'needs_motivation',
        difficultyAdaptation: 'easier',
        reviewFrequencyDays: 1,
        breakFrequencyMinutes: 25,
      });
    });

    it('gives high performers fewer, longer sessions', () => {
      expect(generatePlan(advanced).parameters).toEqual({
        dailyHours: 1.8,
        studyDaysPerWeek: 5,
        sessionLengthMinutes: 54,
        sessionsPerDay: 1,
        totalWeeks: 1,
        includeWeekends: false,
        performanceScore: 95.5,
        learningProfile: 'high_performer',
        difficultyAdaptation: 'harder',
        reviewFrequencyDays: 3,
        breakFrequencyMinutes: 25,
      });
    });

    it('uses baseline parameters for a learner without history', () => {
      expect(generatePlan(newLearner).parameters).toEqual({
        dailyHours: 2,
        studyDaysPerWeek: 5,
        sessionLengthMinutes: 45,
        sessionsPerDay: 2,
        totalWeeks: 1,
        includeWeekends: false,
        performanceScore: 0,
        learningProfile: 'developing',
        difficultyAdaptation: 'maintain',
        reviewFrequencyDays: 2,
        breakFrequencyMinutes: 25,
      });
    });

    it('falls back to defaults for non-positive preferences', () => {
      const { parameters } = generatePlan(newLearner, {
        preferences: {
          dailyHours: -3,
          studyDaysPerWeek: 0,
          sessionLengthMinutes: 0,
          intensityMultiplier: 1.5,
          preferShortSessions: true,
          includeWeekends: true,
        },
      });

      expect(parameters).toMatchObject({
        dailyHours: 3,
        studyDaysPerWeek: 5,
        sessionLengthMinutes: 36,
        sessionsPerDay: 3,
        includeWeekends: true,
      });
    });

    it('clamps daily hours and session length', () => {
      expect(
        generatePlan(newLearner, { preferences: { dailyHours: 10, sessionLengthMinutes: 200 } }).parameters
      ).toMatchObject({ dailyHours: 6, sessionLengthMinutes: 120, breakFrequencyMinutes: 15 });

      expect(
        generatePlan(newLearner, { preferences: { dailyHours: 0.1, sessionLengthMinutes: 5 } }).parameters
      ).toMatchObject({ dailyHours: 0.5, sessionLengthMinutes: 15, breakFrequencyMinutes: 0 });
    });
  });

  describe('schedule', () => {
    it('builds a week of weekday sessions', () => {
      const plan = generatePlan(newLearner);

      expect(plan.schedule.map((s) => `${s.date} ${s.startTime} ${s.content.focusTopic}`)).toEqual([
        '2024-03-04 09:00 vectors',
        '2024-03-04 14:00 matrices',
        '2024-03-05 09:00 vectors',
        '2024-03-05 14:00 matrices',
        '2024-03-06 09:00 vectors',
        '2024-03-06 14:00 matrices',
        '2024-03-07 09:00 vectors',
        '2024-03-07 14:00 matrices',
        '2024-03-08 09:00 vectors',
        '2024-03-08 14:00 matrices',
      ]);

      expect(plan.schedule[0]).toEqual({
        id: 'w1_s1',
        week: 1,
        date: '2024-03-04',
        startTime: '09:00',
        durationMinutes: 45,
        content: {
          focusTopic: 'vectors',
          tasks: [
            {
              id: 'read_w1_s1',
              type: 'reading',
              title: 'Read: vectors',
              durationMinutes: 30,
              difficulty: 'medium',
              isOptional: false,
            },
            {
              id: 'practice_w1_s1',
              type: 'practice',
              title: 'Practice exercises for vectors',
              durationMinutes: 15,
              difficulty: 'medium',
              isOptional: true,
            },
          ],
          learningObjectives: ['Master vectors'],
        },
        cognitiveLoad: 24.2,
        productivityPrediction: 0.6,
        sessionType: 'study',
        status: 'scheduled',
        isMandatory: true,
        canReschedule: true,
        needsRebalancing: false,
        revision: 1,
      });
    });

    it('fills in the plan fields', () => {
      const plan = generatePlan(newLearner);

      expect(plan).toMatchObject({
        id: 'plan-1',
        learnerId: 'learner-1',
        courseId: 'course-1',
        title: 'Weekly Plan: Linear Algebra',
        planType: 'weekly',
        status: 'active',
        startDate: '2024-03-04',
        endDate: '2024-03-08',
        targetDate: null,
        overrides: [],
        adaptationHistory: [],
        revision: 1,
        version: 1,
      });
      expect(plan.baseSchedule).toEqual(plan.schedule);
      expect(plan.baseline).toEqual(plan.lastMark);
      expect(plan.recommendations.map((r) => r.type)).toEqual(['peak_time']);
      expect(plan.recommendations[0].actionItems).toEqual(['Schedule your most challenging topics around 09:00']);
    });

    it('summarizes the daily load', () => {
      const { loadSummary } = generatePlan(newLearner);

      expect(loadSummary.dailyLoads).toHaveLength(5);
      expect(loadSummary.averageDailyLoad).toBe(48.4);
      expect(loadSummary.maxDailyLoad).toBe(48.4);
      expect(loadSummary.minDailyLoad).toBe(48.4);
      expect(loadSummary.overloadedDays).toEqual([]);
    });

    it('schedules weekends when asked to', () => {
      const plan = generatePlan(newLearner, { preferences: { includeWeekends: true, studyDaysPerWeek: 7 } });

      expect(plan.schedule).toHaveLength(14);
      expect(plan.endDate).toBe('2024-03-10');
    });

    it('spans the weeks up to a target date and turns empty weeks into review', () => {
      const plan = generatePlan(newLearner, {
        course: { ...TEST_COURSE, topics: ['t1', 't2'] },
        targetDate: new Date('2024-03-25T00:00:00.000Z'),
      });

      expect(plan.parameters.totalWeeks).toBe(3);
      expect(plan.targetDate).toBe('2024-03-25');
      expect(plan.schedule).toHaveLength(30);
      expect(plan.endDate).toBe('2024-03-22');

      const week = (n: number) => plan.schedule.filter((s) => s.week === n);
      expect(new Set(week(1).map((s) => s.content.focusTopic))).toEqual(new Set(['t1']));
      expect(new Set(week(2).map((s) => s.content.focusTopic))).toEqual(new Set(['t2']));
      expect(week(3).every((s) => s.sessionType === 'review' && s.content.tasks[0].type === 'review')).toBe(true);
    });

    it('ignores a target date in the past', () => {
      const plan = generatePlan(newLearner, { planType: 'monthly', targetDate: new Date('2024-03-01T00:00:00.000Z') });

      expect(plan.targetDate).toBeNull();
      expect(plan.parameters.totalWeeks).toBe(4);
      expect(plan.endDate).toBe('2024-03-29');
    });

    it('sets task difficulty from topic mastery', () => {
      const plan = generatePlan(newLearner, {
        course: { ...TEST_COURSE, topics: ['vectors', 'matrices', 'determinants'] },
        progress: [progressRow('vectors', 5), progressRow('matrices', 1)],
      });

      expect(plan.schedule.slice(0, 3).map((s) => [s.content.focusTopic, s.content.tasks[0].difficulty])).toEqual([
        ['vectors', 'easy'],
        ['matrices', 'hard'],
        ['determinants', 'medium'],
      ]);
    });

    it('is deterministic for the same inputs', () => {
      expect(generatePlan(struggling)).toEqual(generatePlan(struggling));
    });
  });

  describe('recommendations', () => {
    it('suggests shorter sessions to struggling learners', () => {
      expect(generatePlan(struggling).recommendations.map((r) => r.type)).toEqual(['session_structure', 'peak_time']);
    });

    it('suggests advanced practice to high performers', () => {
      expect(generatePlan(advanced).recommendations.map((r) => r.type)).toEqual(['advanced_practice', 'peak_time']);
    });
  });
});

describe('partitionTopics', () => {
  it('splits topics into contiguous, near-equal groups', () => {
    expect(partitionTopics(['a', 'b', 'c', 'd', 'e'], 3)).toEqual([['a', 'b'], ['c', 'd'], ['e']]);
  });

  it('leaves trailing weeks empty when there are fewer topics than weeks', () => {
    expect(partitionTopics(['a'], 3)).toEqual([['a'], [], []]);
  });
});
