/**
 * CLI Command Tests
 *
 * Runs `main()` in process against an in-memory database and checks exit
 * codes and the lines printed to the console.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { main } from '../../src/cli';
import { toOverrideRequest } from '../../src/cli/commands/plan';
import { bold, dim, formatField, green, red, yellow } from '../../src/cli/utils/terminal';
import { createTestContext, cleanupTestContext, createTestFlashcard, seedLearnerAndCourse, type TestContext } from '../setup';

describe('CLI', () => {
  let ctx: TestContext;
  let logSpy: MockInstance<typeof console.log>;

  /** Every line printed with console.log so far. */
  function output(): string[] {
    return logSpy.mock.calls.map((args) => args.map(String).join(' '));
  }

  beforeEach(async () => {
    ctx = createTestContext();
    await seedLearnerAndCourse(ctx.repository);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    cleanupTestContext(ctx);
  });

  describe('help', () => {
    it('should print help without arguments', async () => {
      expect(await main([], ctx.engine)).toBe(0);
      expect(output()).toContain(bold('Study Planner CLI'));
    });

    it('should fail on an unknown command', async () => {
      expect(await main(['frobnicate'], ctx.engine)).toBe(1);
      expect(output()[0]).toBe(red('Unknown command: frobnicate'));
    });
  });

  describe('analyze', () => {
    it('should require a learner id', async () => {
      expect(await main(['analyze'], ctx.engine)).toBe(1);
      expect(output()[0]).toBe(red('Error: Learner id is required.'));
    });

    it('should report an unknown learner', async () => {
      expect(await main(['analyze', 'ghost'], ctx.engine)).toBe(1);
      expect(output()).toEqual([red('Error: Unknown learner: ghost')]);
    });
  });

  describe('predict', () => {
    it('should reject an unparseable target date', async () => {
      expect(await main(['predict', 'learner-1', 'course-1', '--by', 'someday'], ctx.engine)).toBe(1);
      expect(output()[0]).toBe(red('Error: Invalid date: someday'));
    });

    it('should reject a non-numeric flag', async () => {
      expect(await main(['predict', 'learner-1', 'course-1', '--hours', 'abc'], ctx.engine)).toBe(1);
      expect(output()).toEqual([
        red('Error: --hours expects a number, got "abc"'),
        dim('Usage: npm run cli predict <learnerId> <courseId> [--by <date> --hours <n>]'),
      ]);
    });
  });

  describe('review', () => {
    it('should apply a review and print the new interval', async () => {
      await createTestFlashcard(ctx.repository);

      expect(await main(['review', 'card-1', '4'], ctx.engine)).toBe(0);

      const lines = output();
      expect(lines).toContain(`${bold('What is a basis?')} ${green('recalled (4)')}`);
      expect(lines).toContain(formatField('Interval', '1 -> 1 days'));
      expect(lines).toContain(formatField('Next review', '2024-03-05'));
      expect((await ctx.repository.findFlashcard('card-1'))?.version).toBe(2);
    });

    it('should report an unknown card', async () => {
      expect(await main(['review', 'card-9', '4'], ctx.engine)).toBe(1);
      expect(output()).toEqual([red('Error: Unknown flashcard: card-9')]);
    });
  });

  describe('plan', () => {
    it('should generate a plan', async () => {
      expect(await main(['plan', 'generate', 'learner-1', 'course-1', '--type', 'monthly'], ctx.engine)).toBe(0);

      expect(output()).toContain(green('Generated plan id-1'));
      expect((await ctx.repository.findPlan('id-1'))?.planType).toBe('monthly');
    });

    it('should exit with commander usage errors', async () => {
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

      expect(await main(['plan', 'generate', 'learner-1', 'course-1', '--type', 'yearly'], ctx.engine)).toBe(1);
      expect(stderr).toHaveBeenCalled();
      expect(await ctx.repository.findPlan('id-1')).toBeNull();
    });

    it('should mark a session completed', async () => {
      await main(['plan', 'generate', 'learner-1', 'course-1'], ctx.engine);
      logSpy.mockClear();

      expect(await main(['plan', 'session', 'id-1', 'w1_s1', 'completed'], ctx.engine)).toBe(0);
      expect(output()).toEqual([green('Session w1_s1 marked completed.')]);
    });

    it('should need exactly one kind of override', async () => {
      await main(['plan', 'generate', 'learner-1', 'course-1'], ctx.engine);
      logSpy.mockClear();

      expect(await main(['plan', 'override', 'id-1'], ctx.engine)).toBe(1);
      expect(output()).toEqual([red('Error: Give exactly one of --session, --difficulty or --review-every')]);
    });

    it('should report a rejected override', async () => {
      await main(['plan', 'generate', 'learner-1', 'course-1'], ctx.engine);
      logSpy.mockClear();

      expect(await main(['plan', 'override', 'id-1', '--review-every', '20'], ctx.engine)).toBe(1);
      expect(output()).toContain(
        yellow('Override rejected: Review frequency must be an integer between 1 and 10')
      );
    });
  });
});

describe('toOverrideRequest', () => {
  it('should build a schedule override', () => {
    expect(toOverrideRequest({ session: 'w1_s2', date: '2024-03-09', reason: 'Trip' })).toEqual({
      type: 'schedule',
      data: { sessionId: 'w1_s2', date: '2024-03-09', startTime: undefined },
      reason: 'Trip',
    });
  });

  it('should build a difficulty override', () => {
    expect(toOverrideRequest({ difficulty: -1, reason: 'Too hard' })).toEqual({
      type: 'difficulty',
      data: { delta: -1 },
      reason: 'Too hard',
    });
  });
});
