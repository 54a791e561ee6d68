/**
 * Database Seed Runner
 *
 * Loads the demo data set from `seed-data.json`: learners, courses, topic
 * progress, quiz attempts, study session logs and flashcards. Activity times
 * are given relative to now, so the demo learner always has recent history.
 *
 * Usage:
 *   npm run db:seed
 *
 * Learners and courses that already exist are skipped, and a learner's
 * activity is only loaded together with the learner, so running the seeder
 * twice adds nothing.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { config } from '../config';
import { createDatabase } from './db';
import { SqliteStudyRepository } from './repositories';
import { SM2Scheduler } from '@/core/sm2';
import { addDays, startOfUtcDay } from '@/core/utils/dates';

const SEED_PATH = fileURLToPath(new URL('./seed-data.json', import.meta.url));

const difficulty = z.enum(['easy', 'medium', 'hard']);

const seedSchema = z.object({
  learners: z.array(z.object({ id: z.string(), name: z.string() })),
  courses: z.array(z.object({ id: z.string(), title: z.string(), topics: z.array(z.string()).min(1) })),
  progress: z.array(
    z.object({
      learnerId: z.string(),
      courseId: z.string(),
      identifier: z.string(),
      masteryLevel: z.number().int().min(1).max(5),
      completionPercentage: z.number().min(0).max(100),
    })
  ),
  quizzes: z.array(
    z.object({
      learnerId: z.string(),
      courseId: z.string(),
      score: z.number().min(0).max(100),
      daysAgo: z.number().int().min(0),
      hour: z.number().int().min(0).max(23),
      difficulty,
    })
  ),
  sessions: z.array(
    z.object({
      learnerId: z.string(),
      courseId: z.string(),
      daysAgo: z.number().int().min(0),
      hour: z.number().int().min(0).max(23),
      plannedMinutes: z.number().int().positive(),
      actualMinutes: z.number().int().positive().nullable(),
      status: z.enum(['scheduled', 'in_progress', 'completed', 'skipped', 'cancelled']),
      productivityRating: z.number().int().min(1).max(5).nullable(),
    })
  ),
  flashcards: z.array(
    z.object({
      learnerId: z.string(),
      courseId: z.string(),
      front: z.string(),
      back: z.string(),
      difficulty,
      dueInDays: z.number().int(),
    })
  ),
});

export type SeedData = z.infer<typeof seedSchema>;

export function loadSeedData(path: string = SEED_PATH): SeedData {
  return seedSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

function at(daysAgo: number, hour: number, now: Date): Date {
  const day = addDays(startOfUtcDay(now), -daysAgo);
  return new Date(day.getTime() + hour * 3_600_000);
}

/**
 * Writes the seed data through the repositories.
 *
 * @returns Ids of the learners that were created by this run
 */
export async function seedDatabase(
  repository: SqliteStudyRepository,
  data: SeedData,
  now: Date = new Date()
): Promise<string[]> {
  const scheduler = new SM2Scheduler();

  for (const course of data.courses) {
    if (await repository.courses.findById(course.id)) {
      console.log(`[seed] Skipping course "${course.title}" - already exists`);
      continue;
    }
    await repository.courses.create({ ...course, createdAt: addDays(now, -60) });
    console.log(`[seed] + Course "${course.title}" (${course.topics.length} topics)`);
  }

  const created: string[] = [];
  for (const learner of data.learners) {
    if (await repository.learners.findById(learner.id)) {
      console.log(`[seed] Skipping learner ${learner.id} - already exists`);
      continue;
    }
    await repository.learners.create({ ...learner, createdAt: addDays(now, -90) });
    created.push(learner.id);
    console.log(`[seed] + Learner ${learner.id}`);
  }

  const isNew = (row: { learnerId: string }) => created.includes(row.learnerId);

  for (const row of data.progress.filter(isNew)) {
    await repository.upsertProgress({ ...row, updatedAt: addDays(now, -1) });
  }

  for (const quiz of data.quizzes.filter(isNew)) {
    await repository.recordActivity({
      kind: 'quiz',
      learnerId: quiz.learnerId,
      courseId: quiz.courseId,
      score: quiz.score,
      startedAt: at(quiz.daysAgo, quiz.hour, now),
      difficulty: quiz.difficulty,
    });
  }

  for (const session of data.sessions.filter(isNew)) {
    const scheduledStart = at(session.daysAgo, session.hour, now);
    const actualEnd =
      session.actualMinutes === null ? null : new Date(scheduledStart.getTime() + session.actualMinutes * 60_000);
    await repository.recordActivity({
      kind: 'session',
      learnerId: session.learnerId,
      courseId: session.courseId,
      scheduledStart,
      scheduledEnd: new Date(scheduledStart.getTime() + session.plannedMinutes * 60_000),
      actualStart: actualEnd === null ? null : scheduledStart,
      actualEnd,
      status: session.status,
      productivityRating: session.productivityRating,
    });
  }

  for (const card of data.flashcards.filter(isNew)) {
    await repository.flashcards.create({
      id: `fc_${randomUUID()}`,
      learnerId: card.learnerId,
      courseId: card.courseId,
      front: card.front,
      back: card.back,
      difficulty: card.difficulty,
      reviewState: scheduler.createInitialState(addDays(now, card.dueInDays)),
    });
  }

  return created;
}

async function main(): Promise<void> {
  console.log(`[seed] Seeding ${config.database.path}...`);
  const repository = new SqliteStudyRepository(createDatabase(config.database.path));
  const created = await seedDatabase(repository, loadSeedData());
  console.log(`[seed] Done. ${created.length} learner(s) created.`);
}

// Only run when executed directly, not when imported by tests
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error: unknown) => {
    console.error('[seed] Seeding failed:', error);
    process.exit(1);
  });
}
