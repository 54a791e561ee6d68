/**
 * Runtime Wiring
 *
 * Builds the database, repository and StudyEngine from a configuration.
 * The server and the CLI both start from here; tests pass `:memory:`.
 *
 * @example
 * ```typescript
 * const runtime = createRuntime();
 * const report = await runtime.engine.analyzePerformance('learner-demo', null);
 * runtime.close();
 * ```
 */

import { config as defaultConfig, type Config } from './config';
import { createDatabase, type AppDatabase } from './storage/db';
import { SqliteStudyRepository } from './storage/repositories';
import { StudyEngine, type StudyEngineDependencies } from './core/engine';
import { PerformanceAnalyzer } from './core/analysis';
import { StudyPlanGenerator } from './core/scheduling';
import { ProgressPredictor } from './core/prediction';

export interface Runtime {
  db: AppDatabase;
  repository: SqliteStudyRepository;
  engine: StudyEngine;
  /** Closes the underlying SQLite handle */
  close(): void;
}

export interface RuntimeOptions {
  /** Overrides `config.database.path` */
  databasePath?: string;
  clock?: StudyEngineDependencies['clock'];
  generateId?: StudyEngineDependencies['generateId'];
}

export function createRuntime(config: Config = defaultConfig, options: RuntimeOptions = {}): Runtime {
  const db = createDatabase(options.databasePath ?? config.database.path);
  const repository = new SqliteStudyRepository(db);

  const engine = new StudyEngine(
    {
      repository,
      analyzer: new PerformanceAnalyzer({ weights: config.analysis.weights }),
      generator: new StudyPlanGenerator(config.scheduling),
      predictor: new ProgressPredictor(config.prediction),
      clock: options.clock,
      generateId: options.generateId,
    },
    {
      windowDays: config.analysis.windowDays,
      trendPoints: config.analysis.trendPoints,
      snapshotTimeoutMs: config.analysis.snapshotTimeoutMs,
    }
  );

  return {
    db,
    repository,
    engine,
    close: () => db.$client.close(),
  };
}
