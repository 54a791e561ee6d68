/**
 * Study Planner - Library Entry Point
 *
 * Adaptive study scheduling and performance analytics over an SQLite store.
 * Embedders build a runtime and talk to the StudyEngine directly, or serve
 * it over HTTP with `createApp`.
 *
 * @example
 * ```typescript
 * import { createRuntime } from 'study-planner';
 *
 * const runtime = createRuntime();
 * const plan = await runtime.engine.generatePlan({
 *   learnerId: 'learner-demo',
 *   courseId: 'course-algebra',
 *   planType: 'weekly',
 * });
 * runtime.close();
 * ```
 *
 * The server and CLI have their own entry points: src/api/server.ts and
 * src/cli/index.ts.
 */

export { createRuntime, type Runtime, type RuntimeOptions } from './runtime';
export { config, parseConfig, validateConfig, ConfigValidationError, type Config } from './config';
export { createApp, type AppOptions } from './api';

export * from './core/engine';
export type { Result, ServiceError, ResourceKind } from './core/result';
export type * from './core/models';
