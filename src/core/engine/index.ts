/**
 * Engine Module - Barrel Export
 *
 * The StudyEngine facade used by the API and CLI layers.
 */

export { StudyEngine, MAX_WRITE_ATTEMPTS } from './study-engine';
export { SnapshotReader, withTimeout, type SeriesRequest } from './snapshot-reader';
export type {
  StudyEngineConfig,
  StudyEngineDependencies,
  SnapshotSource,
  SeriesRead,
  RecordableActivity,
  GeneratePlanInput,
  PlanAdaptationResult,
  OverrideResult,
  PerformanceReport,
  PredictionReport,
  ReviewOutcome,
  RecordedActivity,
} from './types';
