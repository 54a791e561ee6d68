import { createHash } from 'node:crypto';
import type { PerformanceMark } from '../models';
import type { AnalysisResult } from '../analysis/types';
import type { PerformanceSnapshot } from '../metrics/types';

/**
 * Digest of a snapshot's signals. Window timestamps and identifiers are left
 * out, so the same history summarised on a later call hashes the same.
 */
export function snapshotFingerprint(snapshot: PerformanceSnapshot): string {
  const signals = {
    windowDays: snapshot.windowDays,
    avgQuizScore: snapshot.avgQuizScore,
    completionRate: snapshot.completionRate,
    retentionRate: snapshot.retentionRate,
    learningVelocity: snapshot.learningVelocity,
    consistencyScore: snapshot.consistencyScore,
    quiz: snapshot.quiz,
    sessions: snapshot.sessions,
    flashcards: snapshot.flashcards,
    progress: snapshot.progress,
    engagement: snapshot.engagement,
  };
  return createHash('sha256').update(JSON.stringify(signals)).digest('hex').slice(0, 16);
}

export function performanceMark(snapshot: PerformanceSnapshot, analysis: AnalysisResult): PerformanceMark {
  return {
    overallScore: analysis.overallScore,
    completionRate: snapshot.completionRate,
    learningVelocity: snapshot.learningVelocity,
    retentionRate: snapshot.retentionRate,
    hasSessionData: snapshot.sessions.totalSessions > 0,
    hasProgressData: snapshot.progress.topicsTracked > 0,
    fingerprint: snapshotFingerprint(snapshot),
    takenAt: snapshot.windowEnd.toISOString(),
  };
}
