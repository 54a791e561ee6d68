/**
 * Immediate feedback on newly recorded activity.
 *
 * When a learner reports fresh activity alongside a plan adaptation, each
 * record is judged against the learner's current snapshot so the caller can
 * show a short verdict next to the adaptation result.
 */

import type { ActivityRecord, QuizAttempt, ReviewEvent, SessionRecord } from '../models';
import type { PerformanceSnapshot } from '../metrics/types';
import type { ActivityFeedback, SessionDurationVerdict } from './types';

/**
 * Classifies a session length in minutes.
 *
 * - under 15: too_short
 * - 25 to 90: optimal
 * - over 120: too_long
 * - anything else: acceptable
 */
export function evaluateSessionDuration(minutes: number): SessionDurationVerdict {
  if (minutes < 15) return 'too_short';
  if (minutes > 120) return 'too_long';
  if (minutes >= 25 && minutes <= 90) return 'optimal';
  return 'acceptable';
}

export function evaluateActivity(record: ActivityRecord, snapshot: PerformanceSnapshot): ActivityFeedback {
  switch (record.kind) {
    case 'quiz':
      return quizFeedback(record, snapshot);
    case 'session':
      return sessionFeedback(record);
    case 'review':
      return reviewFeedback(record);
  }
}

function quizFeedback(quiz: QuizAttempt, snapshot: PerformanceSnapshot): ActivityFeedback {
  const recentAverage = snapshot.avgQuizScore;
  const base = { kind: 'quiz' as const, recordId: quiz.id, score: quiz.score, recentAverage };

  if (snapshot.quiz.attemptCount === 0) {
    return { ...base, signal: 'neutral', message: 'First quiz in this period.' };
  }

  const difference = quiz.score - recentAverage;
  if (difference >= 10) {
    return { ...base, signal: 'positive', message: `Scored ${difference.toFixed(0)} points above your recent average.` };
  }
  if (difference <= -10) {
    return { ...base, signal: 'negative', message: `Scored ${Math.abs(difference).toFixed(0)} points below your recent average.` };
  }
  return { ...base, signal: 'neutral', message: 'In line with your recent average.' };
}

function sessionFeedback(session: SessionRecord): ActivityFeedback {
  const start = session.actualStart ?? session.scheduledStart;
  const end = session.actualStart && session.actualEnd ? session.actualEnd : session.scheduledEnd;
  const durationMinutes = Math.max(0, Math.round((end.getTime() - start.getTime()) / 60000));
  const verdict = evaluateSessionDuration(durationMinutes);

  const messages: Record<SessionDurationVerdict, string> = {
    too_short: 'Very short session. Aim for at least 25 minutes.',
    optimal: 'Good session length.',
    acceptable: 'Reasonable session length.',
    too_long: 'Long session. Split it up with breaks next time.',
  };

  let signal: ActivityFeedback['signal'] = 'neutral';
  if (verdict === 'optimal') signal = 'positive';
  else if (verdict === 'too_short' || verdict === 'too_long') signal = 'negative';

  return { kind: 'session', recordId: session.id, signal, message: messages[verdict], durationMinutes, verdict };
}

function reviewFeedback(review: ReviewEvent): ActivityFeedback {
  const base = { kind: 'review' as const, recordId: review.id, quality: review.quality };
  if (review.quality >= 4) return { ...base, signal: 'positive', message: 'Strong recall.' };
  if (review.quality === 3) return { ...base, signal: 'neutral', message: 'Recalled with effort.' };
  return { ...base, signal: 'negative', message: 'Missed. This card comes back tomorrow.' };
}
