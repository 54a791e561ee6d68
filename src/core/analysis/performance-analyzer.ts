/**
 * Performance Analyzer
 *
 * Turns an ordered series of PerformanceSnapshots (oldest first, typically
 * weekly) into an AnalysisResult:
 *
 * 1. Component scores from the newest snapshot, each clamped to 0-100:
 *    quiz average, learning progress (mastery / 5 * 100), flashcard
 *    retention, session completion and engagement.
 * 2. A weighted overall score (default weights 30/25/20/15/10), clamped to
 *    0-100 and rounded to one decimal, and its category.
 * 3. Trends across the series for quiz scores, study time, engagement,
 *    retention, completion and the overall score.
 * 4. Strengths, weaknesses, recommendations, trajectory and adaptation
 *    triggers from the rule tables in ./recommendations.
 *
 * A component with no data contributes 0 and its trend is
 * `insufficient_data`. `analyze([])` returns an overall score of 0 and the
 * category "Poor".
 */

import { emptySnapshot } from '../metrics/metrics-aggregator';
import { classifyTrend, clamp } from '../metrics/statistics';
import type { PerformanceSnapshot } from '../metrics/types';
import {
  adaptationTriggers,
  performanceRecommendations,
  strengthsAndWeaknesses,
  trajectoryOf,
} from './recommendations';
import type {
  AnalysisResult,
  ComponentName,
  ComponentScores,
  PerformanceCategory,
  PerformanceTrends,
  PerformanceWeights,
  TrendSeries,
} from './types';

export interface PerformanceAnalyzerConfig {
  weights: PerformanceWeights;
}

const DEFAULT_CONFIG: PerformanceAnalyzerConfig = {
  weights: {
    quiz: 0.3,
    progress: 0.25,
    flashcards: 0.2,
    sessions: 0.15,
    engagement: 0.1,
  },
};

/** Category thresholds, checked in descending order. */
const CATEGORY_THRESHOLDS: [number, PerformanceCategory][] = [
  [90, 'Excellent'],
  [80, 'Good'],
  [70, 'Average'],
  [50, 'Needs Improvement'],
];

/** Component scores of one snapshot, before weighting. */
export interface ScoredSnapshot {
  components: ComponentScores;
  availability: Record<ComponentName, boolean>;
  overallScore: number;
}

export class PerformanceAnalyzer {
  private config: PerformanceAnalyzerConfig;

  constructor(config?: Partial<PerformanceAnalyzerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Analyzes a snapshot series. The newest snapshot supplies the scores; the
   * whole series supplies the trends.
   */
  analyze(series: readonly PerformanceSnapshot[]): AnalysisResult {
    const latest =
      series.length > 0
        ? series[series.length - 1]
        : emptySnapshot({ learnerId: '', courseId: null, windowDays: 30, now: new Date(0) });
    const scored = series.map((snapshot) => this.score(snapshot));
    const { components, availability, overallScore } =
      scored.length > 0 ? scored[scored.length - 1] : this.score(latest);

    const trendSeries: TrendSeries = {
      quizScores: series.filter((s) => s.quiz.attemptCount > 0).map((s) => s.avgQuizScore),
      studyTime: series.filter((s) => s.sessions.totalSessions > 0).map((s) => s.sessions.totalStudyHours),
      engagement: series.filter((s) => s.sessions.totalSessions > 0).map((s) => s.engagement.engagementScore),
      retention: series.filter((s) => s.flashcards.totalReviews > 0).map((s) => s.retentionRate),
      completion: series.filter((s) => s.sessions.totalSessions > 0).map((s) => s.completionRate),
      overall: scored.map((s) => s.overallScore),
    };

    const trends: PerformanceTrends = {
      quizScores: classifyTrend(trendSeries.quizScores),
      studyTime: classifyTrend(trendSeries.studyTime),
      engagement: classifyTrend(trendSeries.engagement),
      retention: classifyTrend(trendSeries.retention),
      completion: classifyTrend(trendSeries.completion),
      overall: classifyTrend(trendSeries.overall),
    };

    const { strengths, weaknesses } = strengthsAndWeaknesses(components, availability, latest);

    return {
      overallScore,
      category: categorize(overallScore),
      components,
      availability,
      consistencyScore: latest.consistencyScore,
      trends,
      series: trendSeries,
      strengths,
      weaknesses,
      recommendations: performanceRecommendations(overallScore, components, availability, latest),
      trajectory: trajectoryOf(trends, series.length),
      adaptationTriggers: adaptationTriggers(components, availability, trends, latest),
      dataPoints: series.length,
    };
  }

  /**
   * Component and overall scores of a single snapshot.
   */
  score(snapshot: PerformanceSnapshot): ScoredSnapshot {
    const availability: Record<ComponentName, boolean> = {
      quiz: snapshot.quiz.attemptCount > 0,
      progress: snapshot.progress.topicsTracked > 0,
      flashcards: snapshot.flashcards.totalReviews > 0,
      sessions: snapshot.sessions.totalSessions > 0,
      engagement: snapshot.sessions.totalSessions > 0,
    };

    const raw: ComponentScores = {
      quiz: snapshot.avgQuizScore,
      progress: (snapshot.progress.averageMastery / 5) * 100,
      flashcards: snapshot.retentionRate,
      sessions: snapshot.completionRate,
      engagement: snapshot.engagement.engagementScore,
    };

    return this.combine(raw, availability);
  }

  /**
   * Weights component scores into the overall score. Components are clamped
   * to 0-100 first and unavailable ones count as 0, so the result always
   * lies within 0-100.
   */
  combine(raw: ComponentScores, availability: Record<ComponentName, boolean>): ScoredSnapshot {
    const normalized = (name: ComponentName): number =>
      availability[name] && Number.isFinite(raw[name]) ? clamp(raw[name], 0, 100) : 0;

    const components: ComponentScores = {
      quiz: normalized('quiz'),
      progress: normalized('progress'),
      flashcards: normalized('flashcards'),
      sessions: normalized('sessions'),
      engagement: normalized('engagement'),
    };

    const { weights } = this.config;
    const total =
      components.quiz * weights.quiz +
      components.progress * weights.progress +
      components.flashcards * weights.flashcards +
      components.sessions * weights.sessions +
      components.engagement * weights.engagement;

    return {
      components,
      availability,
      overallScore: Math.round(clamp(total, 0, 100) * 10) / 10,
    };
  }
}

export function categorize(score: number): PerformanceCategory {
  for (const [threshold, category] of CATEGORY_THRESHOLDS) {
    if (score >= threshold) return category;
  }
  return 'Poor';
}
