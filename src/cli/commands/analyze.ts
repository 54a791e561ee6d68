/**
 * Analyze Command
 *
 * Prints a learner's performance analysis: overall score and category, the
 * five component scores, trajectory, strengths, weaknesses and
 * recommendations.
 *
 * Usage:
 *   npm run cli analyze <learnerId> [--course <courseId>] [--window <days>]
 */

import type { StudyEngine, PerformanceReport } from '../../core/engine';
import type { ComponentName } from '../../core/analysis';
import { printServiceError } from '../utils/errors';
import {
  bold,
  dim,
  formatField,
  formatPercent,
  formatRecommendation,
  formatScore,
  formatSeparator,
  green,
  printBlankLine,
  printHeading,
  red,
  yellow,
} from '../utils/terminal';

export interface AnalyzeOptions {
  courseId?: string;
  windowDays?: number;
}

const COMPONENT_LABELS: [ComponentName, string][] = [
  ['quiz', 'Quiz scores'],
  ['progress', 'Topic progress'],
  ['flashcards', 'Flashcard retention'],
  ['sessions', 'Session completion'],
  ['engagement', 'Engagement'],
];

export async function runAnalyzeCommand(
  engine: StudyEngine,
  learnerId: string,
  options: AnalyzeOptions = {}
): Promise<number> {
  const result = await engine.analyzePerformance(learnerId, options.courseId ?? null, options.windowDays);
  if (!result.ok) return printServiceError(result.error);

  printReport(result.value);
  return 0;
}

function printReport(report: PerformanceReport): void {
  const { analysis } = report;

  printHeading(`Performance Analysis: ${report.learnerId}`);
  console.log(formatField('Course', report.courseId ?? 'all courses'));
  console.log(formatField('Window', `${report.windowDays} days`));
  console.log(formatField('Overall score', `${formatScore(analysis.overallScore)} (${analysis.category})`));
  console.log(formatField('Consistency', formatScore(analysis.consistencyScore)));
  console.log(
    formatField(
      'Trajectory',
      `${analysis.trajectory.direction} (${analysis.trajectory.strength}), confidence ${formatPercent(analysis.trajectory.confidence)}`
    )
  );
  if (report.source !== 'fresh') {
    console.log(yellow(`  Data source: ${report.source} (the history read timed out)`));
  }

  printBlankLine();
  console.log(bold('Components'));
  for (const [name, label] of COMPONENT_LABELS) {
    const value = analysis.availability[name] ? formatScore(analysis.components[name]) : dim('no data');
    console.log(formatField(label, value));
  }

  if (analysis.strengths.length > 0) {
    printBlankLine();
    console.log(bold('Strengths'));
    analysis.strengths.forEach((strength) => console.log(`  ${green('+')} ${strength}`));
  }
  if (analysis.weaknesses.length > 0) {
    printBlankLine();
    console.log(bold('Weaknesses'));
    analysis.weaknesses.forEach((weakness) => console.log(`  ${red('-')} ${weakness}`));
  }
  if (analysis.recommendations.length > 0) {
    printBlankLine();
    console.log(bold('Recommendations'));
    analysis.recommendations.forEach((recommendation) => console.log(formatRecommendation(recommendation)));
  }

  console.log(formatSeparator(60));
  printBlankLine();
}
