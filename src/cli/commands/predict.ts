/**
 * Predict Command
 *
 * Prints the completion prediction for one course and, when a target date
 * is given, whether the remaining work fits before it.
 *
 * Usage:
 *   npm run cli predict <learnerId> <courseId> [--target <1-5>]
 *   npm run cli predict <learnerId> <courseId> --by 2024-06-01 --hours 6
 */

import type { StudyEngine } from '../../core/engine';
import type { ScheduleFeasibility } from '../../core/prediction';
import { printServiceError } from '../utils/errors';
import {
  bold,
  dim,
  formatField,
  formatPercent,
  formatRecommendation,
  formatSeparator,
  printBlankLine,
  printHeading,
  red,
  yellow,
} from '../utils/terminal';

export interface PredictOptions {
  targetMastery?: number;
  /** With `weeklyHours`, also assesses the schedule feasibility */
  targetDate?: Date;
  weeklyHours?: number;
}

export async function runPredictCommand(
  engine: StudyEngine,
  learnerId: string,
  courseId: string,
  options: PredictOptions = {}
): Promise<number> {
  const result = await engine.predictCompletion(learnerId, courseId, options.targetMastery);
  if (!result.ok) return printServiceError(result.error);
  const prediction = result.value;

  printHeading(`Completion Prediction: ${learnerId} / ${courseId}`);
  const { progress, velocity } = prediction;
  console.log(
    formatField(
      'Mastered topics',
      `${progress.topicsMastered}/${progress.totalTopics} (${progress.completionPercentage}%), target level ${prediction.targetMasteryLevel}`
    )
  );
  console.log(formatField('Velocity', `${velocity.topicsPerWeek} topics/week (${velocity.trend})`));
  console.log(
    formatField(
      'Weeks remaining',
      Number.isFinite(prediction.weeksRemaining) ? String(prediction.weeksRemaining) : red('not progressing')
    )
  );
  console.log(formatField('Estimated completion', prediction.estimatedCompletionDate ?? dim('unknown')));
  console.log(formatField('Probability', formatPercent(prediction.completionProbability)));
  console.log(formatField('Confidence', formatPercent(prediction.confidence)));
  if (!prediction.hasHistory) {
    console.log(yellow('  No topic progress recorded yet; the prediction rests on defaults.'));
  }

  if (prediction.milestones.length > 0) {
    printBlankLine();
    console.log(bold('Milestones'));
    for (const milestone of prediction.milestones) {
      console.log(formatField(`${milestone.percentage}%`, `${milestone.estimatedDate} (${milestone.weeksFromNow} weeks)`));
    }
  }

  if (prediction.recommendations.length > 0) {
    printBlankLine();
    console.log(bold('Recommendations'));
    prediction.recommendations.forEach((recommendation) => console.log(formatRecommendation(recommendation)));
  }

  if (options.targetDate && options.weeklyHours !== undefined) {
    const feasibility = await engine.assessScheduleFeasibility(
      learnerId,
      courseId,
      options.targetDate,
      options.weeklyHours
    );
    if (!feasibility.ok) return printServiceError(feasibility.error);
    printFeasibility(feasibility.value);
  }

  console.log(formatSeparator(60));
  printBlankLine();
  return 0;
}

function printFeasibility(feasibility: ScheduleFeasibility): void {
  printBlankLine();
  console.log(bold(`Feasibility by ${feasibility.constraints.targetDate}`));
  console.log(formatField('Overall', `${feasibility.overall} (daily ${feasibility.daily})`));
  console.log(
    formatField(
      'Hours',
      `${feasibility.remainingWork.estimatedHoursRemaining} needed, ${feasibility.constraints.totalHoursAvailable} available`
    )
  );
  console.log(
    formatField(
      'Recommended',
      `${feasibility.schedule.recommendedWeeklyHours} h/week, ${feasibility.schedule.sessionLengthMinutes} min sessions (${feasibility.schedule.scheduleType})`
    )
  );
  console.log(formatField('Success probability', formatPercent(feasibility.successProbability)));
  feasibility.risks.forEach((risk) => console.log(`  ${red('!')} ${risk}`));
}
