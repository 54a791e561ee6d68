/**
 * Review and Queue Commands
 *
 * Usage:
 *   npm run cli review <cardId> <quality 0-5> [--seconds <n>]
 *   npm run cli queue <learnerId> [--course <courseId>] [--minutes <n>]
 */

import type { StudyEngine } from '../../core/engine';
import { printServiceError } from '../utils/errors';
import { bold, cyan, dim, formatField, formatSeparator, green, printBlankLine, printHeading, red } from '../utils/terminal';

export async function runReviewCommand(
  engine: StudyEngine,
  cardId: string,
  quality: number,
  responseTimeSeconds = 0
): Promise<number> {
  const result = await engine.reviewItem(cardId, quality, responseTimeSeconds);
  if (!result.ok) return printServiceError(result.error);

  const { card, previousState, quality: grade } = result.value;
  printBlankLine();
  console.log(`${bold(card.front)} ${grade >= 3 ? green(`recalled (${grade})`) : red(`forgotten (${grade})`)}`);
  console.log(
    formatField('Interval', `${previousState.intervalDays} -> ${card.reviewState.intervalDays} days`)
  );
  console.log(
    formatField('Ease factor', `${previousState.easeFactor.toFixed(2)} -> ${card.reviewState.easeFactor.toFixed(2)}`)
  );
  console.log(formatField('Next review', card.reviewState.nextDueAt.toISOString().slice(0, 10)));
  printBlankLine();
  return 0;
}

export interface QueueOptions {
  courseId?: string;
  availableMinutes?: number;
}

export async function runQueueCommand(
  engine: StudyEngine,
  learnerId: string,
  options: QueueOptions = {}
): Promise<number> {
  const result = await engine.getReviewQueue(learnerId, options.courseId ?? null, options.availableMinutes);
  if (!result.ok) return printServiceError(result.error);
  const queue = result.value;

  printHeading(`Review Queue: ${learnerId}`);
  console.log(formatField('Due', `${queue.totalDue} (${queue.load.overdue} overdue)`));
  console.log(formatField('This session', `${queue.batchSize} cards`));
  console.log(formatField('Study pressure', String(queue.load.studyPressure)));

  if (queue.cards.length === 0) {
    console.log(dim('  Nothing due. Come back later.'));
  } else {
    printBlankLine();
    for (const card of queue.cards) {
      const flag = card.starred ? cyan('*') : ' ';
      console.log(`  ${flag} ${card.id.padEnd(14)} ${card.front} ${dim(`[${card.difficulty}]`)}`);
    }
  }

  for (const recommendation of queue.recommendations) {
    console.log(`  ${dim('>')} ${recommendation.message}`);
  }
  console.log(formatSeparator(60));
  printBlankLine();
  return 0;
}
