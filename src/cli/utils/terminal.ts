/**
 * Terminal Formatting Utilities
 *
 * ANSI color helpers and the small formatters the CLI commands share.
 * Colors are plain escape codes; no terminal detection is done.
 */

import type { Priority, Recommendation } from '../../core/models';

// =============================================================================
// Text Style Modifiers
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;

export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;

// =============================================================================
// Color Functions
// =============================================================================

export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;

export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;

export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

export const cyan = (s: string): string => `\x1b[36m${s}\x1b[0m`;

// =============================================================================
// Semantic Formatters
// =============================================================================

export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

/** A 0-100 score, green from 80, yellow from 60, red below. */
export function formatScore(score: number): string {
  const text = score.toFixed(1);
  if (score >= 80) return green(text);
  if (score >= 60) return yellow(text);
  return red(text);
}

/** A 0-1 fraction as a whole percentage. */
export function formatPercent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`;
}

export function formatField(label: string, value: string, width: number = 22): string {
  return `  ${dim(label.padEnd(width))} ${value}`;
}

const PRIORITY_COLORS: Record<Priority, (s: string) => string> = {
  high: red,
  medium: yellow,
  low: dim,
};

export function formatRecommendation(recommendation: Recommendation): string {
  const color = PRIORITY_COLORS[recommendation.priority];
  return `  ${color(`[${recommendation.priority}]`)} ${bold(recommendation.title)}: ${recommendation.description}`;
}

export function printBlankLine(): void {
  console.log();
}

export function printHeading(title: string, width: number = 60): void {
  printBlankLine();
  console.log(bold(title));
  console.log(formatSeparator(width));
}
