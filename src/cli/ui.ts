/**
 * Visual formatting helpers for terminal output
 */

import chalk from 'chalk';
import type { Category, CategoryScores } from '../memory/types.js';

/**
 * Icons for categories and messages
 */
export const icons = {
  // Categories
  personal: '\u{1F3E0}',      // house
  professional: '\u{1F4BC}',  // briefcase
  technical: '\u{1F527}',     // wrench
  general: '\u{1F4DD}',       // memo

  dot: '\u{2022}',
};

/**
 * Category color map
 */
export const categoryColors: Record<Category, typeof chalk> = {
  personal: chalk.magenta,
  professional: chalk.blue,
  technical: chalk.yellow,
  general: chalk.gray,
};

/**
 * Format a category label, e.g. "💼 [PROFESSIONAL]"
 */
export function formatCategory(category: Category): string {
  return `${icons[category]} ${categoryColors[category](`[${category.toUpperCase()}]`)}`;
}

export function formatScores(scores: CategoryScores): string {
  return chalk.gray(
    `personal ${scores.personal} ${icons.dot} professional ${scores.professional} ${icons.dot} technical ${scores.technical}`
  );
}

/**
 * Error message with red X
 */
export function error(message: string): string {
  return chalk.red('✗') + ' ' + message;
}

/**
 * Info message with blue info icon
 */
export function info(message: string): string {
  return chalk.blue('ℹ') + ' ' + message;
}
