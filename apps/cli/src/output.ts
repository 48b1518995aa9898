/**
 * chalk-based output formatting for the terminal.
 */

import chalk from 'chalk';
import { Urgency, parseDeadline } from '@tododesk/core';
import type { Category, ProgressSummary, TaskMatch, TaskResult } from '@tododesk/core';

// --- Category colors (deterministic from category name) ---

const CATEGORY_COLORS = [chalk.cyan, chalk.magenta, chalk.blue, chalk.yellow, chalk.green];

function categoryColor(category: string): (s: string) => string {
  let hash = 0;
  for (let i = 0; i < category.length; i++) {
    hash = ((hash << 5) - hash + category.charCodeAt(i)) | 0;
  }
  return CATEGORY_COLORS[Math.abs(hash) % CATEGORY_COLORS.length]!;
}

// --- Formatting functions ---

export function formatCheckbox(completed: boolean): string {
  return completed ? chalk.green('[x]') : chalk.gray('[ ]');
}

export function formatUrgency(urgency: Urgency): string {
  const label = urgency.padEnd(7);
  switch (urgency) {
    case Urgency.Urgent: return chalk.red.bold(label);
    case Urgency.Pending: return chalk.yellow(label);
    case Urgency.Done: return chalk.green(label);
  }
}

export function formatCategory(category: Category): string {
  return categoryColor(category)(`[${category}]`);
}

export function formatDeadline(deadline: string, completed: boolean, now: Date = new Date()): string {
  if (!deadline) return '';
  const due = parseDeadline(deadline);
  if (!due || completed) return chalk.dim(`  Due: ${deadline}`);

  const today = new Date(now.getFullYear(), now.getMonth(), now.getDate());
  const diff = Math.round((due.getTime() - today.getTime()) / 86400000);

  if (diff < 0) return chalk.red(`  OVERDUE (${-diff}d)`);
  if (diff === 0) return chalk.yellow('  Due: Today');
  if (diff === 1) return chalk.dim('  Due: Tomorrow');
  return chalk.dim(`  Due: ${deadline}`);
}

/** One task as shown by `list`; positions are printed one-based */
export function formatTaskLine({ position, task }: TaskMatch, urgency: Urgency, now: Date = new Date()): string {
  const head = [
    chalk.dim(`${position + 1}.`),
    chalk.dim(`(${task.id})`),
    formatCheckbox(task.completed),
    formatUrgency(urgency),
    chalk.bold(task.title),
    formatCategory(task.category),
  ].join(' ');
  const line = head + formatDeadline(task.deadline, task.completed, now);
  return task.description ? `${line}\n      ${chalk.dim(task.description)}` : line;
}

export function formatProgress({ total, done, pending, percent }: ProgressSummary): string {
  return `Progress: ${done}/${total} done, ${pending} pending (${percent}%)`;
}

export function formatProgressBar(percent: number, width = 20): string {
  const filled = Math.round((percent / 100) * width);
  return chalk.green('#'.repeat(filled)) + chalk.dim('-'.repeat(width - filled));
}

// --- Result output ---

export function printResult(result: TaskResult): void {
  switch (result.type) {
    case 'success':
      success(result.message);
      if (result.persistError) warning(result.persistError.message);
      break;
    case 'not-found': error(result.message); break;
    case 'invalid': error(result.message); break;
  }
}

export function printResults(results: readonly TaskResult[]): void {
  for (const result of results) {
    printResult(result);
  }
}

// --- Basic output ---

export function success(message: string): void {
  console.log(chalk.green(message));
}

export function error(message: string): void {
  console.log(chalk.red(message));
}

export function warning(message: string): void {
  console.log(chalk.yellow(message));
}

export function info(message: string): void {
  console.log(message);
}

// --- Utilities ---

export function getTimeAgo(timestamp: Date, now: Date = new Date()): string {
  const diff = now.getTime() - timestamp.getTime();
  const mins = diff / 60000;
  if (mins < 1) return 'just now';
  if (mins < 60) return `${Math.floor(mins)}m ago`;
  const hours = mins / 60;
  if (hours < 24) return `${Math.floor(hours)}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
}
