/* eslint-disable no-restricted-syntax -- CLI table output requires console.log */
import chalk from 'chalk';
import Table from 'cli-table3';

import type { ModelSummary } from './run.js';

// Scaled CRPS thresholds for color coding
const CRPS_GOOD = 0.1;
const CRPS_OK = 0.3;

const TABLE_CHARS = {
  'top': '─', 'top-mid': '┬', 'top-left': '┌', 'top-right': '┐',
  'bottom': '─', 'bottom-mid': '┴', 'bottom-left': '└', 'bottom-right': '┘',
  'left': '│', 'left-mid': '├', 'mid': '─', 'mid-mid': '┼',
  'right': '│', 'right-mid': '┤', 'middle': '│',
};

function formatCrps(value: number): string {
  if (Number.isNaN(value)) {
    return chalk.dim('-');
  }
  const formatted = value.toFixed(4);
  if (value < CRPS_GOOD) {
    return chalk.green(formatted);
  }
  if (value < CRPS_OK) {
    return chalk.yellow(formatted);
  }
  return chalk.red(formatted);
}

function getRankMedal(rank: number): string {
  if (rank === 1) {
    return '🥇';
  }
  if (rank === 2) {
    return '🥈';
  }
  if (rank === 3) {
    return '🥉';
  }
  return `${String(rank)}.`;
}

/**
 * Order models by mean CRPS, models without a completed task last
 */
export function rankSummaries(summaries: ModelSummary[]): ModelSummary[] {
  return [...summaries].sort((a, b) => {
    const aMissing = Number.isNaN(a.meanCrps);
    const bMissing = Number.isNaN(b.meanCrps);
    if (aMissing || bMissing) {
      return Number(aMissing) - Number(bMissing);
    }
    return a.meanCrps - b.meanCrps;
  });
}

/**
 * Print the leaderboard, best model first
 */
export function printLeaderboard(summaries: ModelSummary[], totalTasks: number): void {
  const table = new Table({
    chars: TABLE_CHARS,
    style: { head: [], border: [] },
  });

  table.push([{
    colSpan: 6,
    content: chalk.bold(`Forecast Leaderboard (${String(totalTasks)} tasks)`),
    hAlign: 'center',
  }]);

  table.push([
    { content: chalk.dim('Rank'), hAlign: 'center' },
    { content: chalk.dim('Model'), hAlign: 'center' },
    { content: chalk.dim('Tasks'), hAlign: 'center' },
    { content: chalk.dim('CRPS'), hAlign: 'center' },
    { content: chalk.dim('Tokens in/out'), hAlign: 'center' },
    { content: chalk.dim('Cost'), hAlign: 'center' },
  ]);

  for (const [index, summary] of rankSummaries(summaries).entries()) {
    const completed = summary.scores.length;
    const tasksLabel = `${String(completed)}/${String(totalTasks)}`;
    table.push([
      { content: getRankMedal(index + 1), hAlign: 'center' },
      { content: chalk.cyan(summary.modelId), hAlign: 'left' },
      { content: completed < totalTasks ? chalk.red(tasksLabel) : tasksLabel, hAlign: 'right' },
      { content: formatCrps(summary.meanCrps), hAlign: 'right' },
      { content: `${String(summary.inputTokens)}/${String(summary.outputTokens)}`, hAlign: 'right' },
      { content: summary.cost === undefined ? chalk.dim('-') : `$${summary.cost.toFixed(2)}`, hAlign: 'right' },
    ]);
  }

  // eslint-disable-next-line no-console -- CLI output
  console.log(table.toString());
}
/* eslint-enable no-restricted-syntax -- Re-enable after CLI table output */
