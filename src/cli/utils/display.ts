/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type {
  CategoryResult,
  CycleResult,
} from "../../services/sync/reconciler.js";

const MAX_ERRORS_SHOWN = 20;

function formatCount(value: number, color: (text: string) => string): string {
  return value > 0 ? color(String(value)) : chalk.dim("0");
}

/**
 * Rows of the cycle summary table: one per category
 */
export function summaryRows(result: CycleResult): [string, CategoryResult][] {
  return [
    ["Correspondents", result.correspondents],
    ["Tags", result.tags],
    ["Archive", result.archive],
    ["Documents", result.documents],
  ];
}

/**
 * Display the outcome of a sync cycle in a formatted table
 */
export function displayCycleSummary(result: CycleResult): void {
  const table = new CliTable3({
    head: [
      chalk.cyan("Category"),
      chalk.cyan("Created"),
      chalk.cyan("Updated"),
      chalk.cyan("Archived"),
      chalk.cyan("Skipped"),
      chalk.cyan("Failed"),
    ],
    colWidths: [18, 10, 10, 10, 10, 10],
  });

  for (const [label, category] of summaryRows(result)) {
    table.push([
      label,
      formatCount(category.inserted, chalk.green),
      formatCount(category.updated, chalk.blue),
      formatCount(category.archived, chalk.yellow),
      formatCount(category.skipped, chalk.yellow),
      formatCount(category.failed, chalk.red),
    ]);
  }

  console.log(table.toString());
  console.log(
    chalk.dim(
      `Started ${result.startedAt.toISOString()}, took ${String(result.duration)}ms`
    )
  );

  const errors = summaryRows(result).flatMap(([, category]) => category.errors);
  if (errors.length > 0) {
    console.log("\n" + "─".repeat(80));
    console.log(chalk.red(`FAILURES (${String(errors.length)}):`));
    console.log("─".repeat(80));
    for (const error of errors.slice(0, MAX_ERRORS_SHOWN)) {
      console.log(`  ${error}`);
    }
    if (errors.length > MAX_ERRORS_SHOWN) {
      console.log(
        `  ... and ${String(errors.length - MAX_ERRORS_SHOWN)} more`
      );
    }
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}
