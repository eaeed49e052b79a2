#!/usr/bin/env tsx
/**
 * @turnout/demo — Terminal walkthrough.
 *
 * Runs one staked event from registration to sweep against the real
 * packages (no HTTP server) and prints each step.
 */

import chalk from "chalk";
import { runWalkthrough } from "./walkthrough.js";
import type { WalkthroughReporter } from "./walkthrough.js";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                      TURNOUT DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("            Stake to reserve, show up to reclaim          ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

const reporter: WalkthroughReporter = {
  step(step, total, title) {
    const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
    const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
    console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
  },
  ok(message) {
    console.log(chalk.green("    ✓ ") + chalk.white(message));
  },
  info(label, value) {
    console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
  },
  rejected(code, message) {
    console.log(chalk.yellow("    ✗ ") + chalk.yellow.bold(code) + chalk.gray(`  ${message}`));
  },
};

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();

  const result = await runWalkthrough(reporter, { pause: () => sleep(DELAY_MS) });

  console.log();
  console.log(chalk.white("    Proceeds to organizer: ") + chalk.cyan.bold(result.proceeds.toString()));
  console.log(chalk.white("    Notifications:         ") + chalk.cyan.bold(String(result.notifications)));
  console.log(
    chalk.white("    Reconciled:            ") +
      (result.reconciled ? chalk.green.bold("YES") : chalk.red.bold("NO")),
  );
  console.log();

  if (!result.reconciled || !result.chainValid || !result.journalBalanced) {
    process.exitCode = 1;
  }
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
