import chalk from "chalk";

/**
 * Console output for the simulation CLI. Writes go straight to stdout so
 * progress lines can be redrawn in place.
 */

export function log(message: string): void {
  process.stdout.write(message + "\n");
}

export const logger = {
  info: (message: string) => process.stdout.write(chalk.gray(message) + "\n"),
  success: (message: string) => process.stdout.write(chalk.green(message) + "\n"),
  warn: (message: string) => process.stdout.write(chalk.yellow(message) + "\n"),
  error: (message: string) => process.stdout.write(chalk.red(message) + "\n"),
  blue: (message: string) => process.stdout.write(chalk.blue(message) + "\n"),
  cyan: (message: string) => process.stdout.write(chalk.cyan(message) + "\n"),
};

/**
 * Log progress on the same line (updates in place)
 */
export function logProgress(current: number, total: number, message: string): void {
  const percentage = total === 0 ? 100 : Math.round((current / total) * 100);
  const progressBar = createProgressBar(percentage, 20);
  process.stdout.write(`\r  ${progressBar} ${current}/${total} ${message}`.padEnd(80));
}

/**
 * End progress line (move to next line)
 */
export function endProgress(): void {
  process.stdout.write("\n");
}

function createProgressBar(percentage: number, width: number): string {
  const filled = Math.round((percentage / 100) * width);
  const empty = width - filled;
  return chalk.green("█".repeat(filled)) + chalk.gray("░".repeat(empty));
}

export function logSection(title: string): void {
  process.stdout.write("\n");
  process.stdout.write(chalk.blue("══════════════════════════════════════════════\n"));
  process.stdout.write(chalk.blue(`  ${title}\n`));
  process.stdout.write(chalk.blue("══════════════════════════════════════════════\n"));
  process.stdout.write("\n");
}

export function logItem(message: string, indent: number = 0): void {
  const prefix = "  ".repeat(indent);
  process.stdout.write(`${prefix}${chalk.gray("•")} ${message}\n`);
}

export function logOk(message: string): void {
  process.stdout.write(chalk.green(`  ✓ ${message}\n`));
}

/**
 * Print transaction log lines, indented by invocation depth
 */
export function logTransaction(logs: readonly string[]): void {
  let depth = 0;
  for (const line of logs) {
    const invoke = /invoke \[(\d+)\]$/.exec(line);
    if (invoke) depth = Number(invoke[1]);
    const colored = line.includes(" failed") ? chalk.red(line) : chalk.gray(line);
    process.stdout.write(`    ${"  ".repeat(Math.max(depth - 1, 0))}${colored}\n`);
    if (/ (success|failed)/.test(line) && !line.startsWith("Program log:")) depth -= 1;
  }
}
