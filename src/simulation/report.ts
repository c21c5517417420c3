import chalk from "chalk";
import fs from "fs";
import path from "path";
import { formatSol } from "../config.js";
import { log } from "../utils/logger.js";
import { SimulationResults, sharePrice } from "./scenario.js";

/**
 * JSON with bigints written as decimal strings; public keys serialize as base58
 */
export function serializeResults(results: SimulationResults): string {
  return JSON.stringify(results, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value), 2);
}

/**
 * Save simulation results to a JSON file
 */
export function saveResults(results: SimulationResults, outputFile: string): string {
  const filepath = path.resolve(outputFile);
  fs.mkdirSync(path.dirname(filepath), { recursive: true });
  fs.writeFileSync(filepath, serializeResults(results));
  return filepath;
}

/**
 * Share price growth over the run, in percent
 */
export function sharePriceGrowth(results: SimulationResults): number {
  const first = results.epochs[0];
  if (!first || first.sharePrice === 0) return 0;
  return (sharePrice(results.final) / first.sharePrice - 1) * 100;
}

export function printSummary(results: SimulationResults): void {
  const final = results.final;

  log(chalk.blue("\n╔══════════════════════════════════════════════════════════════════╗"));
  log(chalk.blue("║            SINGLE POOL SIMULATION RESULTS                        ║"));
  log(chalk.blue("╠══════════════════════════════════════════════════════════════════╣"));
  log(chalk.gray(`║  Vote Account:    ${results.voteAccount}`));
  log(chalk.gray(`║  Pool:            ${results.pool}`));
  log(chalk.gray(`║  Transactions:    ${results.transactions} (${formatSol(results.feesPaid, 6)} SOL in fees)`));

  log(chalk.blue("╠══════════════════════════════════════════════════════════════════╣"));
  log(chalk.blue("║  EPOCHS"));
  for (const epoch of results.epochs) {
    log(
      chalk.gray(
        `║  ${epoch.epoch.toString().padStart(4)}  stake ${formatSol(epoch.delegatedStake).padStart(12)} SOL` +
          `  supply ${formatSol(epoch.tokenSupply).padStart(12)}  price ${epoch.sharePrice.toFixed(9)}`
      )
    );
  }

  log(chalk.blue("╠══════════════════════════════════════════════════════════════════╣"));
  log(chalk.blue("║  WITHDRAWALS"));
  for (const withdrawal of results.withdrawals) {
    const gain = withdrawal.gain >= 0n ? chalk.green(`+${formatSol(withdrawal.gain, 6)}`) : chalk.red(formatSol(withdrawal.gain, 6));
    log(chalk.gray(`║  ${withdrawal.depositor.slice(0, 8)}…  received ${formatSol(withdrawal.stakeReceived)} SOL  `) + gain);
  }

  log(chalk.blue("╠══════════════════════════════════════════════════════════════════╣"));
  log(chalk.green(`║  Final stake:     ${formatSol(final.delegatedStake)} SOL`));
  log(chalk.green(`║  Final supply:    ${formatSol(final.tokenSupply)} tokens`));
  log(chalk.green(`║  Share price:     ${sharePrice(final).toFixed(9)} (${sharePriceGrowth(results).toFixed(4)}%)`));
  log(chalk.blue("╚══════════════════════════════════════════════════════════════════╝"));
  log("");
}
