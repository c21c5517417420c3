#!/usr/bin/env node

import { Command } from "commander";
import { PublicKey } from "@solana/web3.js";
import chalk from "chalk";

import {
  DEFAULT_LEDGER_CONFIG,
  DEFAULT_SIMULATION_CONFIG,
  LedgerConfig,
  PROGRAM_IDS,
  SimulationConfig,
  solToLamports,
} from "./config.js";
import { findDefaultDepositAccountAddress, getPoolAddresses } from "./program/addresses.js";
import { printSummary, saveResults } from "./simulation/report.js";
import { PoolSimulation } from "./simulation/scenario.js";
import { describeError } from "./runtime/errors.js";
import { log, logItem, logSection, logger } from "./utils/logger.js";

interface RunOptions {
  epochs: string;
  depositors: string;
  deposit: string;
  tip: string;
  rewardBps: string;
  withdrawFraction: string;
  minimumDelegation: string;
  output?: string;
}

interface AddressesOptions {
  owner?: string;
  programId: string;
}

const program = new Command();

program
  .name("svsp-sim")
  .description("Single-validator liquid stake pool running on an in-process ledger")
  .version("1.0.0");

program
  .command("run")
  .description("Run a multi-epoch pool simulation")
  .option("-e, --epochs <number>", "Epochs to run after the initial deposits", String(DEFAULT_SIMULATION_CONFIG.epochs))
  .option("-d, --depositors <number>", "Number of depositors", String(DEFAULT_SIMULATION_CONFIG.depositors))
  .option("--deposit <number>", "Stake per depositor in SOL", "10")
  .option("--tip <number>", "Tips paid into the pool each epoch in SOL", "0.05")
  .option("--reward-bps <number>", "Inflation reward per epoch in basis points", String(DEFAULT_SIMULATION_CONFIG.rewardBps))
  .option("--withdraw-fraction <number>", "Fraction of depositors that withdraw at the end", "0.5")
  .option("--minimum-delegation <number>", "Stake program minimum delegation in SOL", "1")
  .option("-o, --output <file>", "Write results as JSON")
  .action(async (options: RunOptions) => {
    log(chalk.cyan(`
╔══════════════════════════════════════════════════════════════════╗
║     Single-Validator Stake Pool - Epoch Simulation               ║
╚══════════════════════════════════════════════════════════════════╝
`));

    const config: SimulationConfig = {
      ...DEFAULT_SIMULATION_CONFIG,
      epochs: parseInt(options.epochs),
      depositors: parseInt(options.depositors),
      depositLamports: solToLamports(parseFloat(options.deposit)),
      tipLamports: solToLamports(parseFloat(options.tip)),
      rewardBps: BigInt(options.rewardBps),
      withdrawFraction: parseFloat(options.withdrawFraction),
      outputFile: options.output ?? null,
    };
    const ledgerConfig: LedgerConfig = {
      ...DEFAULT_LEDGER_CONFIG,
      minimumDelegation: solToLamports(parseFloat(options.minimumDelegation)),
    };

    try {
      const results = await new PoolSimulation(config, ledgerConfig).run();
      printSummary(results);

      if (config.outputFile) {
        const resultsPath = saveResults(results, config.outputFile);
        logger.info(`Results saved: ${resultsPath}`);
      }
    } catch (error) {
      logger.error(`Simulation failed: ${describeError(error)}`);
      process.exitCode = 1;
    }
  });

program
  .command("addresses")
  .description("Show every address derived for the pool of a vote account")
  .argument("<vote-account>", "Validator vote account")
  .option("--owner <pubkey>", "Also show this wallet's default deposit account")
  .option("--program-id <pubkey>", "Pool program id", PROGRAM_IDS.SINGLE_POOL.toBase58())
  .action((voteAccount: string, options: AddressesOptions) => {
    try {
      const addresses = getPoolAddresses(new PublicKey(voteAccount), new PublicKey(options.programId));
      logSection("Pool Addresses");
      logItem(`Vote account:     ${addresses.voteAccount.toBase58()}`);
      logItem(`Pool:             ${addresses.pool.toBase58()}`);
      logItem(`Stake:            ${addresses.stake.toBase58()}`);
      logItem(`OnRamp:           ${addresses.onRamp.toBase58()}`);
      logItem(`Mint:             ${addresses.mint.toBase58()}`);
      logItem(`Stake authority:  ${addresses.stakeAuthority.toBase58()}`);
      logItem(`Mint authority:   ${addresses.mintAuthority.toBase58()}`);
      logItem(`MPL authority:    ${addresses.mplAuthority.toBase58()}`);
      logItem(`Metadata:         ${addresses.metadata.toBase58()}`);
      if (options.owner) {
        const deposit = findDefaultDepositAccountAddress(addresses.pool, new PublicKey(options.owner));
        logItem(`Default deposit:  ${deposit.toBase58()}`);
      }
    } catch (error) {
      logger.error(describeError(error));
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(describeError(error));
  process.exitCode = 1;
});
