import { LAMPORTS_PER_SOL as WEB3_LAMPORTS_PER_SOL, PublicKey } from "@solana/web3.js";

// Program IDs
export const PROGRAM_IDS = {
  SINGLE_POOL: new PublicKey("SVSPxpvHTTmcNzfhKKwLVyYtGHnE8mBDq1xyR8jfcy6"),
  TOKEN_METADATA: new PublicKey("metaqbxxUerdq28cj1RbAWkYQm3ybzjb6a8bt518x1s"),
};

// PDA Seeds
export const SEEDS = {
  POOL: Buffer.from("pool"),
  POOL_STAKE: Buffer.from("stake"),
  POOL_MINT: Buffer.from("mint"),
  POOL_ONRAMP: Buffer.from("onramp"),
  POOL_STAKE_AUTHORITY: Buffer.from("stake_authority"),
  POOL_MINT_AUTHORITY: Buffer.from("mint_authority"),
  POOL_MPL_AUTHORITY: Buffer.from("mpl_authority"),
  METADATA: Buffer.from("metadata"),
};

/** Prefix of the seed string used for default deposit stake accounts */
export const DEFAULT_DEPOSIT_SEED_PREFIX = "svsp";

export const LAMPORTS_PER_SOL = BigInt(WEB3_LAMPORTS_PER_SOL);

/** Pool stake may never fall below this, regardless of the network minimum delegation */
export const MINIMUM_POOL_BALANCE_FLOOR = LAMPORTS_PER_SOL;

/** Pool tokens use the same precision as SOL */
export const POOL_MINT_DECIMALS = 9;

export const U64_MAX = 0xffff_ffff_ffff_ffffn;

// Ledger configuration
export interface LedgerConfig {
  // Rent parameters (lamports per byte-year and the exemption multiplier)
  lamportsPerByteYear: bigint;
  exemptionThreshold: bigint;

  // Stake program minimum delegation
  minimumDelegation: bigint;

  // Fee charged to the fee payer per signature
  lamportsPerSignature: bigint;

  slotsPerEpoch: bigint;
  startingEpoch: bigint;
}

export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  lamportsPerByteYear: 3_480n,
  exemptionThreshold: 2n,
  minimumDelegation: LAMPORTS_PER_SOL,
  lamportsPerSignature: 5_000n,
  slotsPerEpoch: 432_000n,
  startingEpoch: 0n,
};

// Simulation configuration
export interface SimulationConfig {
  // Number of epochs to run after the initial deposits
  epochs: number;

  // Depositors and their stake (in lamports)
  depositors: number;
  depositLamports: bigint;

  // Tips paid straight into the pool stake and onramp accounts each epoch
  tipLamports: bigint;

  // Inflation rewards credited to active stake per epoch, in basis points
  rewardBps: bigint;

  // Fraction of depositors that redeem at the end, 0-1
  withdrawFraction: number;

  // Output
  outputFile: string | null;
}

export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  epochs: 10,
  depositors: 4,
  depositLamports: 10n * LAMPORTS_PER_SOL, // 10 SOL
  tipLamports: 50_000_000n, // 0.05 SOL
  rewardBps: 2n, // ~0.02% per epoch
  withdrawFraction: 0.5,
  outputFile: null,
};

// Conversion helpers
export function solToLamports(sol: number): bigint {
  return BigInt(Math.floor(sol * 1_000_000_000));
}

export function lamportsToSol(lamports: bigint): number {
  return Number(lamports) / 1_000_000_000;
}

export function formatSol(lamports: bigint, decimals: number = 4): string {
  return lamportsToSol(lamports).toFixed(decimals);
}
