import {
  PublicKey,
  SYSVAR_CLOCK_PUBKEY,
  SYSVAR_EPOCH_SCHEDULE_PUBKEY,
  SYSVAR_INSTRUCTIONS_PUBKEY,
  SYSVAR_RECENT_BLOCKHASHES_PUBKEY,
  SYSVAR_RENT_PUBKEY,
  SYSVAR_REWARDS_PUBKEY,
  SYSVAR_SLOT_HASHES_PUBKEY,
  SYSVAR_SLOT_HISTORY_PUBKEY,
  SYSVAR_STAKE_HISTORY_PUBKEY,
} from "@solana/web3.js";
import type { LedgerConfig } from "../config.js";

const RESERVED_SYSVAR_KEYS = new Set(
  [
    SYSVAR_CLOCK_PUBKEY,
    SYSVAR_EPOCH_SCHEDULE_PUBKEY,
    SYSVAR_INSTRUCTIONS_PUBKEY,
    SYSVAR_RECENT_BLOCKHASHES_PUBKEY,
    SYSVAR_RENT_PUBKEY,
    SYSVAR_REWARDS_PUBKEY,
    SYSVAR_SLOT_HASHES_PUBKEY,
    SYSVAR_SLOT_HISTORY_PUBKEY,
    SYSVAR_STAKE_HISTORY_PUBKEY,
  ].map((key) => key.toBase58())
);

/**
 * Sysvars are never writable. A writable flag on one is demoted to
 * read-only, as the cluster does when it sanitizes a message.
 */
export function isReservedAccountKey(key: PublicKey): boolean {
  return RESERVED_SYSVAR_KEYS.has(key.toBase58());
}

export interface Clock {
  slot: bigint;
  epoch: bigint;
  epochStartTimestamp: bigint;
  unixTimestamp: bigint;
}

/** Per-account storage overhead counted by rent, in bytes */
export const ACCOUNT_STORAGE_OVERHEAD = 128n;

/**
 * Rent-exemption calculator
 */
export class Rent {
  constructor(
    readonly lamportsPerByteYear: bigint,
    readonly exemptionThreshold: bigint
  ) {}

  static fromConfig(config: LedgerConfig): Rent {
    return new Rent(config.lamportsPerByteYear, config.exemptionThreshold);
  }

  minimumBalance(dataLength: number): bigint {
    return (ACCOUNT_STORAGE_OVERHEAD + BigInt(dataLength)) * this.lamportsPerByteYear * this.exemptionThreshold;
  }

  isExempt(lamports: bigint, dataLength: number): boolean {
    return lamports >= this.minimumBalance(dataLength);
  }
}
