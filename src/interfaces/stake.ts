import {
  PublicKey,
  StakeProgram,
  SYSVAR_CLOCK_PUBKEY,
  SYSVAR_STAKE_HISTORY_PUBKEY,
  Transaction,
  TransactionInstruction,
} from "@solana/web3.js";
import { U64_MAX } from "../config.js";
import type { LedgerAccount } from "../runtime/accounts.js";
import { ByteReader, ByteWriter, u32ToBytes, u64ToBytes } from "../utils/bytes.js";

// ============================================================================
// STAKE ACCOUNT LAYOUT
// ============================================================================

export const STAKE_STATE_SIZE = StakeProgram.space;

export const DEFAULT_WARMUP_COOLDOWN_RATE = 0.25;

export enum StakeStateTag {
  Uninitialized = 0,
  Initialized = 1,
  Stake = 2,
  RewardsPool = 3,
}

const STAKE_SPLIT_INDEX = 3;
const STAKE_WITHDRAW_INDEX = 4;

/** Instruction indices the web3.js stake layouts do not cover */
export enum StakeInstructionIndex {
  GetMinimumDelegation = 13,
  DeactivateDelinquent = 14,
  MoveStake = 16,
  MoveLamports = 17,
}

export interface StakeLockup {
  unixTimestamp: bigint;
  epoch: bigint;
  custodian: PublicKey;
}

export interface StakeMeta {
  rentExemptReserve: bigint;
  staker: PublicKey;
  withdrawer: PublicKey;
  lockup: StakeLockup;
}

export interface Delegation {
  voter: PublicKey;
  stake: bigint;
  activationEpoch: bigint;
  deactivationEpoch: bigint;
  warmupCooldownRate: number;
}

export type StakeState =
  | { kind: "uninitialized" }
  | { kind: "initialized"; meta: StakeMeta }
  | { kind: "stake"; meta: StakeMeta; delegation: Delegation; creditsObserved: bigint; flags: number };

export const DEFAULT_LOCKUP: StakeLockup = {
  unixTimestamp: 0n,
  epoch: 0n,
  custodian: PublicKey.default,
};

function readMeta(reader: ByteReader): StakeMeta {
  return {
    rentExemptReserve: reader.u64(),
    staker: reader.pubkey(),
    withdrawer: reader.pubkey(),
    lockup: { unixTimestamp: reader.i64(), epoch: reader.u64(), custodian: reader.pubkey() },
  };
}

function writeMeta(writer: ByteWriter, meta: StakeMeta): void {
  writer
    .u64(meta.rentExemptReserve)
    .pubkey(meta.staker)
    .pubkey(meta.withdrawer)
    .i64(meta.lockup.unixTimestamp)
    .u64(meta.lockup.epoch)
    .pubkey(meta.lockup.custodian);
}

/**
 * Decode stake account data. Returns null when the data is not a stake
 * account this runtime understands.
 */
export function decodeStakeState(data: Uint8Array): StakeState | null {
  if (data.length < STAKE_STATE_SIZE) return null;
  const reader = new ByteReader(data);
  const tag = reader.u32();
  switch (tag) {
    case StakeStateTag.Uninitialized:
      return { kind: "uninitialized" };
    case StakeStateTag.Initialized:
      return { kind: "initialized", meta: readMeta(reader) };
    case StakeStateTag.Stake: {
      const meta = readMeta(reader);
      const delegation: Delegation = {
        voter: reader.pubkey(),
        stake: reader.u64(),
        activationEpoch: reader.u64(),
        deactivationEpoch: reader.u64(),
        warmupCooldownRate: reader.f64(),
      };
      const creditsObserved = reader.u64();
      const flags = reader.u8();
      return { kind: "stake", meta, delegation, creditsObserved, flags };
    }
    default:
      return null;
  }
}

/**
 * Write a stake state into an account's data buffer, zeroing the rest
 */
export function encodeStakeState(state: StakeState, data: Buffer): void {
  data.fill(0);
  const writer = new ByteWriter(data);
  switch (state.kind) {
    case "uninitialized":
      writer.u32(StakeStateTag.Uninitialized);
      break;
    case "initialized":
      writer.u32(StakeStateTag.Initialized);
      writeMeta(writer, state.meta);
      break;
    case "stake":
      writer.u32(StakeStateTag.Stake);
      writeMeta(writer, state.meta);
      writer
        .pubkey(state.delegation.voter)
        .u64(state.delegation.stake)
        .u64(state.delegation.activationEpoch)
        .u64(state.delegation.deactivationEpoch)
        .f64(state.delegation.warmupCooldownRate)
        .u64(state.creditsObserved)
        .u8(state.flags);
      break;
  }
}

// ============================================================================
// ACTIVATION STATUS
// ============================================================================

export type StakeStatus = "activating" | "active" | "deactivating" | "inactive";

/**
 * Activation status at `epoch`. Warmup and cooldown complete at the first
 * epoch boundary.
 */
export function stakeStatus(delegation: Delegation, epoch: bigint): StakeStatus {
  if (delegation.deactivationEpoch !== U64_MAX) {
    if (delegation.deactivationEpoch <= delegation.activationEpoch || epoch > delegation.deactivationEpoch) {
      return "inactive";
    }
    return "deactivating";
  }
  return epoch > delegation.activationEpoch ? "active" : "activating";
}

/** Status of any stake state; undelegated accounts count as inactive */
export function stateStatus(state: StakeState, epoch: bigint): StakeStatus {
  return state.kind === "stake" ? stakeStatus(state.delegation, epoch) : "inactive";
}

/**
 * Lamports that must stay in the account: the rent reserve, plus the
 * delegation while it is not inactive
 */
export function lockedLamports(state: StakeState, epoch: bigint): bigint {
  switch (state.kind) {
    case "uninitialized":
      return 0n;
    case "initialized":
      return state.meta.rentExemptReserve;
    case "stake":
      return stakeStatus(state.delegation, epoch) === "inactive"
        ? state.meta.rentExemptReserve
        : state.meta.rentExemptReserve + state.delegation.stake;
  }
}

/**
 * Credit inflation rewards to a fully active stake account for the epoch
 * that is closing. Returns the lamports credited.
 */
export function creditStakeRewards(account: LedgerAccount, epoch: bigint, rewardBps: bigint): bigint {
  if (!account.owner.equals(StakeProgram.programId)) return 0n;
  const state = decodeStakeState(account.data);
  if (!state || state.kind !== "stake") return 0n;
  if (stakeStatus(state.delegation, epoch) !== "active") return 0n;

  const reward = (state.delegation.stake * rewardBps) / 10_000n;
  if (reward === 0n) return 0n;

  account.lamports += reward;
  encodeStakeState(
    { ...state, delegation: { ...state.delegation, stake: state.delegation.stake + reward } },
    account.data
  );
  return reward;
}

// ============================================================================
// INSTRUCTION HELPERS
// ============================================================================

/**
 * web3.js account creation takes plain numbers
 */
export function toLamportsNumber(lamports: bigint): number {
  if (lamports > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`${lamports} lamports exceeds the safe integer range`);
  }
  return Number(lamports);
}

/**
 * The final instruction of a web3.js stake builder, which wraps it in a
 * transaction alongside any account creation
 */
export function lastInstruction(transaction: Transaction): TransactionInstruction {
  const instruction = transaction.instructions[transaction.instructions.length - 1];
  if (!instruction) throw new Error("builder produced an empty transaction");
  return instruction;
}

export function getMinimumDelegationInstruction(): TransactionInstruction {
  return new TransactionInstruction({
    programId: StakeProgram.programId,
    keys: [],
    data: Buffer.from(u32ToBytes(StakeInstructionIndex.GetMinimumDelegation)),
  });
}

export function moveLamportsInstruction(params: {
  sourceStake: PublicKey;
  destinationStake: PublicKey;
  staker: PublicKey;
  lamports: bigint;
}): TransactionInstruction {
  return new TransactionInstruction({
    programId: StakeProgram.programId,
    keys: [
      { pubkey: params.sourceStake, isSigner: false, isWritable: true },
      { pubkey: params.destinationStake, isSigner: false, isWritable: true },
      { pubkey: params.staker, isSigner: true, isWritable: false },
    ],
    data: Buffer.concat([u32ToBytes(StakeInstructionIndex.MoveLamports), u64ToBytes(params.lamports)]),
  });
}

export function moveStakeInstruction(params: {
  sourceStake: PublicKey;
  destinationStake: PublicKey;
  staker: PublicKey;
  lamports: bigint;
}): TransactionInstruction {
  return new TransactionInstruction({
    programId: StakeProgram.programId,
    keys: [
      { pubkey: params.sourceStake, isSigner: false, isWritable: true },
      { pubkey: params.destinationStake, isSigner: false, isWritable: true },
      { pubkey: params.staker, isSigner: true, isWritable: false },
    ],
    data: Buffer.concat([u32ToBytes(StakeInstructionIndex.MoveStake), u64ToBytes(params.lamports)]),
  });
}

/**
 * Split and Withdraw with the amount encoded straight from a bigint, so
 * amounts above 2^53 survive. Account order matches the web3.js builders.
 */
export function splitInstruction(params: {
  stake: PublicKey;
  splitStake: PublicKey;
  staker: PublicKey;
  lamports: bigint;
}): TransactionInstruction {
  return new TransactionInstruction({
    programId: StakeProgram.programId,
    keys: [
      { pubkey: params.stake, isSigner: false, isWritable: true },
      { pubkey: params.splitStake, isSigner: false, isWritable: true },
      { pubkey: params.staker, isSigner: true, isWritable: false },
    ],
    data: Buffer.concat([u32ToBytes(STAKE_SPLIT_INDEX), u64ToBytes(params.lamports)]),
  });
}

export function withdrawInstruction(params: {
  stake: PublicKey;
  to: PublicKey;
  withdrawer: PublicKey;
  lamports: bigint;
}): TransactionInstruction {
  return new TransactionInstruction({
    programId: StakeProgram.programId,
    keys: [
      { pubkey: params.stake, isSigner: false, isWritable: true },
      { pubkey: params.to, isSigner: false, isWritable: true },
      { pubkey: SYSVAR_CLOCK_PUBKEY, isSigner: false, isWritable: false },
      { pubkey: SYSVAR_STAKE_HISTORY_PUBKEY, isSigner: false, isWritable: false },
      { pubkey: params.withdrawer, isSigner: true, isWritable: false },
    ],
    data: Buffer.concat([u32ToBytes(STAKE_WITHDRAW_INDEX), u64ToBytes(params.lamports)]),
  });
}

/**
 * Deactivate a stake delegated to a vote account that stopped voting.
 * Anyone may send it; `referenceVote` must have voted in each of the
 * last five epochs.
 */
export function deactivateDelinquentInstruction(params: {
  stake: PublicKey;
  delinquentVote: PublicKey;
  referenceVote: PublicKey;
}): TransactionInstruction {
  return new TransactionInstruction({
    programId: StakeProgram.programId,
    keys: [
      { pubkey: params.stake, isSigner: false, isWritable: true },
      { pubkey: params.delinquentVote, isSigner: false, isWritable: false },
      { pubkey: params.referenceVote, isSigner: false, isWritable: false },
    ],
    data: Buffer.from(u32ToBytes(StakeInstructionIndex.DeactivateDelinquent)),
  });
}
