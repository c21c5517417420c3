import { Keypair, PublicKey, VoteProgram } from "@solana/web3.js";
import type { LedgerAccount } from "../runtime/accounts.js";
import { ByteReader, ByteWriter } from "../utils/bytes.js";

/** Account size of a vote account */
export const VOTE_STATE_SIZE = VoteProgram.space;

export enum VoteStateVersion {
  V0_23_5 = 0,
  V1_14_11 = 1,
  Current = 2,
}

/**
 * The prefix of a vote account every supported version shares
 */
export interface VoteStateHeader {
  version: VoteStateVersion;
  nodePubkey: PublicKey;
  authorizedWithdrawer: PublicKey;
  commission: number;
}

export type VoteDecodeResult =
  | { ok: true; vote: VoteStateHeader }
  | { ok: false; reason: "legacy" | "unparseable" };

export function decodeVoteState(data: Uint8Array): VoteDecodeResult {
  if (data.length < 69) return { ok: false, reason: "unparseable" };
  const reader = new ByteReader(data);
  const version = reader.u32();
  if (version === VoteStateVersion.V0_23_5) return { ok: false, reason: "legacy" };
  if (version !== VoteStateVersion.V1_14_11 && version !== VoteStateVersion.Current) {
    return { ok: false, reason: "unparseable" };
  }
  return {
    ok: true,
    vote: {
      version,
      nodePubkey: reader.pubkey(),
      authorizedWithdrawer: reader.pubkey(),
      commission: reader.u8(),
    },
  };
}

// ============================================================================
// EPOCH CREDITS
// ============================================================================

/** Credits earned per epoch, as (epoch, credits, prevCredits) */
export interface EpochCredits {
  epoch: bigint;
  credits: bigint;
  prevCredits: bigint;
}

/** Vote state keeps at most this many epoch credit entries */
export const MAX_EPOCH_CREDITS_HISTORY = 64;

const PRIOR_VOTERS_SIZE = 32 * (32 + 8 + 8) + 8 + 1;
const LANDED_VOTE_SIZE = 1 + 8 + 4;
const LOCKOUT_SIZE = 8 + 4;

/**
 * Epoch credits of a V1_14_11 or current vote account. Returns null for
 * any other data.
 */
export function decodeEpochCredits(data: Uint8Array): EpochCredits[] | null {
  const header = decodeVoteState(data);
  if (!header.ok) return null;
  try {
    const reader = new ByteReader(data).skip(69);
    const voteSize = header.vote.version === VoteStateVersion.Current ? LANDED_VOTE_SIZE : LOCKOUT_SIZE;
    reader.skip(Number(reader.u64()) * voteSize);
    if (reader.u8() === 1) reader.skip(8);
    reader.skip(Number(reader.u64()) * 40);
    reader.skip(PRIOR_VOTERS_SIZE);

    const count = Number(reader.u64());
    const credits: EpochCredits[] = [];
    for (let i = 0; i < count; i++) {
      credits.push({ epoch: reader.u64(), credits: reader.u64(), prevCredits: reader.u64() });
    }
    return credits;
  } catch {
    return null;
  }
}

/**
 * Credits for a run of voted epochs, `creditsPerEpoch` each
 */
export function epochCreditsFor(epochs: readonly bigint[], creditsPerEpoch: bigint = 1_000n): EpochCredits[] {
  let total = 0n;
  return epochs.map((epoch) => {
    const prevCredits = total;
    total += creditsPerEpoch;
    return { epoch, credits: total, prevCredits };
  });
}

// ============================================================================
// ACCOUNT CONSTRUCTION
// ============================================================================

export interface VoteAccountParams {
  nodePubkey?: PublicKey;
  authorizedWithdrawer: PublicKey;
  commission?: number;
  lamports: bigint;
  version?: VoteStateVersion;
  epochCredits?: readonly EpochCredits[];
}

/**
 * Build a vote account the ledger can load directly. The vote history is
 * empty; the node key is the authorized voter for epoch 0.
 */
export function createVoteAccountData(params: VoteAccountParams): LedgerAccount {
  const version = params.version ?? VoteStateVersion.Current;
  const nodePubkey = params.nodePubkey ?? Keypair.generate().publicKey;
  const epochCredits = (params.epochCredits ?? []).slice(-MAX_EPOCH_CREDITS_HISTORY);
  const data = Buffer.alloc(VOTE_STATE_SIZE);

  const writer = new ByteWriter(data)
    .u32(version)
    .pubkey(nodePubkey)
    .pubkey(params.authorizedWithdrawer)
    .u8(params.commission ?? 0);

  if (version !== VoteStateVersion.V0_23_5) {
    writer
      .u64(0n) // votes
      .u8(0) // root slot
      .u64(1n)
      .u64(0n)
      .pubkey(nodePubkey)
      .skip(PRIOR_VOTERS_SIZE - 9)
      .u64(31n)
      .u8(1)
      .u64(BigInt(epochCredits.length));
    for (const entry of epochCredits) {
      writer.u64(entry.epoch).u64(entry.credits).u64(entry.prevCredits);
    }
  }

  return { lamports: params.lamports, data, owner: VoteProgram.programId, executable: false };
}
