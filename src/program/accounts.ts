import { PublicKey, StakeProgram, SystemProgram, VoteProgram } from "@solana/web3.js";
import { TOKEN_PROGRAM_ID } from "@solana/spl-token";
import { PROGRAM_IDS } from "../config.js";
import { SinglePoolError, poolError } from "../errors.js";
import { VoteStateHeader, decodeVoteState } from "../interfaces/vote.js";
import { RuntimeError } from "../runtime/errors.js";
import type { AccountInfo, SignerSeeds } from "../runtime/invoke.js";
import {
  findMplMetadataAddress,
  findPoolAddressAndBump,
  findPoolMintAddressAndBump,
  findPoolMintAuthorityAddressAndBump,
  findPoolMplAuthorityAddressAndBump,
  findPoolOnRampAddressAndBump,
  findPoolStakeAddressAndBump,
  findPoolStakeAuthorityAddressAndBump,
} from "./addresses.js";
import { SinglePool, decodePool } from "./state.js";

// ============================================================================
// DERIVED ADDRESS CHECKS
// ============================================================================

type Finder = (programId: PublicKey, pool: PublicKey) => [PublicKey, number];

function checkDerived(
  find: Finder,
  error: SinglePoolError,
  programId: PublicKey,
  pool: PublicKey,
  account: AccountInfo
): number {
  const [expected, bump] = find(programId, pool);
  if (!account.key.equals(expected)) throw poolError(error);
  return bump;
}

export function checkPoolAddress(programId: PublicKey, voteAccount: PublicKey, pool: AccountInfo): number {
  const [expected, bump] = findPoolAddressAndBump(programId, voteAccount);
  if (!pool.key.equals(expected)) throw poolError(SinglePoolError.InvalidPoolAccount);
  return bump;
}

export function checkPoolStakeAddress(programId: PublicKey, pool: PublicKey, account: AccountInfo): number {
  return checkDerived(findPoolStakeAddressAndBump, SinglePoolError.InvalidPoolStakeAccount, programId, pool, account);
}

export function checkPoolOnRampAddress(programId: PublicKey, pool: PublicKey, account: AccountInfo): number {
  return checkDerived(findPoolOnRampAddressAndBump, SinglePoolError.InvalidPoolOnRampAccount, programId, pool, account);
}

export function checkPoolMintAddress(programId: PublicKey, pool: PublicKey, account: AccountInfo): number {
  return checkDerived(findPoolMintAddressAndBump, SinglePoolError.InvalidPoolMint, programId, pool, account);
}

export function checkPoolStakeAuthorityAddress(programId: PublicKey, pool: PublicKey, account: AccountInfo): number {
  return checkDerived(
    findPoolStakeAuthorityAddressAndBump,
    SinglePoolError.InvalidPoolStakeAuthority,
    programId,
    pool,
    account
  );
}

export function checkPoolMintAuthorityAddress(programId: PublicKey, pool: PublicKey, account: AccountInfo): number {
  return checkDerived(
    findPoolMintAuthorityAddressAndBump,
    SinglePoolError.InvalidPoolMintAuthority,
    programId,
    pool,
    account
  );
}

export function checkPoolMplAuthorityAddress(programId: PublicKey, pool: PublicKey, account: AccountInfo): number {
  return checkDerived(
    findPoolMplAuthorityAddressAndBump,
    SinglePoolError.InvalidPoolMplAuthority,
    programId,
    pool,
    account
  );
}

export function checkMplMetadataAddress(mint: PublicKey, account: AccountInfo): void {
  if (!account.key.equals(findMplMetadataAddress(mint))) throw poolError(SinglePoolError.InvalidMetadataAccount);
}

// ============================================================================
// PROGRAM ACCOUNT CHECKS
// ============================================================================

function checkProgram(expected: PublicKey, account: AccountInfo): void {
  if (!account.key.equals(expected)) {
    throw new RuntimeError("IncorrectProgramId", `expected ${expected.toBase58()}, got ${account.key.toBase58()}`);
  }
}

export const checkSystemProgram = (account: AccountInfo) => checkProgram(SystemProgram.programId, account);
export const checkStakeProgram = (account: AccountInfo) => checkProgram(StakeProgram.programId, account);
export const checkTokenProgram = (account: AccountInfo) => checkProgram(TOKEN_PROGRAM_ID, account);
export const checkMetadataProgram = (account: AccountInfo) => checkProgram(PROGRAM_IDS.TOKEN_METADATA, account);

// ============================================================================
// ACCOUNT STATE
// ============================================================================

/**
 * Load the pool record and confirm it belongs to `voteAccount`, when given
 */
export function loadPool(programId: PublicKey, pool: AccountInfo, voteAccount?: PublicKey): SinglePool {
  const state = pool.isOwnedBy(programId) ? decodePool(pool.data) : null;
  if (!state) throw poolError(SinglePoolError.InvalidPoolAccount);

  const [expected] = findPoolAddressAndBump(programId, state.voteAccount);
  if (!pool.key.equals(expected)) throw poolError(SinglePoolError.InvalidPoolAccount);
  if (voteAccount && !state.voteAccount.equals(voteAccount)) throw poolError(SinglePoolError.InvalidPoolAccount);
  return state;
}

/**
 * Parse a vote account owned by the vote program
 */
export function loadVoteAccount(vote: AccountInfo): VoteStateHeader {
  if (!vote.isOwnedBy(VoteProgram.programId)) throw poolError(SinglePoolError.InvalidValidator);
  const result = decodeVoteState(vote.data);
  if (!result.ok) {
    throw poolError(
      result.reason === "legacy" ? SinglePoolError.LegacyVoteAccount : SinglePoolError.UnparseableVoteAccount
    );
  }
  return result.vote;
}

/**
 * Signer seeds of a pool sibling address
 */
export function poolSignerSeeds(seed: Buffer, pool: PublicKey, bump: number): SignerSeeds {
  return [seed, pool.toBuffer(), Buffer.from([bump])];
}
