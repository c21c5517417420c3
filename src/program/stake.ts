import { Authorized, Lockup, PublicKey, StakeAuthorizationLayout, StakeProgram } from "@solana/web3.js";
import { SinglePoolError, poolError } from "../errors.js";
import {
  Delegation,
  StakeMeta,
  StakeState,
  decodeStakeState,
  getMinimumDelegationInstruction,
  lastInstruction,
  moveLamportsInstruction,
  moveStakeInstruction,
  splitInstruction,
  stakeStatus,
  withdrawInstruction,
} from "../interfaces/stake.js";
import type { AccountInfo, InvokeContext, SignerSeeds } from "../runtime/invoke.js";
import { minimumPoolBalance } from "./math.js";

// ============================================================================
// READING STAKE ACCOUNTS
// ============================================================================

export interface DelegatedStake {
  meta: StakeMeta;
  delegation: Delegation;
}

/**
 * Meta and delegation of a stake-program account, or null when the account
 * is not a delegated stake account
 */
export function readDelegatedStake(account: AccountInfo): DelegatedStake | null {
  if (!account.isOwnedBy(StakeProgram.programId)) return null;
  const state = decodeStakeState(account.data);
  if (!state || state.kind !== "stake") return null;
  return { meta: state.meta, delegation: state.delegation };
}

export type InitializedStakeState = Exclude<StakeState, { kind: "uninitialized" }>;

/** State of any initialized stake account, delegated or not */
export function readInitializedStake(account: AccountInfo): InitializedStakeState | null {
  if (!account.isOwnedBy(StakeProgram.programId)) return null;
  const state = decodeStakeState(account.data);
  if (!state || state.kind === "uninitialized") return null;
  return state;
}

/**
 * Pool stake, required to be delegated and fully active
 */
export function readActivePoolStake(ctx: InvokeContext, account: AccountInfo): DelegatedStake {
  const stake = readDelegatedStake(account);
  if (!stake || stakeStatus(stake.delegation, ctx.clock.epoch) !== "active") {
    throw poolError(SinglePoolError.WrongStakeState);
  }
  return stake;
}

// ============================================================================
// STAKE PROGRAM CALLS
// ============================================================================

export function getMinimumDelegation(ctx: InvokeContext): bigint {
  const returned = ctx.invoke(getMinimumDelegationInstruction());
  if (!returned || returned.length < 8) throw poolError(SinglePoolError.UnexpectedMathError);
  return returned.readBigUInt64LE(0);
}

export function getPoolMinimumBalance(ctx: InvokeContext): bigint {
  return minimumPoolBalance(getMinimumDelegation(ctx));
}

export function initializeStake(ctx: InvokeContext, stake: PublicKey, authority: PublicKey): void {
  ctx.invoke(
    StakeProgram.initialize({
      stakePubkey: stake,
      authorized: new Authorized(authority, authority),
      lockup: Lockup.default,
    })
  );
}

export function delegateStake(
  ctx: InvokeContext,
  params: { stake: PublicKey; vote: PublicKey; authority: PublicKey; seeds: SignerSeeds }
): void {
  const transaction = StakeProgram.delegate({
    stakePubkey: params.stake,
    authorizedPubkey: params.authority,
    votePubkey: params.vote,
  });
  ctx.invoke(lastInstruction(transaction), [params.seeds]);
}

/**
 * Hand both the staker and withdrawer roles of `stake` to `newAuthority`
 */
export function authorizeStake(
  ctx: InvokeContext,
  params: { stake: PublicKey; authority: PublicKey; newAuthority: PublicKey; seeds?: SignerSeeds }
): void {
  const signers = params.seeds ? [params.seeds] : [];
  for (const stakeAuthorizationType of [StakeAuthorizationLayout.Staker, StakeAuthorizationLayout.Withdrawer]) {
    const transaction = StakeProgram.authorize({
      stakePubkey: params.stake,
      authorizedPubkey: params.authority,
      newAuthorizedPubkey: params.newAuthority,
      stakeAuthorizationType,
    });
    ctx.invoke(lastInstruction(transaction), signers);
  }
}

export function mergeStake(
  ctx: InvokeContext,
  params: { destination: PublicKey; source: PublicKey; authority: PublicKey; seeds: SignerSeeds }
): void {
  const transaction = StakeProgram.merge({
    stakePubkey: params.destination,
    sourceStakePubKey: params.source,
    authorizedPubkey: params.authority,
  });
  ctx.invoke(lastInstruction(transaction), [params.seeds]);
}

export function splitStake(
  ctx: InvokeContext,
  params: { source: PublicKey; destination: PublicKey; authority: PublicKey; lamports: bigint; seeds: SignerSeeds }
): void {
  ctx.invoke(
    splitInstruction({
      stake: params.source,
      splitStake: params.destination,
      staker: params.authority,
      lamports: params.lamports,
    }),
    [params.seeds]
  );
}

export function withdrawStake(
  ctx: InvokeContext,
  params: { stake: PublicKey; recipient: PublicKey; authority: PublicKey; lamports: bigint; seeds: SignerSeeds }
): void {
  ctx.invoke(
    withdrawInstruction({
      stake: params.stake,
      to: params.recipient,
      withdrawer: params.authority,
      lamports: params.lamports,
    }),
    [params.seeds]
  );
}

export function moveStakeLamports(
  ctx: InvokeContext,
  params: { source: PublicKey; destination: PublicKey; authority: PublicKey; lamports: bigint; seeds: SignerSeeds }
): void {
  ctx.invoke(
    moveLamportsInstruction({
      sourceStake: params.source,
      destinationStake: params.destination,
      staker: params.authority,
      lamports: params.lamports,
    }),
    [params.seeds]
  );
}

/**
 * Move active stake, and the lamports backing it, between two stake
 * accounts delegated to the same validator
 */
export function moveStake(
  ctx: InvokeContext,
  params: { source: PublicKey; destination: PublicKey; authority: PublicKey; lamports: bigint; seeds: SignerSeeds }
): void {
  ctx.invoke(
    moveStakeInstruction({
      sourceStake: params.source,
      destinationStake: params.destination,
      staker: params.authority,
      lamports: params.lamports,
    }),
    [params.seeds]
  );
}
