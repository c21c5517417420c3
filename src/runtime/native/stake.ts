import { PublicKey, StakeInstruction, StakeProgram, VoteProgram } from "@solana/web3.js";
import { U64_MAX } from "../../config.js";
import {
  DEFAULT_LOCKUP,
  DEFAULT_WARMUP_COOLDOWN_RATE,
  Delegation,
  STAKE_STATE_SIZE,
  StakeInstructionIndex,
  StakeLockup,
  StakeMeta,
  StakeState,
  StakeStatus,
  decodeStakeState,
  encodeStakeState,
  lockedLamports,
  stakeStatus,
  stateStatus,
} from "../../interfaces/stake.js";
import { EpochCredits, decodeEpochCredits } from "../../interfaces/vote.js";
import { u64ToBytes } from "../../utils/bytes.js";
import { NativeProgramError } from "../errors.js";
import { AccountInfo, InvokeContext, Program } from "../invoke.js";

function fail(reason: string, detail?: string): NativeProgramError {
  return new NativeProgramError("stake", reason, detail);
}

function find(ctx: InvokeContext, key: PublicKey): AccountInfo {
  const account = ctx.accounts.find((info) => info.key.equals(key));
  if (!account) throw fail("NotEnoughAccountKeys", key.toBase58());
  return account;
}

function requireSigner(ctx: InvokeContext, key: PublicKey): void {
  if (!ctx.isSigner(key)) throw fail("MissingRequiredSignature", key.toBase58());
}

function load(account: AccountInfo): StakeState {
  if (!account.isOwnedBy(StakeProgram.programId)) throw fail("InvalidAccountOwner", account.key.toBase58());
  const state = decodeStakeState(account.data);
  if (!state) throw fail("InvalidAccountData", account.key.toBase58());
  return state;
}

function loadMeta(account: AccountInfo): { state: Exclude<StakeState, { kind: "uninitialized" }>; meta: StakeMeta } {
  const state = load(account);
  if (state.kind === "uninitialized") throw fail("InvalidAccountData", `${account.key.toBase58()} is uninitialized`);
  return { state, meta: state.meta };
}

function save(account: AccountInfo, state: StakeState): void {
  encodeStakeState(state, account.data);
}

function lockupsEqual(a: StakeLockup, b: StakeLockup): boolean {
  return a.unixTimestamp === b.unixTimestamp && a.epoch === b.epoch && a.custodian.equals(b.custodian);
}

function metasMergeable(a: StakeMeta, b: StakeMeta): boolean {
  return a.staker.equals(b.staker) && a.withdrawer.equals(b.withdrawer) && lockupsEqual(a.lockup, b.lockup);
}

function newDelegation(voter: PublicKey, stake: bigint, epoch: bigint): Delegation {
  return {
    voter,
    stake,
    activationEpoch: epoch,
    deactivationEpoch: U64_MAX,
    warmupCooldownRate: DEFAULT_WARMUP_COOLDOWN_RATE,
  };
}

/** Epochs without credits after which a vote account counts as delinquent */
export const MINIMUM_DELINQUENT_EPOCHS_FOR_DEACTIVATION = 5n;

/** Amount argument of Split, Withdraw, MoveStake and MoveLamports */
function amountArgument(ctx: InvokeContext): bigint {
  if (ctx.data.length < 12) throw fail("InvalidInstructionData", "missing amount");
  return ctx.data.readBigUInt64LE(4);
}

function voteCredits(account: AccountInfo): EpochCredits[] {
  if (!account.isOwnedBy(VoteProgram.programId)) throw fail("IncorrectProgramId", account.key.toBase58());
  const credits = decodeEpochCredits(account.data);
  if (!credits) throw fail("InvalidAccountData", account.key.toBase58());
  return credits;
}

/** The reference validator must have credits in each of the most recent epochs, the current one included */
function acceptableReferenceCredits(credits: readonly EpochCredits[], epoch: bigint): boolean {
  const window = Number(MINIMUM_DELINQUENT_EPOCHS_FOR_DEACTIVATION);
  if (credits.length < window) return false;
  return credits
    .slice(-window)
    .reverse()
    .every((entry, i) => entry.epoch === epoch - BigInt(i));
}

function delinquentAt(credits: readonly EpochCredits[], epoch: bigint): boolean {
  const last = credits[credits.length - 1];
  if (!last) return true;
  return epoch >= MINIMUM_DELINQUENT_EPOCHS_FOR_DEACTIVATION && last.epoch <= epoch - MINIMUM_DELINQUENT_EPOCHS_FOR_DEACTIVATION;
}

/** Merge classification; deactivating stake cannot merge */
function mergeKind(state: StakeState, epoch: bigint): Exclude<StakeStatus, "deactivating"> {
  const status = stateStatus(state, epoch);
  if (status === "deactivating") throw fail("MergeTransientStake");
  return status;
}

/**
 * Native stake program: the operations a stake pool drives, with
 * activation completing at the first epoch boundary.
 */
export class StakeProgramStandIn implements Program {
  readonly programId = StakeProgram.programId;
  readonly name = "stake";

  process(ctx: InvokeContext): void {
    const instruction = ctx.instruction;
    if (instruction.data.length < 4) throw fail("InvalidInstructionData");

    switch (instruction.data.readUInt32LE(0)) {
      case StakeInstructionIndex.GetMinimumDelegation:
        ctx.setReturnData(Buffer.from(u64ToBytes(ctx.minimumDelegation)));
        return;
      case StakeInstructionIndex.DeactivateDelinquent:
        this.deactivateDelinquent(ctx);
        return;
      case StakeInstructionIndex.MoveStake:
        this.moveStake(ctx);
        return;
      case StakeInstructionIndex.MoveLamports:
        this.moveLamports(ctx);
        return;
    }

    const type = StakeInstruction.decodeInstructionType(instruction);
    switch (type) {
      case "Initialize":
        return this.initialize(ctx);
      case "Authorize":
        return this.authorize(ctx);
      case "Delegate":
        return this.delegate(ctx);
      case "Split":
        return this.split(ctx);
      case "Merge":
        return this.merge(ctx);
      case "Withdraw":
        return this.withdraw(ctx);
      case "Deactivate":
        return this.deactivate(ctx);
      default:
        throw fail("InvalidInstructionData", `unsupported instruction ${type}`);
    }
  }

  private initialize(ctx: InvokeContext): void {
    const params = StakeInstruction.decodeInitialize(ctx.instruction);
    const account = find(ctx, params.stakePubkey);
    if (load(account).kind !== "uninitialized" || account.data.length !== STAKE_STATE_SIZE) {
      throw fail("InvalidAccountData", account.key.toBase58());
    }
    const rentExemptReserve = ctx.rent.minimumBalance(account.data.length);
    if (account.lamports < rentExemptReserve) throw fail("InsufficientFunds", "below rent-exempt reserve");

    const lockup: StakeLockup = params.lockup
      ? {
          unixTimestamp: BigInt(params.lockup.unixTimestamp),
          epoch: BigInt(params.lockup.epoch),
          custodian: params.lockup.custodian,
        }
      : DEFAULT_LOCKUP;

    save(account, {
      kind: "initialized",
      meta: {
        rentExemptReserve,
        staker: params.authorized.staker,
        withdrawer: params.authorized.withdrawer,
        lockup,
      },
    });
  }

  private authorize(ctx: InvokeContext): void {
    const params = StakeInstruction.decodeAuthorize(ctx.instruction);
    const account = find(ctx, params.stakePubkey);
    const { state, meta } = loadMeta(account);

    let updated: StakeMeta;
    if (params.stakeAuthorizationType.index === 0) {
      if (!ctx.isSigner(meta.staker) && !ctx.isSigner(meta.withdrawer)) {
        throw fail("MissingRequiredSignature", "staker or withdrawer");
      }
      updated = { ...meta, staker: params.newAuthorizedPubkey };
    } else if (params.stakeAuthorizationType.index === 1) {
      requireSigner(ctx, meta.withdrawer);
      updated = { ...meta, withdrawer: params.newAuthorizedPubkey };
    } else {
      throw fail("InvalidInstructionData", "unknown authorization type");
    }

    save(account, { ...state, meta: updated });
  }

  private delegate(ctx: InvokeContext): void {
    const params = StakeInstruction.decodeDelegate(ctx.instruction);
    const account = find(ctx, params.stakePubkey);
    const vote = find(ctx, params.votePubkey);
    if (!vote.isOwnedBy(VoteProgram.programId)) throw fail("IncorrectProgramId", vote.key.toBase58());

    const { state, meta } = loadMeta(account);
    requireSigner(ctx, meta.staker);

    const epoch = ctx.clock.epoch;
    const delegable = account.lamports - meta.rentExemptReserve;
    if (delegable < ctx.minimumDelegation) throw fail("InsufficientDelegation", `${delegable}`);

    if (state.kind === "stake") {
      const status = stakeStatus(state.delegation, epoch);
      if (status === "active") throw fail("TooSoonToRedelegate", "stake is active");
      if (status === "deactivating") {
        if (!state.delegation.voter.equals(vote.key)) {
          throw fail("TooSoonToRedelegate", "stake is deactivating from another vote account");
        }
        // Delegating to the same validator in the deactivation epoch cancels the deactivation
        save(account, { ...state, delegation: { ...state.delegation, deactivationEpoch: U64_MAX } });
        return;
      }
    }

    // No effective stake yet: (re)delegate everything above the reserve
    save(account, {
      kind: "stake",
      meta,
      delegation: newDelegation(vote.key, delegable, epoch),
      creditsObserved: state.kind === "stake" ? state.creditsObserved : 0n,
      flags: 0,
    });
  }

  private split(ctx: InvokeContext): void {
    const params = StakeInstruction.decodeSplit(ctx.instruction);
    const lamports = amountArgument(ctx);
    const source = find(ctx, params.stakePubkey);
    const destination = find(ctx, params.splitStakePubkey);
    if (source.key.equals(destination.key)) throw fail("InvalidArgument", "split into self");

    const { state, meta } = loadMeta(source);
    requireSigner(ctx, meta.staker);

    if (load(destination).kind !== "uninitialized" || destination.data.length !== STAKE_STATE_SIZE) {
      throw fail("InvalidAccountData", destination.key.toBase58());
    }
    if (lamports === 0n || lamports > source.lamports) throw fail("InsufficientFunds", `${lamports}`);

    const destinationReserve = ctx.rent.minimumBalance(destination.data.length);
    const destinationMeta: StakeMeta = { ...meta, rentExemptReserve: destinationReserve };
    const shortfall = destinationReserve > destination.lamports ? destinationReserve - destination.lamports : 0n;
    const fullSplit = lamports === source.lamports;
    const remaining = source.lamports - lamports;

    if (state.kind === "initialized") {
      if (!fullSplit && remaining < meta.rentExemptReserve) throw fail("InsufficientFunds", "source below reserve");
      if (lamports < shortfall) throw fail("InsufficientFunds", "destination below reserve");
      save(destination, { kind: "initialized", meta: destinationMeta });
    } else if (state.kind === "stake") {
      const delegation = state.delegation;
      const minimum = stakeStatus(delegation, ctx.clock.epoch) === "inactive" ? 0n : ctx.minimumDelegation;
      if (!fullSplit && remaining < meta.rentExemptReserve + minimum) {
        throw fail("InsufficientFunds", "source would fall below its minimum balance");
      }

      let sourceStakeDelta: bigint;
      let splitStake: bigint;
      if (fullSplit) {
        sourceStakeDelta = delegation.stake;
        splitStake = lamports - shortfall < delegation.stake ? lamports - shortfall : delegation.stake;
      } else {
        if (lamports > delegation.stake) throw fail("InsufficientStake", `${lamports} > ${delegation.stake}`);
        if (delegation.stake - lamports < minimum) throw fail("InsufficientDelegation", "source remainder");
        sourceStakeDelta = lamports;
        splitStake = lamports - shortfall;
      }
      if (splitStake < 0n || splitStake < minimum) throw fail("InsufficientDelegation", `split stake ${splitStake}`);

      save(source, { ...state, delegation: { ...delegation, stake: delegation.stake - sourceStakeDelta } });
      save(destination, {
        kind: "stake",
        meta: destinationMeta,
        delegation: { ...delegation, stake: splitStake },
        creditsObserved: state.creditsObserved,
        flags: state.flags,
      });
    }

    source.lamports -= lamports;
    destination.lamports += lamports;
  }

  private merge(ctx: InvokeContext): void {
    const params = StakeInstruction.decodeMerge(ctx.instruction);
    const destination = find(ctx, params.stakePubkey);
    const source = find(ctx, params.sourceStakePubKey);
    if (source.key.equals(destination.key)) throw fail("InvalidArgument", "merge with self");

    const target = loadMeta(destination);
    const merging = loadMeta(source);
    requireSigner(ctx, target.meta.staker);
    if (!metasMergeable(target.meta, merging.meta)) throw fail("MergeMismatch", "authorities or lockup differ");

    const epoch = ctx.clock.epoch;
    const destinationKind = mergeKind(target.state, epoch);
    const sourceKind = mergeKind(merging.state, epoch);
    const sourceLamports = source.lamports;
    let merged: StakeState = target.state;

    if (target.state.kind === "stake" && destinationKind !== "inactive") {
      const delegation = target.state.delegation;
      let added: bigint;

      if (merging.state.kind === "stake" && sourceKind === destinationKind) {
        const other = merging.state.delegation;
        if (!other.voter.equals(delegation.voter)) throw fail("MergeMismatch", "different vote accounts");
        if (destinationKind === "active") {
          added = other.stake;
        } else {
          if (other.activationEpoch !== delegation.activationEpoch) throw fail("MergeMismatch", "activation epochs");
          added = merging.meta.rentExemptReserve + other.stake;
        }
      } else if (destinationKind === "activating" && sourceKind === "inactive") {
        added = sourceLamports;
      } else {
        throw fail("MergeMismatch", `${destinationKind} <- ${sourceKind}`);
      }

      merged = { ...target.state, delegation: { ...delegation, stake: delegation.stake + added } };
    } else if (sourceKind === "active") {
      throw fail("MergeMismatch", `${destinationKind} <- ${sourceKind}`);
    }

    save(destination, merged);
    save(source, { kind: "uninitialized" });
    destination.lamports += sourceLamports;
    source.lamports = 0n;
  }

  private withdraw(ctx: InvokeContext): void {
    const params = StakeInstruction.decodeWithdraw(ctx.instruction);
    const lamports = amountArgument(ctx);
    const account = find(ctx, params.stakePubkey);
    const recipient = find(ctx, params.toPubkey);
    const state = load(account);

    if (state.kind === "uninitialized") {
      requireSigner(ctx, account.key);
    } else {
      requireSigner(ctx, state.meta.withdrawer);
    }

    const epoch = ctx.clock.epoch;
    const reserve = lockedLamports(state, epoch);
    if (lamports > account.lamports) throw fail("InsufficientFunds", `${lamports} > ${account.lamports}`);

    const fullWithdrawal = lamports === account.lamports;
    if (fullWithdrawal) {
      if (stateStatus(state, epoch) !== "inactive") throw fail("InsufficientFunds", "stake is still delegated");
      save(account, { kind: "uninitialized" });
    } else if (lamports + reserve > account.lamports) {
      throw fail("InsufficientFunds", `withdrawal would leave less than ${reserve}`);
    }

    account.lamports -= lamports;
    recipient.lamports += lamports;
  }

  private deactivate(ctx: InvokeContext): void {
    const params = StakeInstruction.decodeDeactivate(ctx.instruction);
    const account = find(ctx, params.stakePubkey);
    const state = load(account);
    if (state.kind !== "stake") throw fail("InvalidAccountData", "not delegated");
    requireSigner(ctx, state.meta.staker);
    if (state.delegation.deactivationEpoch !== U64_MAX) throw fail("AlreadyDeactivated");

    save(account, { ...state, delegation: { ...state.delegation, deactivationEpoch: ctx.clock.epoch } });
  }

  private deactivateDelinquent(ctx: InvokeContext): void {
    ctx.requireAccounts(3);
    const account = ctx.account(0);
    const delinquentVote = ctx.account(1);
    const referenceVote = ctx.account(2);
    const state = load(account);
    if (state.kind !== "stake") throw fail("InvalidAccountData", "not delegated");

    const epoch = ctx.clock.epoch;
    if (!acceptableReferenceCredits(voteCredits(referenceVote), epoch)) throw fail("InsufficientReferenceVotes");
    if (!state.delegation.voter.equals(delinquentVote.key)) throw fail("VoteAddressMismatch");
    if (!delinquentAt(voteCredits(delinquentVote), epoch)) {
      throw fail("MinimumDelinquentEpochsForDeactivationNotMet");
    }
    if (state.delegation.deactivationEpoch !== U64_MAX) throw fail("AlreadyDeactivated");

    save(account, { ...state, delegation: { ...state.delegation, deactivationEpoch: epoch } });
  }

  /**
   * Checks MoveStake and MoveLamports share: distinct accounts, the source
   * staker signing, and matching authorities and lockups
   */
  private loadMovePair(ctx: InvokeContext): {
    source: AccountInfo;
    destination: AccountInfo;
    from: { state: StakeState; meta: StakeMeta };
    to: { state: StakeState; meta: StakeMeta };
  } {
    ctx.requireAccounts(3);
    const source = ctx.account(0);
    const destination = ctx.account(1);
    const staker = ctx.account(2);
    if (source.key.equals(destination.key)) throw fail("InvalidInstructionData", "move to self");

    const from = loadMeta(source);
    const to = loadMeta(destination);
    if (!staker.key.equals(from.meta.staker)) throw fail("InvalidArgument", "staker mismatch");
    requireSigner(ctx, staker.key);
    if (!metasMergeable(from.meta, to.meta)) throw fail("MergeMismatch", "authorities or lockup differ");
    return { source, destination, from, to };
  }

  private moveStake(ctx: InvokeContext): void {
    const lamports = amountArgument(ctx);
    const { source, destination, from, to } = this.loadMovePair(ctx);
    const epoch = ctx.clock.epoch;

    if (from.state.kind !== "stake" || stakeStatus(from.state.delegation, epoch) !== "active") {
      throw fail("InvalidAccountData", "source is not fully active");
    }
    const delegation = from.state.delegation;
    if (lamports === 0n || lamports > delegation.stake) {
      throw fail("InvalidArgument", `cannot move ${lamports} of ${delegation.stake} stake`);
    }
    const sourceFinal = delegation.stake - lamports;
    if (sourceFinal !== 0n && sourceFinal < ctx.minimumDelegation) {
      throw fail("InvalidArgument", "source stake would fall below the minimum delegation");
    }

    const destinationStatus = mergeKind(to.state, epoch);
    let destinationState: StakeState;
    if (to.state.kind === "stake" && destinationStatus === "active") {
      if (!to.state.delegation.voter.equals(delegation.voter)) throw fail("VoteAddressMismatch");
      destinationState = {
        ...to.state,
        delegation: { ...to.state.delegation, stake: to.state.delegation.stake + lamports },
      };
    } else if (destinationStatus === "inactive") {
      if (lamports < ctx.minimumDelegation) {
        throw fail("InvalidArgument", "destination stake would fall below the minimum delegation");
      }
      destinationState = {
        kind: "stake",
        meta: to.meta,
        delegation: { ...delegation, stake: lamports },
        creditsObserved: from.state.creditsObserved,
        flags: 0,
      };
    } else {
      throw fail("InvalidAccountData", `destination is ${destinationStatus}`);
    }

    save(
      source,
      sourceFinal === 0n
        ? { kind: "initialized", meta: from.meta }
        : { ...from.state, delegation: { ...delegation, stake: sourceFinal } }
    );
    save(destination, destinationState);
    source.lamports -= lamports;
    destination.lamports += lamports;
  }

  private moveLamports(ctx: InvokeContext): void {
    const lamports = amountArgument(ctx);
    const { source, destination, from, to } = this.loadMovePair(ctx);

    const epoch = ctx.clock.epoch;
    const sourceStatus = stateStatus(from.state, epoch);
    if (sourceStatus === "activating" || sourceStatus === "deactivating") {
      throw fail("InvalidAccountData", `source is ${sourceStatus}`);
    }
    // Throws for a deactivating destination
    mergeKind(to.state, epoch);

    const free = source.lamports - lockedLamports(from.state, epoch);
    if (lamports === 0n || lamports > free) throw fail("InvalidArgument", `cannot move ${lamports} of ${free}`);

    source.lamports -= lamports;
    destination.lamports += lamports;
  }
}
