import { PublicKey, StakeProgram } from "@solana/web3.js";
import { MINT_SIZE, TOKEN_PROGRAM_ID } from "@solana/spl-token";
import { PROGRAM_IDS, SEEDS } from "../config.js";
import { SinglePoolError, poolError } from "../errors.js";
import { STAKE_STATE_SIZE, stakeStatus } from "../interfaces/stake.js";
import type { AccountInfo, InvokeContext, Program } from "../runtime/invoke.js";
import { createPdaAccount } from "../runtime/pda.js";
import {
  checkMetadataProgram,
  checkMplMetadataAddress,
  checkPoolAddress,
  checkPoolMintAddress,
  checkPoolMintAuthorityAddress,
  checkPoolMplAuthorityAddress,
  checkPoolOnRampAddress,
  checkPoolStakeAddress,
  checkPoolStakeAuthorityAddress,
  checkStakeProgram,
  checkSystemProgram,
  checkTokenProgram,
  loadPool,
  loadVoteAccount,
  poolSignerSeeds,
} from "./accounts.js";
import {
  findPoolMintAddress,
  findPoolMplAuthorityAddressAndBump,
  findPoolOnRampAddress,
  findPoolStakeAddress,
} from "./addresses.js";
import { SinglePoolInstructionType, decodeSinglePoolInstruction } from "./instruction.js";
import { calculateDepositAmount, calculateWithdrawAmount, checkedAdd, checkedSub, poolValue } from "./math.js";
import { createPoolMetadata, defaultPoolMetadata, updatePoolMetadata } from "./metadata.js";
import {
  authorizeStake,
  delegateStake,
  getMinimumDelegation,
  getPoolMinimumBalance,
  initializeStake,
  mergeStake,
  moveStakeLamports,
  readActivePoolStake,
  readDelegatedStake,
  readInitializedStake,
  moveStake,
  splitStake,
  withdrawStake,
} from "./stake.js";
import { burnPoolTokens, initializePoolMint, mintPoolTokens, readMintSupply } from "./token.js";
import { POOL_ACCOUNT_SIZE, SinglePool, SinglePoolAccountType, encodePool } from "./state.js";

/**
 * The single-validator stake pool program.
 */
export class SinglePoolProcessor implements Program {
  readonly name = "single-pool";

  constructor(readonly programId: PublicKey = PROGRAM_IDS.SINGLE_POOL) {}

  process(ctx: InvokeContext): void {
    const instruction = decodeSinglePoolInstruction(ctx.data);
    switch (instruction.type) {
      case SinglePoolInstructionType.InitializePool:
        ctx.log("Instruction: InitializePool");
        return this.processInitializePool(ctx);
      case SinglePoolInstructionType.ReplenishPool:
        ctx.log("Instruction: ReplenishPool");
        return this.processReplenishPool(ctx);
      case SinglePoolInstructionType.DepositStake:
        ctx.log("Instruction: DepositStake");
        return this.processDepositStake(ctx);
      case SinglePoolInstructionType.WithdrawStake:
        ctx.log("Instruction: WithdrawStake");
        return this.processWithdrawStake(ctx, instruction.userStakeAuthority, instruction.tokenAmount);
      case SinglePoolInstructionType.CreateTokenMetadata:
        ctx.log("Instruction: CreateTokenMetadata");
        return this.processCreateTokenMetadata(ctx);
      case SinglePoolInstructionType.UpdateTokenMetadata:
        ctx.log("Instruction: UpdateTokenMetadata");
        return this.processUpdateTokenMetadata(ctx, {
          name: instruction.name,
          symbol: instruction.symbol,
          uri: instruction.uri,
        });
    }
  }

  // ============================================================================
  // INITIALIZE
  // ============================================================================

  private processInitializePool(ctx: InvokeContext): void {
    ctx.requireAccounts(14);
    const vote = ctx.account(0);
    const pool = ctx.account(1);
    const poolStake = ctx.account(2);
    const onRamp = ctx.account(3);
    const mint = ctx.account(4);
    const stakeAuthority = ctx.account(5);
    const mintAuthority = ctx.account(6);
    checkSystemProgram(ctx.account(11));
    checkTokenProgram(ctx.account(12));
    checkStakeProgram(ctx.account(13));

    loadVoteAccount(vote);
    const programId = this.programId;
    const poolBump = checkPoolAddress(programId, vote.key, pool);
    const stakeBump = checkPoolStakeAddress(programId, pool.key, poolStake);
    const onRampBump = checkPoolOnRampAddress(programId, pool.key, onRamp);
    const mintBump = checkPoolMintAddress(programId, pool.key, mint);
    const stakeAuthorityBump = checkPoolStakeAuthorityAddress(programId, pool.key, stakeAuthority);
    const mintAuthorityBump = checkPoolMintAuthorityAddress(programId, pool.key, mintAuthority);
    const [, mplAuthorityBump] = findPoolMplAuthorityAddressAndBump(programId, pool.key);

    if (!pool.dataIsEmpty || pool.isOwnedBy(programId)) {
      throw poolError(SinglePoolError.PoolAlreadyInitialized);
    }

    const minimumBalance = getPoolMinimumBalance(ctx);
    const stakeRent = ctx.rent.minimumBalance(STAKE_STATE_SIZE);
    if (
      pool.lamports < ctx.rent.minimumBalance(POOL_ACCOUNT_SIZE) ||
      mint.lamports < ctx.rent.minimumBalance(MINT_SIZE) ||
      onRamp.lamports < stakeRent ||
      poolStake.lamports < checkedAdd(stakeRent, minimumBalance)
    ) {
      throw poolError(SinglePoolError.WrongRentAmount);
    }

    // pool record
    createPdaAccount(ctx, {
      account: pool,
      space: POOL_ACCOUNT_SIZE,
      owner: programId,
      seeds: [SEEDS.POOL, vote.key.toBuffer(), Buffer.from([poolBump])],
    });
    const record: SinglePool = {
      accountType: SinglePoolAccountType.Pool,
      voteAccount: vote.key,
      bumps: {
        pool: poolBump,
        stake: stakeBump,
        mint: mintBump,
        stakeAuthority: stakeAuthorityBump,
        mintAuthority: mintAuthorityBump,
        mplAuthority: mplAuthorityBump,
        onRamp: onRampBump,
      },
      metadataAttached: false,
    };
    encodePool(record).copy(pool.data);

    // mint
    createPdaAccount(ctx, {
      account: mint,
      space: MINT_SIZE,
      owner: TOKEN_PROGRAM_ID,
      seeds: poolSignerSeeds(SEEDS.POOL_MINT, pool.key, mintBump),
    });
    initializePoolMint(ctx, mint.key, mintAuthority.key);

    // stake, delegated to the validator
    createPdaAccount(ctx, {
      account: poolStake,
      space: STAKE_STATE_SIZE,
      owner: StakeProgram.programId,
      seeds: poolSignerSeeds(SEEDS.POOL_STAKE, pool.key, stakeBump),
    });
    initializeStake(ctx, poolStake.key, stakeAuthority.key);
    delegateStake(ctx, {
      stake: poolStake.key,
      vote: vote.key,
      authority: stakeAuthority.key,
      seeds: poolSignerSeeds(SEEDS.POOL_STAKE_AUTHORITY, pool.key, stakeAuthorityBump),
    });

    // onramp, initialized but not delegated
    createPdaAccount(ctx, {
      account: onRamp,
      space: STAKE_STATE_SIZE,
      owner: StakeProgram.programId,
      seeds: poolSignerSeeds(SEEDS.POOL_ONRAMP, pool.key, onRampBump),
    });
    initializeStake(ctx, onRamp.key, stakeAuthority.key);

    ctx.log(`Initialized pool ${pool.key.toBase58()} for vote account ${vote.key.toBase58()}`);
  }

  // ============================================================================
  // REPLENISH
  // ============================================================================

  private processReplenishPool(ctx: InvokeContext): void {
    ctx.requireAccounts(9);
    const vote = ctx.account(0);
    const pool = ctx.account(1);
    const poolStake = ctx.account(2);
    const onRamp = ctx.account(3);
    const stakeAuthority = ctx.account(4);
    checkStakeProgram(ctx.account(8));

    const programId = this.programId;
    const state = loadPool(programId, pool, vote.key);
    checkPoolStakeAddress(programId, pool.key, poolStake);
    checkPoolOnRampAddress(programId, pool.key, onRamp);
    checkPoolStakeAuthorityAddress(programId, pool.key, stakeAuthority);
    const authoritySeeds = poolSignerSeeds(SEEDS.POOL_STAKE_AUTHORITY, pool.key, state.bumps.stakeAuthority);

    const delegate = (stake: PublicKey): void =>
      delegateStake(ctx, { stake, vote: vote.key, authority: stakeAuthority.key, seeds: authoritySeeds });

    let onRampState = readInitializedStake(onRamp);
    if (!onRampState) throw poolError(SinglePoolError.OnRampDoesntExist);

    const stake = readDelegatedStake(poolStake);
    if (!stake) throw poolError(SinglePoolError.WrongStakeState);

    const epoch = ctx.clock.epoch;
    const status = stakeStatus(stake.delegation, epoch);
    if (status === "inactive" || status === "deactivating") {
      ctx.log(`Pool stake is ${status}, delegating it again`);
      delegate(poolStake.key);
      return;
    }
    if (status === "activating") {
      ctx.log("Pool stake is activating, nothing to replenish");
      return;
    }

    let replenished = false;

    // onramp stake that finished activating joins the pool stake
    if (onRampState.kind === "stake") {
      const onRampStatus = stakeStatus(onRampState.delegation, epoch);
      if (onRampStatus === "deactivating") {
        ctx.log("Onramp stake is deactivating, delegating it again");
        delegate(onRamp.key);
        replenished = true;
      } else if (onRampStatus === "active") {
        const moved = onRampState.delegation.stake;
        moveStake(ctx, {
          source: onRamp.key,
          destination: poolStake.key,
          authority: stakeAuthority.key,
          lamports: moved,
          seeds: authoritySeeds,
        });
        ctx.log(`Moved ${moved} lamports of active onramp stake into the pool`);
        replenished = true;
      }
    }

    // lamports sitting in the pool stake above its delegation go to the onramp
    const poolStakeNow = readActivePoolStake(ctx, poolStake);
    const locked = checkedAdd(poolStakeNow.delegation.stake, poolStakeNow.meta.rentExemptReserve);
    const excess = checkedSub(poolStake.lamports, locked);
    if (excess > 0n) {
      moveStakeLamports(ctx, {
        source: poolStake.key,
        destination: onRamp.key,
        authority: stakeAuthority.key,
        lamports: excess,
        seeds: authoritySeeds,
      });
      ctx.log(`Moved ${excess} excess lamports to the onramp`);
      replenished = true;
    }

    // undelegated onramp lamports start activating; they count toward the pool once they move in
    onRampState = readInitializedStake(onRamp);
    if (!onRampState) throw poolError(SinglePoolError.OnRampDoesntExist);
    const onRampStatus = onRampState.kind === "stake" ? stakeStatus(onRampState.delegation, epoch) : "inactive";
    const onRampDelegable = checkedSub(onRamp.lamports, onRampState.meta.rentExemptReserve);
    const onRampDelegated =
      onRampState.kind === "stake" && onRampStatus !== "inactive" ? onRampState.delegation.stake : 0n;
    if (
      (onRampStatus === "inactive" || onRampStatus === "activating") &&
      onRampDelegable > onRampDelegated &&
      onRampDelegable >= getMinimumDelegation(ctx)
    ) {
      delegate(onRamp.key);
      ctx.log(`Delegated ${onRampDelegable} lamports in the onramp`);
      replenished = true;
    }

    if (!replenished) ctx.log("No excess lamports to delegate");
  }

  // ============================================================================
  // DEPOSIT
  // ============================================================================

  private processDepositStake(ctx: InvokeContext): void {
    ctx.requireAccounts(13);
    const pool = ctx.account(0);
    const poolStake = ctx.account(1);
    const mint = ctx.account(2);
    const stakeAuthority = ctx.account(3);
    const mintAuthority = ctx.account(4);
    const userStake = ctx.account(5);
    const userTokenAccount = ctx.account(6);
    const userLamportAccount = ctx.account(7);
    const userStakeAuthority = ctx.account(8);
    checkTokenProgram(ctx.account(11));
    checkStakeProgram(ctx.account(12));

    const programId = this.programId;
    const state = loadPool(programId, pool);
    checkPoolStakeAddress(programId, pool.key, poolStake);
    checkPoolMintAddress(programId, pool.key, mint);
    checkPoolStakeAuthorityAddress(programId, pool.key, stakeAuthority);
    checkPoolMintAuthorityAddress(programId, pool.key, mintAuthority);
    this.checkNotPoolOwnedStake(pool.key, userStake);

    const poolStakeBefore = readActivePoolStake(ctx, poolStake);
    const epoch = ctx.clock.epoch;

    const deposit = readDelegatedStake(userStake);
    if (!deposit) throw poolError(SinglePoolError.StakeNotFullyActive);
    if (!deposit.delegation.voter.equals(state.voteAccount)) throw poolError(SinglePoolError.WrongValidator);
    if (stakeStatus(deposit.delegation, epoch) !== "active") throw poolError(SinglePoolError.StakeNotFullyActive);

    const minimumBalance = getPoolMinimumBalance(ctx);
    const supply = readMintSupply(mint);
    const value = poolValue(poolStakeBefore.delegation.stake, minimumBalance);
    const stakeToDeposit = deposit.delegation.stake;
    const tokensToMint = calculateDepositAmount(supply, value, stakeToDeposit);
    if (tokensToMint === 0n) throw poolError(SinglePoolError.DepositTooSmall);

    const stakeAuthoritySeeds = poolSignerSeeds(SEEDS.POOL_STAKE_AUTHORITY, pool.key, state.bumps.stakeAuthority);
    const needsAuthorize =
      !deposit.meta.staker.equals(stakeAuthority.key) || !deposit.meta.withdrawer.equals(stakeAuthority.key);
    if (needsAuthorize) {
      if (!userStakeAuthority.isSigner) throw poolError(SinglePoolError.SignatureMissing);
      authorizeStake(ctx, {
        stake: userStake.key,
        authority: userStakeAuthority.key,
        newAuthority: stakeAuthority.key,
      });
    }

    const lamportsBefore = poolStake.lamports;
    mergeStake(ctx, {
      destination: poolStake.key,
      source: userStake.key,
      authority: stakeAuthority.key,
      seeds: stakeAuthoritySeeds,
    });

    const poolStakeAfter = readActivePoolStake(ctx, poolStake);
    const stakeAdded = checkedSub(poolStakeAfter.delegation.stake, poolStakeBefore.delegation.stake);
    if (stakeAdded !== stakeToDeposit) throw poolError(SinglePoolError.UnexpectedMathError);

    // rent reserve and loose lamports of the merged account go back to the user
    const lamportsAdded = checkedSub(poolStake.lamports, lamportsBefore);
    const refund = checkedSub(lamportsAdded, stakeAdded);
    if (refund > 0n) {
      withdrawStake(ctx, {
        stake: poolStake.key,
        recipient: userLamportAccount.key,
        authority: stakeAuthority.key,
        lamports: refund,
        seeds: stakeAuthoritySeeds,
      });
    }

    mintPoolTokens(ctx, {
      mint: mint.key,
      destination: userTokenAccount.key,
      authority: mintAuthority.key,
      amount: tokensToMint,
      seeds: poolSignerSeeds(SEEDS.POOL_MINT_AUTHORITY, pool.key, state.bumps.mintAuthority),
    });
    ctx.log(`Deposited ${stakeAdded} lamports of stake for ${tokensToMint} pool tokens`);
  }

  // ============================================================================
  // WITHDRAW
  // ============================================================================

  private processWithdrawStake(ctx: InvokeContext, userStakeAuthority: PublicKey, tokenAmount: bigint): void {
    ctx.requireAccounts(10);
    const pool = ctx.account(0);
    const poolStake = ctx.account(1);
    const mint = ctx.account(2);
    const stakeAuthority = ctx.account(3);
    const mintAuthority = ctx.account(4);
    const userStake = ctx.account(5);
    const userTokenAccount = ctx.account(6);
    checkTokenProgram(ctx.account(8));
    checkStakeProgram(ctx.account(9));

    const programId = this.programId;
    const state = loadPool(programId, pool);
    checkPoolStakeAddress(programId, pool.key, poolStake);
    checkPoolMintAddress(programId, pool.key, mint);
    checkPoolStakeAuthorityAddress(programId, pool.key, stakeAuthority);
    checkPoolMintAuthorityAddress(programId, pool.key, mintAuthority);
    this.checkNotPoolOwnedStake(pool.key, userStake);

    const poolStakeState = readActivePoolStake(ctx, poolStake);
    const minimumDelegation = getMinimumDelegation(ctx);
    const minimumBalance = getPoolMinimumBalance(ctx);
    const supply = readMintSupply(mint);
    const value = poolValue(poolStakeState.delegation.stake, minimumBalance);

    const withdrawLamports = calculateWithdrawAmount(supply, value, tokenAmount);
    if (withdrawLamports === 0n) throw poolError(SinglePoolError.WithdrawalTooSmall);
    if (withdrawLamports > value) throw poolError(SinglePoolError.PoolWouldBeUndersized);

    const stakeRent = ctx.rent.minimumBalance(STAKE_STATE_SIZE);
    if (checkedAdd(userStake.lamports, withdrawLamports) < checkedAdd(stakeRent, minimumDelegation)) {
      throw poolError(SinglePoolError.InsufficientWithdrawAmount);
    }

    const stakeAuthoritySeeds = poolSignerSeeds(SEEDS.POOL_STAKE_AUTHORITY, pool.key, state.bumps.stakeAuthority);
    burnPoolTokens(ctx, {
      account: userTokenAccount.key,
      mint: mint.key,
      authority: mintAuthority.key,
      amount: tokenAmount,
      seeds: poolSignerSeeds(SEEDS.POOL_MINT_AUTHORITY, pool.key, state.bumps.mintAuthority),
    });
    splitStake(ctx, {
      source: poolStake.key,
      destination: userStake.key,
      authority: stakeAuthority.key,
      lamports: withdrawLamports,
      seeds: stakeAuthoritySeeds,
    });
    authorizeStake(ctx, {
      stake: userStake.key,
      authority: stakeAuthority.key,
      newAuthority: userStakeAuthority,
      seeds: stakeAuthoritySeeds,
    });
    ctx.log(`Withdrew ${withdrawLamports} lamports of stake for ${tokenAmount} pool tokens`);
  }

  // ============================================================================
  // METADATA
  // ============================================================================

  private processCreateTokenMetadata(ctx: InvokeContext): void {
    ctx.requireAccounts(8);
    const pool = ctx.account(0);
    const mint = ctx.account(1);
    const mintAuthority = ctx.account(2);
    const mplAuthority = ctx.account(3);
    const payer = ctx.account(4);
    const metadata = ctx.account(5);
    checkMetadataProgram(ctx.account(6));
    checkSystemProgram(ctx.account(7));

    const programId = this.programId;
    const state = loadPool(programId, pool);
    checkPoolMintAddress(programId, pool.key, mint);
    checkPoolMintAuthorityAddress(programId, pool.key, mintAuthority);
    checkPoolMplAuthorityAddress(programId, pool.key, mplAuthority);
    checkMplMetadataAddress(mint.key, metadata);
    if (!payer.isSigner) throw poolError(SinglePoolError.SignatureMissing);

    createPoolMetadata(ctx, {
      metadata: metadata.key,
      mint: mint.key,
      mintAuthority: mintAuthority.key,
      mplAuthority: mplAuthority.key,
      payer: payer.key,
      fields: defaultPoolMetadata(state.voteAccount),
      mintAuthoritySeeds: poolSignerSeeds(SEEDS.POOL_MINT_AUTHORITY, pool.key, state.bumps.mintAuthority),
    });

    encodePool({ ...state, metadataAttached: true }).copy(pool.data);
  }

  private processUpdateTokenMetadata(
    ctx: InvokeContext,
    fields: { name: string; symbol: string; uri: string }
  ): void {
    ctx.requireAccounts(6);
    const vote = ctx.account(0);
    const pool = ctx.account(1);
    const mplAuthority = ctx.account(2);
    const authorizedWithdrawer = ctx.account(3);
    const metadata = ctx.account(4);
    checkMetadataProgram(ctx.account(5));

    const programId = this.programId;
    const state = loadPool(programId, pool, vote.key);
    checkPoolMplAuthorityAddress(programId, pool.key, mplAuthority);
    checkMplMetadataAddress(findPoolMintAddress(programId, pool.key), metadata);

    const voteState = loadVoteAccount(vote);
    if (!voteState.authorizedWithdrawer.equals(authorizedWithdrawer.key)) {
      throw poolError(SinglePoolError.InvalidMetadataSigner);
    }
    if (!authorizedWithdrawer.isSigner) throw poolError(SinglePoolError.SignatureMissing);

    updatePoolMetadata(ctx, {
      metadata: metadata.key,
      mplAuthority: mplAuthority.key,
      fields,
      mplAuthoritySeeds: poolSignerSeeds(SEEDS.POOL_MPL_AUTHORITY, pool.key, state.bumps.mplAuthority),
    });
  }

  /** User stake accounts can never be the pool's own stake or onramp */
  private checkNotPoolOwnedStake(pool: PublicKey, userStake: AccountInfo): void {
    const poolStake = findPoolStakeAddress(this.programId, pool);
    const onRamp = findPoolOnRampAddress(this.programId, pool);
    if (userStake.key.equals(poolStake) || userStake.key.equals(onRamp)) {
      throw poolError(SinglePoolError.InvalidPoolStakeAccountUsage);
    }
  }
}
