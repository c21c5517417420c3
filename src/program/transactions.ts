import { Authorized, PublicKey, StakeProgram, SystemProgram, Transaction } from "@solana/web3.js";
import {
  MINT_SIZE,
  createApproveInstruction,
  createAssociatedTokenAccountIdempotentInstruction,
  getAssociatedTokenAddressSync,
} from "@solana/spl-token";
import { PROGRAM_IDS } from "../config.js";
import { STAKE_STATE_SIZE, lastInstruction, toLamportsNumber } from "../interfaces/stake.js";
import { findDefaultDepositAccountAddressAndSeed, findPoolAddress, getPoolAddresses, getPoolSiblingAddresses } from "./addresses.js";
import { SinglePoolInstruction } from "./instruction.js";
import { minimumPoolBalance } from "./math.js";
import { PoolConnection, getVoteAccountAddressForPool } from "./queries.js";
import { POOL_ACCOUNT_SIZE } from "./state.js";

// ============================================================================
// PARAMETERS
// ============================================================================

export interface DepositParams {
  connection: PoolConnection;
  pool: PublicKey;
  userWallet: PublicKey;
  /** Stake account to deposit; omit with `depositFromDefaultAccount` */
  userStakeAccount?: PublicKey;
  depositFromDefaultAccount?: boolean;
  userTokenAccount?: PublicKey;
  userLamportAccount?: PublicKey;
  userStakeAuthority?: PublicKey;
}

export interface WithdrawParams {
  connection: PoolConnection;
  pool: PublicKey;
  userWallet: PublicKey;
  userStakeAccount: PublicKey;
  tokenAmount: bigint;
  /** Create `userStakeAccount` as a blank rent-exempt stake account first; it must then sign */
  createStakeAccount?: boolean;
  userStakeAuthority?: PublicKey;
  userTokenAccount?: PublicKey;
  userTokenAuthority?: PublicKey;
}

// ============================================================================
// CLIENT FLOWS
// ============================================================================

/**
 * Unsigned transactions for each pool operation, with the account
 * funding, token approvals and associated accounts each one needs.
 */
export class SinglePoolProgram {
  static programId: PublicKey = PROGRAM_IDS.SINGLE_POOL;

  /**
   * Fund every pool account, initialize the pool and, unless skipped,
   * attach default token metadata
   */
  static async initialize(
    connection: PoolConnection,
    voteAccount: PublicKey,
    payer: PublicKey,
    skipMetadata: boolean = false
  ): Promise<Transaction> {
    const addresses = getPoolAddresses(voteAccount, this.programId);

    const poolRent = await connection.getMinimumBalanceForRentExemption(POOL_ACCOUNT_SIZE);
    const stakeRent = await connection.getMinimumBalanceForRentExemption(STAKE_STATE_SIZE);
    const mintRent = await connection.getMinimumBalanceForRentExemption(MINT_SIZE);
    const minimumBalance = minimumPoolBalance(await connection.getStakeMinimumDelegation());

    const transaction = new Transaction();
    const fund = (toPubkey: PublicKey, lamports: bigint) =>
      transaction.add(SystemProgram.transfer({ fromPubkey: payer, toPubkey, lamports }));

    fund(addresses.pool, poolRent);
    fund(addresses.stake, stakeRent + minimumBalance);
    fund(addresses.onRamp, stakeRent);
    fund(addresses.mint, mintRent);

    transaction.add(SinglePoolInstruction.initializePool(voteAccount, this.programId));
    if (!skipMetadata) {
      transaction.add(SinglePoolInstruction.createTokenMetadata(addresses.pool, payer, this.programId));
    }
    return transaction;
  }

  static async replenishPool(voteAccount: PublicKey): Promise<Transaction> {
    return new Transaction().add(SinglePoolInstruction.replenishPool(voteAccount, this.programId));
  }

  /**
   * Deposit an active stake account. Creates the user's associated token
   * account when it is the destination.
   */
  static async deposit(params: DepositParams): Promise<Transaction> {
    const { connection, pool, userWallet } = params;
    const programId = this.programId;

    if (params.userStakeAccount && params.depositFromDefaultAccount) {
      throw new Error("pass either userStakeAccount or depositFromDefaultAccount, not both");
    }
    const userStakeAccount = params.depositFromDefaultAccount
      ? findDefaultDepositAccountAddressAndSeed(pool, userWallet).address
      : params.userStakeAccount;
    if (!userStakeAccount) throw new Error("no stake account to deposit");

    // Fails early if the pool does not exist
    await getVoteAccountAddressForPool(connection, pool, programId);

    const { mint } = getPoolSiblingAddresses(pool, programId);
    const associatedTokenAccount = getAssociatedTokenAddressSync(mint, userWallet);
    const userTokenAccount = params.userTokenAccount ?? associatedTokenAccount;

    const transaction = new Transaction();
    if (userTokenAccount.equals(associatedTokenAccount)) {
      transaction.add(
        createAssociatedTokenAccountIdempotentInstruction(userWallet, associatedTokenAccount, userWallet, mint)
      );
    }

    transaction.add(
      SinglePoolInstruction.depositStake({
        pool,
        userStakeAccount,
        userTokenAccount,
        userLamportAccount: params.userLamportAccount ?? userWallet,
        userStakeAuthority: params.userStakeAuthority ?? userWallet,
        programId,
      })
    );
    return transaction;
  }

  /**
   * Redeem pool tokens for a stake account. Approves the pool mint
   * authority to burn `tokenAmount` from the user's token account.
   */
  static async withdraw(params: WithdrawParams): Promise<Transaction> {
    const { connection, pool, userWallet, userStakeAccount, tokenAmount } = params;
    const programId = this.programId;

    await getVoteAccountAddressForPool(connection, pool, programId);
    const { mint, mintAuthority } = getPoolSiblingAddresses(pool, programId);

    const transaction = new Transaction();
    if (params.createStakeAccount) {
      transaction.add(await this.createBlankStakeAccount(connection, userStakeAccount, userWallet));
    }

    const userTokenAccount = params.userTokenAccount ?? getAssociatedTokenAddressSync(mint, userWallet);
    transaction.add(
      createApproveInstruction(userTokenAccount, mintAuthority, params.userTokenAuthority ?? userWallet, tokenAmount)
    );
    transaction.add(
      SinglePoolInstruction.withdrawStake({
        pool,
        userStakeAccount,
        userStakeAuthority: params.userStakeAuthority ?? userWallet,
        userTokenAccount,
        tokenAmount,
        programId,
      })
    );
    return transaction;
  }

  static async createTokenMetadata(pool: PublicKey, payer: PublicKey): Promise<Transaction> {
    return new Transaction().add(SinglePoolInstruction.createTokenMetadata(pool, payer, this.programId));
  }

  static async updateTokenMetadata(
    voteAccount: PublicKey,
    authorizedWithdrawer: PublicKey,
    name: string,
    symbol: string,
    uri?: string
  ): Promise<Transaction> {
    return new Transaction().add(
      SinglePoolInstruction.updateTokenMetadata({
        voteAccount,
        authorizedWithdrawer,
        name,
        symbol,
        uri,
        programId: this.programId,
      })
    );
  }

  /**
   * Create the user's default deposit account for `pool` (by default the
   * pool of `voteAccount`) with `stakeLamports` on top of rent, and delegate
   * it to `voteAccount`
   */
  static async createAndDelegateUserStake(
    connection: PoolConnection,
    voteAccount: PublicKey,
    userWallet: PublicKey,
    stakeLamports: bigint,
    pool?: PublicKey
  ): Promise<Transaction> {
    const depositPool = pool ?? findPoolAddress(this.programId, voteAccount);
    const { address: stakeAccount, seed } = findDefaultDepositAccountAddressAndSeed(depositPool, userWallet);
    const stakeRent = await connection.getMinimumBalanceForRentExemption(STAKE_STATE_SIZE);

    const transaction = new Transaction();
    transaction.add(
      SystemProgram.createAccountWithSeed({
        fromPubkey: userWallet,
        newAccountPubkey: stakeAccount,
        basePubkey: userWallet,
        seed,
        lamports: toLamportsNumber(stakeRent + stakeLamports),
        space: STAKE_STATE_SIZE,
        programId: StakeProgram.programId,
      })
    );
    transaction.add(
      StakeProgram.initialize({ stakePubkey: stakeAccount, authorized: new Authorized(userWallet, userWallet) })
    );
    transaction.add(
      lastInstruction(
        StakeProgram.delegate({ stakePubkey: stakeAccount, authorizedPubkey: userWallet, votePubkey: voteAccount })
      )
    );
    return transaction;
  }

  /**
   * A rent-exempt, uninitialized stake account to split withdrawals into
   */
  static async createBlankStakeAccount(
    connection: PoolConnection,
    stakeAccount: PublicKey,
    payer: PublicKey
  ): Promise<Transaction> {
    const lamports = await connection.getMinimumBalanceForRentExemption(STAKE_STATE_SIZE);
    return new Transaction().add(
      SystemProgram.createAccount({
        fromPubkey: payer,
        newAccountPubkey: stakeAccount,
        lamports: toLamportsNumber(lamports),
        space: STAKE_STATE_SIZE,
        programId: StakeProgram.programId,
      })
    );
  }
}
