import { PublicKey, StakeProgram } from "@solana/web3.js";
import { ACCOUNT_SIZE, AccountLayout, MINT_SIZE, MintLayout, TOKEN_PROGRAM_ID } from "@solana/spl-token";
import { PROGRAM_IDS } from "../config.js";
import { decodeStakeState } from "../interfaces/stake.js";
import { getPoolSiblingAddresses } from "./addresses.js";
import { minimumPoolBalance, poolValue } from "./math.js";
import { SinglePool, decodePool } from "./state.js";

/**
 * Account data as a client reads it
 */
export interface AccountSnapshot {
  lamports: bigint;
  data: Buffer;
  owner: PublicKey;
}

/**
 * The slice of an RPC connection the client flows need
 */
export interface PoolConnection {
  getAccountInfo(address: PublicKey): Promise<AccountSnapshot | null>;
  getMinimumBalanceForRentExemption(dataLength: number): Promise<bigint>;
  getStakeMinimumDelegation(): Promise<bigint>;
}

export async function getPoolAccount(
  connection: PoolConnection,
  pool: PublicKey,
  programId: PublicKey = PROGRAM_IDS.SINGLE_POOL
): Promise<SinglePool> {
  const account = await connection.getAccountInfo(pool);
  const state = account && account.owner.equals(programId) ? decodePool(account.data) : null;
  if (!state) throw new Error(`${pool.toBase58()} is not a single-validator pool`);
  return state;
}

export async function getVoteAccountAddressForPool(
  connection: PoolConnection,
  pool: PublicKey,
  programId: PublicKey = PROGRAM_IDS.SINGLE_POOL
): Promise<PublicKey> {
  return (await getPoolAccount(connection, pool, programId)).voteAccount;
}

export interface PoolStatus {
  pool: PublicKey;
  voteAccount: PublicKey;
  stakeLamports: bigint;
  delegatedStake: bigint;
  onRampLamports: bigint;
  tokenSupply: bigint;
  minimumBalance: bigint;
  /** Delegated stake above the minimum pool balance; what tokens redeem against */
  value: bigint;
  metadataAttached: boolean;
}

/**
 * Snapshot of a pool's stake and token supply
 */
export async function getPoolStatus(
  connection: PoolConnection,
  pool: PublicKey,
  programId: PublicKey = PROGRAM_IDS.SINGLE_POOL
): Promise<PoolStatus> {
  const state = await getPoolAccount(connection, pool, programId);
  const addresses = getPoolSiblingAddresses(pool, programId);

  const stakeAccount = await connection.getAccountInfo(addresses.stake);
  const stakeState =
    stakeAccount && stakeAccount.owner.equals(StakeProgram.programId) ? decodeStakeState(stakeAccount.data) : null;
  if (!stakeAccount || !stakeState || stakeState.kind !== "stake") {
    throw new Error(`pool stake account ${addresses.stake.toBase58()} is not delegated`);
  }

  const mintAccount = await connection.getAccountInfo(addresses.mint);
  if (!mintAccount || !mintAccount.owner.equals(TOKEN_PROGRAM_ID) || mintAccount.data.length !== MINT_SIZE) {
    throw new Error(`pool mint ${addresses.mint.toBase58()} does not exist`);
  }
  const onRamp = await connection.getAccountInfo(addresses.onRamp);

  const minimumBalance = minimumPoolBalance(await connection.getStakeMinimumDelegation());
  const delegatedStake = stakeState.delegation.stake;
  return {
    pool,
    voteAccount: state.voteAccount,
    stakeLamports: stakeAccount.lamports,
    delegatedStake,
    onRampLamports: onRamp?.lamports ?? 0n,
    tokenSupply: MintLayout.decode(mintAccount.data).supply,
    minimumBalance,
    value: poolValue(delegatedStake, minimumBalance),
    metadataAttached: state.metadataAttached,
  };
}

/** Balance of a token account; zero when it does not exist */
export async function getTokenBalance(connection: PoolConnection, tokenAccount: PublicKey): Promise<bigint> {
  const account = await connection.getAccountInfo(tokenAccount);
  if (!account || !account.owner.equals(TOKEN_PROGRAM_ID) || account.data.length !== ACCOUNT_SIZE) return 0n;
  return AccountLayout.decode(account.data).amount;
}
