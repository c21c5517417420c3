import { PublicKey, StakeProgram } from "@solana/web3.js";
import { sha256 } from "@noble/hashes/sha256";
import { DEFAULT_DEPOSIT_SEED_PREFIX, PROGRAM_IDS, SEEDS } from "../config.js";
import { findMetadataAddress } from "../interfaces/metadata.js";

// ============================================================================
// PDA DERIVATION
// ============================================================================

export function findPoolAddressAndBump(programId: PublicKey, voteAccount: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([SEEDS.POOL, voteAccount.toBuffer()], programId);
}

function findPoolSiblingAddressAndBump(
  programId: PublicKey,
  pool: PublicKey,
  seed: Buffer
): [PublicKey, number] {
  return PublicKey.findProgramAddressSync([seed, pool.toBuffer()], programId);
}

export function findPoolStakeAddressAndBump(programId: PublicKey, pool: PublicKey): [PublicKey, number] {
  return findPoolSiblingAddressAndBump(programId, pool, SEEDS.POOL_STAKE);
}

export function findPoolMintAddressAndBump(programId: PublicKey, pool: PublicKey): [PublicKey, number] {
  return findPoolSiblingAddressAndBump(programId, pool, SEEDS.POOL_MINT);
}

export function findPoolOnRampAddressAndBump(programId: PublicKey, pool: PublicKey): [PublicKey, number] {
  return findPoolSiblingAddressAndBump(programId, pool, SEEDS.POOL_ONRAMP);
}

export function findPoolStakeAuthorityAddressAndBump(programId: PublicKey, pool: PublicKey): [PublicKey, number] {
  return findPoolSiblingAddressAndBump(programId, pool, SEEDS.POOL_STAKE_AUTHORITY);
}

export function findPoolMintAuthorityAddressAndBump(programId: PublicKey, pool: PublicKey): [PublicKey, number] {
  return findPoolSiblingAddressAndBump(programId, pool, SEEDS.POOL_MINT_AUTHORITY);
}

export function findPoolMplAuthorityAddressAndBump(programId: PublicKey, pool: PublicKey): [PublicKey, number] {
  return findPoolSiblingAddressAndBump(programId, pool, SEEDS.POOL_MPL_AUTHORITY);
}

export function findPoolAddress(programId: PublicKey, voteAccount: PublicKey): PublicKey {
  return findPoolAddressAndBump(programId, voteAccount)[0];
}

export function findPoolStakeAddress(programId: PublicKey, pool: PublicKey): PublicKey {
  return findPoolStakeAddressAndBump(programId, pool)[0];
}

export function findPoolMintAddress(programId: PublicKey, pool: PublicKey): PublicKey {
  return findPoolMintAddressAndBump(programId, pool)[0];
}

export function findPoolOnRampAddress(programId: PublicKey, pool: PublicKey): PublicKey {
  return findPoolOnRampAddressAndBump(programId, pool)[0];
}

export function findPoolStakeAuthorityAddress(programId: PublicKey, pool: PublicKey): PublicKey {
  return findPoolStakeAuthorityAddressAndBump(programId, pool)[0];
}

export function findPoolMintAuthorityAddress(programId: PublicKey, pool: PublicKey): PublicKey {
  return findPoolMintAuthorityAddressAndBump(programId, pool)[0];
}

export function findPoolMplAuthorityAddress(programId: PublicKey, pool: PublicKey): PublicKey {
  return findPoolMplAuthorityAddressAndBump(programId, pool)[0];
}

/**
 * Metadata account of a pool mint, under the token metadata program
 */
export function findMplMetadataAddress(poolMint: PublicKey): PublicKey {
  return findMetadataAddress(poolMint)[0];
}

// ============================================================================
// SEEDED ADDRESSES
// ============================================================================

/**
 * Synchronous `PublicKey.createWithSeed`: sha256(base || seed || programId)
 */
export function createWithSeedSync(base: PublicKey, seed: string, programId: PublicKey): PublicKey {
  const buffer = Buffer.concat([base.toBuffer(), Buffer.from(seed), programId.toBuffer()]);
  return new PublicKey(sha256(buffer));
}

/** Seed string of a user's default deposit account for `pool` */
export function defaultDepositAccountSeed(pool: PublicKey): string {
  return DEFAULT_DEPOSIT_SEED_PREFIX + pool.toBase58().slice(0, 28);
}

export function findDefaultDepositAccountAddressAndSeed(
  pool: PublicKey,
  userWallet: PublicKey
): { address: PublicKey; seed: string } {
  const seed = defaultDepositAccountSeed(pool);
  return { address: createWithSeedSync(userWallet, seed, StakeProgram.programId), seed };
}

export function findDefaultDepositAccountAddress(pool: PublicKey, userWallet: PublicKey): PublicKey {
  return findDefaultDepositAccountAddressAndSeed(pool, userWallet).address;
}

/**
 * Accounts derived from a pool address
 */
export interface PoolSiblingAddresses {
  pool: PublicKey;
  stake: PublicKey;
  onRamp: PublicKey;
  mint: PublicKey;
  stakeAuthority: PublicKey;
  mintAuthority: PublicKey;
  mplAuthority: PublicKey;
  metadata: PublicKey;
}

export interface PoolAddresses extends PoolSiblingAddresses {
  voteAccount: PublicKey;
}

export function getPoolSiblingAddresses(
  pool: PublicKey,
  programId: PublicKey = PROGRAM_IDS.SINGLE_POOL
): PoolSiblingAddresses {
  const mint = findPoolMintAddress(programId, pool);
  return {
    pool,
    stake: findPoolStakeAddress(programId, pool),
    onRamp: findPoolOnRampAddress(programId, pool),
    mint,
    stakeAuthority: findPoolStakeAuthorityAddress(programId, pool),
    mintAuthority: findPoolMintAuthorityAddress(programId, pool),
    mplAuthority: findPoolMplAuthorityAddress(programId, pool),
    metadata: findMplMetadataAddress(mint),
  };
}

/**
 * Every address of the pool bound to `voteAccount`
 */
export function getPoolAddresses(voteAccount: PublicKey, programId: PublicKey = PROGRAM_IDS.SINGLE_POOL): PoolAddresses {
  return { voteAccount, ...getPoolSiblingAddresses(findPoolAddress(programId, voteAccount), programId) };
}
