import { PublicKey } from "@solana/web3.js";
import { ByteReader, ByteWriter } from "../utils/bytes.js";

export enum SinglePoolAccountType {
  Uninitialized = 0,
  Pool = 1,
}

/**
 * Bump seeds of the pool's derived accounts, stored so signing does not
 * repeat the search
 */
export interface PoolBumps {
  pool: number;
  stake: number;
  mint: number;
  stakeAuthority: number;
  mintAuthority: number;
  mplAuthority: number;
  onRamp: number;
}

export interface SinglePool {
  accountType: SinglePoolAccountType;
  voteAccount: PublicKey;
  bumps: PoolBumps;
  metadataAttached: boolean;
}

/** discriminator + vote account + seven bumps + metadata flag */
export const POOL_ACCOUNT_SIZE = 1 + 32 + 7 + 1;

export function encodePool(pool: SinglePool): Buffer {
  const data = Buffer.alloc(POOL_ACCOUNT_SIZE);
  new ByteWriter(data)
    .u8(pool.accountType)
    .pubkey(pool.voteAccount)
    .u8(pool.bumps.pool)
    .u8(pool.bumps.stake)
    .u8(pool.bumps.mint)
    .u8(pool.bumps.stakeAuthority)
    .u8(pool.bumps.mintAuthority)
    .u8(pool.bumps.mplAuthority)
    .u8(pool.bumps.onRamp)
    .u8(pool.metadataAttached ? 1 : 0);
  return data;
}

/**
 * Decode a pool record; null when the size or discriminator do not match
 */
export function decodePool(data: Uint8Array): SinglePool | null {
  if (data.length !== POOL_ACCOUNT_SIZE || data[0] !== SinglePoolAccountType.Pool) return null;
  const reader = new ByteReader(data.subarray(1));
  return {
    accountType: SinglePoolAccountType.Pool,
    voteAccount: reader.pubkey(),
    bumps: {
      pool: reader.u8(),
      stake: reader.u8(),
      mint: reader.u8(),
      stakeAuthority: reader.u8(),
      mintAuthority: reader.u8(),
      mplAuthority: reader.u8(),
      onRamp: reader.u8(),
    },
    metadataAttached: reader.u8() === 1,
  };
}
