import { PublicKey } from "@solana/web3.js";
import {
  MINT_SIZE,
  MintLayout,
  TOKEN_PROGRAM_ID,
  createBurnInstruction,
  createInitializeMint2Instruction,
  createMintToInstruction,
} from "@solana/spl-token";
import { POOL_MINT_DECIMALS } from "../config.js";
import { SinglePoolError, poolError } from "../errors.js";
import type { AccountInfo, InvokeContext, SignerSeeds } from "../runtime/invoke.js";

/**
 * Supply of an initialized pool mint
 */
export function readMintSupply(mint: AccountInfo): bigint {
  if (!mint.isOwnedBy(TOKEN_PROGRAM_ID) || mint.data.length !== MINT_SIZE) {
    throw poolError(SinglePoolError.InvalidPoolMint);
  }
  const state = MintLayout.decode(mint.data);
  if (!state.isInitialized) throw poolError(SinglePoolError.InvalidPoolMint);
  return state.supply;
}

export function initializePoolMint(ctx: InvokeContext, mint: PublicKey, mintAuthority: PublicKey): void {
  ctx.invoke(createInitializeMint2Instruction(mint, POOL_MINT_DECIMALS, mintAuthority, null, TOKEN_PROGRAM_ID));
}

export function mintPoolTokens(
  ctx: InvokeContext,
  params: { mint: PublicKey; destination: PublicKey; authority: PublicKey; amount: bigint; seeds: SignerSeeds }
): void {
  ctx.invoke(
    createMintToInstruction(params.mint, params.destination, params.authority, params.amount, [], TOKEN_PROGRAM_ID),
    [params.seeds]
  );
}

/**
 * Burn from a user's token account; the authority acts as approved delegate
 */
export function burnPoolTokens(
  ctx: InvokeContext,
  params: { account: PublicKey; mint: PublicKey; authority: PublicKey; amount: bigint; seeds: SignerSeeds }
): void {
  ctx.invoke(
    createBurnInstruction(params.account, params.mint, params.authority, params.amount, [], TOKEN_PROGRAM_ID),
    [params.seeds]
  );
}
