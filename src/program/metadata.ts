import { PublicKey } from "@solana/web3.js";
import {
  TokenMetadataFields,
  createMetadataAccountInstruction,
  updateMetadataAccountInstruction,
} from "../interfaces/metadata.js";
import type { InvokeContext, SignerSeeds } from "../runtime/invoke.js";

/**
 * Name and symbol a new pool mint gets, derived from its vote account
 */
export function defaultPoolMetadata(voteAccount: PublicKey): TokenMetadataFields {
  const vote = voteAccount.toBase58();
  return {
    name: `Single Pool ${vote.slice(0, 15)}`,
    symbol: `st${vote.slice(0, 7)}`,
    uri: "",
  };
}

export function createPoolMetadata(
  ctx: InvokeContext,
  params: {
    metadata: PublicKey;
    mint: PublicKey;
    mintAuthority: PublicKey;
    mplAuthority: PublicKey;
    payer: PublicKey;
    fields: TokenMetadataFields;
    mintAuthoritySeeds: SignerSeeds;
  }
): void {
  ctx.invoke(
    createMetadataAccountInstruction({
      metadata: params.metadata,
      mint: params.mint,
      mintAuthority: params.mintAuthority,
      payer: params.payer,
      updateAuthority: params.mplAuthority,
      fields: params.fields,
    }),
    [params.mintAuthoritySeeds]
  );
}

export function updatePoolMetadata(
  ctx: InvokeContext,
  params: { metadata: PublicKey; mplAuthority: PublicKey; fields: TokenMetadataFields; mplAuthoritySeeds: SignerSeeds }
): void {
  ctx.invoke(
    updateMetadataAccountInstruction({
      metadata: params.metadata,
      updateAuthority: params.mplAuthority,
      fields: params.fields,
    }),
    [params.mplAuthoritySeeds]
  );
}
