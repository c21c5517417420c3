import { PublicKey, SystemProgram, TransactionInstruction } from "@solana/web3.js";
import {
  Key,
  Metadata,
  TokenStandard,
  createCreateMetadataAccountV3Instruction,
  createUpdateMetadataAccountV2Instruction,
} from "@metaplex-foundation/mpl-token-metadata";
import type { Data, DataV2 } from "@metaplex-foundation/mpl-token-metadata";
import { PROGRAM_IDS, SEEDS } from "../config.js";

// ============================================================================
// TOKEN METADATA ACCOUNT
// ============================================================================

export const MAX_NAME_LENGTH = 32;
export const MAX_SYMBOL_LENGTH = 10;
export const MAX_URI_LENGTH = 200;

/** Space the metadata program allocates for every metadata account */
export const METADATA_ACCOUNT_SIZE = 679;

export interface TokenMetadataFields {
  name: string;
  symbol: string;
  uri: string;
}

export interface TokenMetadata extends TokenMetadataFields {
  updateAuthority: PublicKey;
  mint: PublicKey;
}

export function findMetadataAddress(mint: PublicKey): [PublicKey, number] {
  return PublicKey.findProgramAddressSync(
    [SEEDS.METADATA, PROGRAM_IDS.TOKEN_METADATA.toBuffer(), mint.toBuffer()],
    PROGRAM_IDS.TOKEN_METADATA
  );
}

/** Stored strings are padded with NUL bytes up to their maximum length */
function unpad(value: string): string {
  return value.replace(/\0+$/, "");
}

export function paddedData(data: DataV2 | Data): Data {
  return {
    name: data.name.padEnd(MAX_NAME_LENGTH, "\0"),
    symbol: data.symbol.padEnd(MAX_SYMBOL_LENGTH, "\0"),
    uri: data.uri.padEnd(MAX_URI_LENGTH, "\0"),
    sellerFeeBasisPoints: data.sellerFeeBasisPoints,
    creators: data.creators,
  };
}

export function readMetadataAccount(data: Buffer): Metadata | null {
  if (data.length !== METADATA_ACCOUNT_SIZE || data[0] !== Key.MetadataV1) return null;
  try {
    const [metadata] = Metadata.deserialize(data);
    return metadata;
  } catch {
    return null;
  }
}

export function decodeMetadata(data: Buffer): TokenMetadata | null {
  const metadata = readMetadataAccount(data);
  if (!metadata) return null;
  return {
    updateAuthority: metadata.updateAuthority,
    mint: metadata.mint,
    name: unpad(metadata.data.name),
    symbol: unpad(metadata.data.symbol),
    uri: unpad(metadata.data.uri),
  };
}

export function writeMetadataAccount(metadata: Metadata, data: Buffer): void {
  const [encoded] = metadata.serialize();
  data.fill(0);
  encoded.copy(data);
}

/** A fresh mutable fungible-token record */
export function newFungibleMetadata(params: { updateAuthority: PublicKey; mint: PublicKey; data: DataV2 }): Metadata {
  return Metadata.fromArgs({
    key: Key.MetadataV1,
    updateAuthority: params.updateAuthority,
    mint: params.mint,
    data: paddedData(params.data),
    primarySaleHappened: false,
    isMutable: true,
    editionNonce: null,
    tokenStandard: TokenStandard.Fungible,
    collection: params.data.collection,
    uses: params.data.uses,
    collectionDetails: null,
    programmableConfig: null,
  });
}

// ============================================================================
// INSTRUCTIONS
// ============================================================================

function fieldsData(fields: TokenMetadataFields): DataV2 {
  return {
    name: fields.name,
    symbol: fields.symbol,
    uri: fields.uri,
    sellerFeeBasisPoints: 0,
    creators: null,
    collection: null,
    uses: null,
  };
}

export function createMetadataAccountInstruction(params: {
  metadata: PublicKey;
  mint: PublicKey;
  mintAuthority: PublicKey;
  payer: PublicKey;
  updateAuthority: PublicKey;
  fields: TokenMetadataFields;
}): TransactionInstruction {
  return createCreateMetadataAccountV3Instruction(
    {
      metadata: params.metadata,
      mint: params.mint,
      mintAuthority: params.mintAuthority,
      payer: params.payer,
      updateAuthority: params.updateAuthority,
      systemProgram: SystemProgram.programId,
    },
    {
      createMetadataAccountArgsV3: { data: fieldsData(params.fields), isMutable: true, collectionDetails: null },
    },
    PROGRAM_IDS.TOKEN_METADATA
  );
}

export function updateMetadataAccountInstruction(params: {
  metadata: PublicKey;
  updateAuthority: PublicKey;
  fields: TokenMetadataFields;
}): TransactionInstruction {
  return createUpdateMetadataAccountV2Instruction(
    { metadata: params.metadata, updateAuthority: params.updateAuthority },
    {
      updateMetadataAccountArgsV2: {
        data: fieldsData(params.fields),
        updateAuthority: null,
        primarySaleHappened: null,
        isMutable: null,
      },
    },
    PROGRAM_IDS.TOKEN_METADATA
  );
}
