import { MINT_SIZE, MintLayout, TOKEN_PROGRAM_ID } from "@solana/spl-token";
import {
  Metadata,
  createMetadataAccountV3InstructionDiscriminator,
  CreateMetadataAccountV3Struct,
  updateMetadataAccountV2InstructionDiscriminator,
  UpdateMetadataAccountV2Struct,
} from "@metaplex-foundation/mpl-token-metadata";
import type { DataV2 } from "@metaplex-foundation/mpl-token-metadata";
import { PROGRAM_IDS, SEEDS } from "../../config.js";
import {
  MAX_NAME_LENGTH,
  MAX_SYMBOL_LENGTH,
  MAX_URI_LENGTH,
  METADATA_ACCOUNT_SIZE,
  findMetadataAddress,
  newFungibleMetadata,
  paddedData,
  readMetadataAccount,
  writeMetadataAccount,
} from "../../interfaces/metadata.js";
import { NativeProgramError } from "../errors.js";
import type { InvokeContext, Program } from "../invoke.js";
import { createPdaAccount } from "../pda.js";

function fail(reason: string, detail?: string): NativeProgramError {
  return new NativeProgramError("metadata", reason, detail);
}

function decodeArgs<T>(decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    throw fail("InvalidInstructionData", error instanceof Error ? error.message : String(error));
  }
}

function checkData(data: DataV2): void {
  if (Buffer.byteLength(data.name) > MAX_NAME_LENGTH) throw fail("NameTooLong");
  if (Buffer.byteLength(data.symbol) > MAX_SYMBOL_LENGTH) throw fail("SymbolTooLong");
  if (Buffer.byteLength(data.uri) > MAX_URI_LENGTH) throw fail("UriTooLong");
  if (data.sellerFeeBasisPoints > 10_000) throw fail("InvalidBasisPoints");
}

/**
 * Token metadata program: a fungible-token record per mint, created by the
 * mint authority and edited by the recorded update authority.
 */
export class MetadataProgramStandIn implements Program {
  readonly programId = PROGRAM_IDS.TOKEN_METADATA;
  readonly name = "metadata";

  process(ctx: InvokeContext): void {
    switch (ctx.data[0]) {
      case createMetadataAccountV3InstructionDiscriminator:
        return this.create(ctx);
      case updateMetadataAccountV2InstructionDiscriminator:
        return this.update(ctx);
      default:
        throw fail("InvalidInstruction", `${ctx.data[0]}`);
    }
  }

  private create(ctx: InvokeContext): void {
    ctx.requireAccounts(6);
    const metadata = ctx.account(0);
    const mint = ctx.account(1);
    const mintAuthority = ctx.account(2);
    const payer = ctx.account(3);
    const updateAuthority = ctx.account(4);
    const [{ createMetadataAccountArgsV3: args }] = decodeArgs(() =>
      CreateMetadataAccountV3Struct.deserialize(ctx.data)
    );
    checkData(args.data);

    const [expected, bump] = findMetadataAddress(mint.key);
    if (!expected.equals(metadata.key)) throw fail("InvalidMetadataKey", metadata.key.toBase58());
    if (metadata.isOwnedBy(this.programId)) throw fail("AlreadyInitialized", metadata.key.toBase58());

    if (!mint.isOwnedBy(TOKEN_PROGRAM_ID) || mint.data.length !== MINT_SIZE) throw fail("InvalidMintAccount");
    const mintState = MintLayout.decode(mint.data);
    if (mintState.mintAuthorityOption === 0 || !mintState.mintAuthority.equals(mintAuthority.key)) {
      throw fail("InvalidMintAuthority", mintAuthority.key.toBase58());
    }
    if (!mintAuthority.isSigner) throw fail("NotMintAuthority", "mint authority must sign");
    if (!payer.isSigner) throw fail("MissingRequiredSignature", "payer");

    createPdaAccount(ctx, {
      account: metadata,
      space: METADATA_ACCOUNT_SIZE,
      owner: this.programId,
      seeds: [SEEDS.METADATA, this.programId.toBuffer(), mint.key.toBuffer(), Buffer.from([bump])],
      payer,
    });
    const record = newFungibleMetadata({ updateAuthority: updateAuthority.key, mint: mint.key, data: args.data });
    writeMetadataAccount(args.isMutable ? record : Metadata.fromArgs({ ...record, isMutable: false }), metadata.data);
  }

  private update(ctx: InvokeContext): void {
    ctx.requireAccounts(2);
    const metadata = ctx.account(0);
    const updateAuthority = ctx.account(1);
    const [{ updateMetadataAccountArgsV2: args }] = decodeArgs(() =>
      UpdateMetadataAccountV2Struct.deserialize(ctx.data)
    );

    const current = metadata.isOwnedBy(this.programId) ? readMetadataAccount(metadata.data) : null;
    if (!current) throw fail("UninitializedMetadata", metadata.key.toBase58());
    if (!current.updateAuthority.equals(updateAuthority.key) || !updateAuthority.isSigner) {
      throw fail("UpdateAuthorityIncorrect", updateAuthority.key.toBase58());
    }
    if (!current.isMutable) throw fail("DataIsImmutable");
    if (args.data) checkData(args.data);
    if (args.isMutable === true) throw fail("IsMutableCanOnlyBeFlippedToFalse");

    const next = Metadata.fromArgs({
      ...current,
      updateAuthority: args.updateAuthority ?? current.updateAuthority,
      data: args.data ? paddedData(args.data) : current.data,
      collection: args.data ? args.data.collection : current.collection,
      uses: args.data ? args.data.uses : current.uses,
      primarySaleHappened: current.primarySaleHappened || args.primarySaleHappened === true,
      isMutable: args.isMutable ?? current.isMutable,
    });
    writeMetadataAccount(next, metadata.data);
  }
}
