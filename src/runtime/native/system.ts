import { PublicKey, SystemInstruction, SystemProgram } from "@solana/web3.js";
import { createWithSeedSync } from "../../program/addresses.js";
import { NativeProgramError } from "../errors.js";
import { AccountInfo, InvokeContext, Program } from "../invoke.js";

/** Largest account the system program will allocate */
export const MAX_PERMITTED_DATA_LENGTH = 10 * 1024 * 1024;

function fail(reason: string, detail?: string): NativeProgramError {
  return new NativeProgramError("system", reason, detail);
}

function find(ctx: InvokeContext, key: PublicKey): AccountInfo {
  const account = ctx.accounts.find((info) => info.key.equals(key));
  if (!account) throw fail("NotEnoughAccountKeys", key.toBase58());
  return account;
}

function requireSigner(ctx: InvokeContext, key: PublicKey): void {
  if (!ctx.isSigner(key)) throw fail("MissingRequiredSignature", key.toBase58());
}

function transfer(ctx: InvokeContext, from: AccountInfo, to: AccountInfo, lamports: bigint): void {
  requireSigner(ctx, from.key);
  if (!from.dataIsEmpty) throw fail("InvalidArgument", "from must not carry data");
  if (from.lamports < lamports) {
    throw fail("ResultWithNegativeLamports", `need ${lamports}, have ${from.lamports}`);
  }
  from.lamports -= lamports;
  to.lamports += lamports;
}

function allocate(ctx: InvokeContext, account: AccountInfo, space: number, signer: PublicKey): void {
  requireSigner(ctx, signer);
  if (!account.dataIsEmpty || !account.isOwnedBy(SystemProgram.programId)) {
    throw fail("AccountAlreadyInUse", account.key.toBase58());
  }
  if (space > MAX_PERMITTED_DATA_LENGTH) throw fail("InvalidAccountDataLength", `${space}`);
  account.resize(space);
}

function assign(ctx: InvokeContext, account: AccountInfo, owner: PublicKey, signer: PublicKey): void {
  if (account.isOwnedBy(owner)) return;
  requireSigner(ctx, signer);
  account.assign(owner);
}

function createAccount(
  ctx: InvokeContext,
  from: AccountInfo,
  to: AccountInfo,
  lamports: bigint,
  space: number,
  owner: PublicKey,
  signer: PublicKey
): void {
  if (to.lamports > 0n) throw fail("AccountAlreadyInUse", to.key.toBase58());
  allocate(ctx, to, space, signer);
  assign(ctx, to, owner, signer);
  transfer(ctx, from, to, lamports);
}

/**
 * System program: lamport transfers and account creation.
 */
export class SystemProgramStandIn implements Program {
  readonly programId = SystemProgram.programId;
  readonly name = "system";

  process(ctx: InvokeContext): void {
    const instruction = ctx.instruction;
    const type = SystemInstruction.decodeInstructionType(instruction);

    switch (type) {
      case "Transfer": {
        const params = SystemInstruction.decodeTransfer(instruction);
        transfer(ctx, find(ctx, params.fromPubkey), find(ctx, params.toPubkey), BigInt(params.lamports));
        return;
      }
      case "Create": {
        const params = SystemInstruction.decodeCreateAccount(instruction);
        requireSigner(ctx, params.newAccountPubkey);
        createAccount(
          ctx,
          find(ctx, params.fromPubkey),
          find(ctx, params.newAccountPubkey),
          BigInt(params.lamports),
          params.space,
          params.programId,
          params.newAccountPubkey
        );
        return;
      }
      case "CreateWithSeed": {
        const params = SystemInstruction.decodeCreateWithSeed(instruction);
        const expected = createWithSeedSync(params.basePubkey, params.seed, params.programId);
        if (!expected.equals(params.newAccountPubkey)) {
          throw fail("AddressWithSeedMismatch", params.newAccountPubkey.toBase58());
        }
        createAccount(
          ctx,
          find(ctx, params.fromPubkey),
          find(ctx, params.newAccountPubkey),
          BigInt(params.lamports),
          params.space,
          params.programId,
          params.basePubkey
        );
        return;
      }
      case "Allocate": {
        const params = SystemInstruction.decodeAllocate(instruction);
        allocate(ctx, find(ctx, params.accountPubkey), params.space, params.accountPubkey);
        return;
      }
      case "Assign": {
        const params = SystemInstruction.decodeAssign(instruction);
        assign(ctx, find(ctx, params.accountPubkey), params.programId, params.accountPubkey);
        return;
      }
      default:
        throw fail("InvalidInstructionData", `unsupported instruction ${type}`);
    }
  }
}
