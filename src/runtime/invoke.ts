import { PublicKey, TransactionInstruction } from "@solana/web3.js";
import type { LedgerConfig } from "../config.js";
import { AccountStore, LedgerAccount } from "./accounts.js";
import { describeError, RuntimeError } from "./errors.js";
import { Clock, isReservedAccountKey, Rent } from "./sysvars.js";

/** Top-level instructions run at depth 1 */
export const MAX_INVOKE_DEPTH = 5;

/**
 * A program the ledger can execute. Processing is synchronous and mutates
 * accounts through the handles the context hands out.
 */
export interface Program {
  readonly programId: PublicKey;
  readonly name: string;
  process(ctx: InvokeContext): void;
}

export interface AccountPrivileges {
  isSigner: boolean;
  isWritable: boolean;
}

export type SignerSeeds = readonly (Buffer | Uint8Array)[];

// ============================================================================
// ACCOUNT HANDLE
// ============================================================================

/**
 * Live view of an instruction account. Writes land in the transaction's
 * working store and are checked when the owning frame finishes.
 */
export class AccountInfo {
  constructor(
    readonly key: PublicKey,
    readonly isSigner: boolean,
    readonly isWritable: boolean,
    private readonly store: AccountStore
  ) {}

  private get entry(): LedgerAccount {
    return this.store.load(this.key);
  }

  get lamports(): bigint {
    return this.entry.lamports;
  }

  set lamports(value: bigint) {
    if (value < 0n) throw new RuntimeError("UnbalancedInstruction", `negative balance for ${this.key.toBase58()}`);
    this.entry.lamports = value;
  }

  get data(): Buffer {
    return this.entry.data;
  }

  get owner(): PublicKey {
    return this.entry.owner;
  }

  get executable(): boolean {
    return this.entry.executable;
  }

  get dataIsEmpty(): boolean {
    return this.entry.data.length === 0;
  }

  isOwnedBy(programId: PublicKey): boolean {
    return this.entry.owner.equals(programId);
  }

  assign(owner: PublicKey): void {
    this.entry.owner = owner;
  }

  /** Grow or shrink the data buffer; new bytes are zeroed */
  resize(length: number): void {
    const resized = Buffer.alloc(length);
    this.entry.data.copy(resized, 0, 0, Math.min(length, this.entry.data.length));
    this.entry.data = resized;
  }
}

// ============================================================================
// TRANSACTION CONTEXT
// ============================================================================

interface ReturnData {
  programId: PublicKey;
  data: Buffer;
}

/**
 * State shared by every frame of one transaction: the working store, the
 * log, the sysvars and the program registry.
 */
export class TransactionContext {
  readonly logs: string[] = [];
  private returnData: ReturnData | null = null;

  constructor(
    readonly store: AccountStore,
    readonly clock: Clock,
    readonly rent: Rent,
    readonly config: LedgerConfig,
    private readonly programs: ReadonlyMap<string, Program>
  ) {}

  /**
   * Run one instruction frame, logging its outcome the way the cluster does
   */
  execute(
    instruction: TransactionInstruction,
    privileges: ReadonlyMap<string, AccountPrivileges>,
    depth: number
  ): void {
    const programId = instruction.programId.toBase58();
    if (depth > MAX_INVOKE_DEPTH) {
      throw new RuntimeError("CallDepthExceeded", `depth ${depth}`);
    }
    const program = this.programs.get(programId);
    if (!program) {
      throw new RuntimeError("UnsupportedProgramId", programId);
    }

    this.logs.push(`Program ${programId} invoke [${depth}]`);
    const ctx = new InvokeContext(this, program.programId, instruction, privileges, depth);
    try {
      program.process(ctx);
      ctx.verify();
    } catch (error) {
      this.logs.push(`Program ${programId} failed: ${describeError(error)}`);
      throw error;
    }
    this.logs.push(`Program ${programId} success`);
  }

  setReturnData(programId: PublicKey, data: Buffer): void {
    this.returnData = data.length === 0 ? null : { programId, data: Buffer.from(data) };
    if (data.length > 0) {
      this.logs.push(`Program return: ${programId.toBase58()} ${data.toString("base64")}`);
    }
  }

  clearReturnData(): void {
    this.returnData = null;
  }

  getReturnData(): ReturnData | null {
    return this.returnData;
  }
}

// ============================================================================
// INVOKE CONTEXT
// ============================================================================

interface PreAccount {
  key: PublicKey;
  lamports: bigint;
  owner: PublicKey;
  data: Buffer;
}

function isZeroed(data: Buffer): boolean {
  return data.every((byte) => byte === 0);
}

/**
 * One program frame. Hands out account handles, routes cross-program
 * invocations and checks the frame's writes against the ownership rules.
 */
export class InvokeContext {
  readonly accounts: readonly AccountInfo[];
  private pre = new Map<string, PreAccount>();

  constructor(
    private readonly tx: TransactionContext,
    readonly programId: PublicKey,
    readonly instruction: TransactionInstruction,
    private readonly privileges: ReadonlyMap<string, AccountPrivileges>,
    readonly depth: number
  ) {
    this.accounts = instruction.keys.map((meta) => {
      const granted = privileges.get(meta.pubkey.toBase58());
      return new AccountInfo(
        meta.pubkey,
        granted?.isSigner ?? false,
        granted?.isWritable ?? false,
        tx.store
      );
    });
    this.rebaseline();
  }

  get data(): Buffer {
    return this.instruction.data;
  }

  get clock(): Clock {
    return this.tx.clock;
  }

  get rent(): Rent {
    return this.tx.rent;
  }

  /** Network minimum delegation for stake accounts */
  get minimumDelegation(): bigint {
    return this.tx.config.minimumDelegation;
  }

  account(index: number): AccountInfo {
    const account = this.accounts[index];
    if (!account) {
      throw new RuntimeError("NotEnoughAccountKeys", `expected account at index ${index}`);
    }
    return account;
  }

  requireAccounts(count: number): void {
    if (this.accounts.length < count) {
      throw new RuntimeError("NotEnoughAccountKeys", `expected ${count}, got ${this.accounts.length}`);
    }
  }

  isSigner(key: PublicKey): boolean {
    return this.privileges.get(key.toBase58())?.isSigner ?? false;
  }

  log(message: string): void {
    this.tx.logs.push(`Program log: ${message}`);
  }

  setReturnData(data: Buffer): void {
    this.tx.setReturnData(this.programId, data);
  }

  /**
   * Cross-program invocation. Each seed set signs for the address it derives
   * under the calling program. Returns the callee's return data, if any.
   */
  invoke(instruction: TransactionInstruction, signerSeeds: readonly SignerSeeds[] = []): Buffer | null {
    const calleeId = instruction.programId.toBase58();
    if (!this.privileges.has(calleeId)) {
      throw new RuntimeError("AccountNotPassed", `program ${calleeId}`);
    }

    const pdaSigners = new Set(
      signerSeeds.map((seeds) => PublicKey.createProgramAddressSync([...seeds], this.programId).toBase58())
    );

    const granted = new Map<string, AccountPrivileges>();
    for (const meta of instruction.keys) {
      const id = meta.pubkey.toBase58();
      const caller = this.privileges.get(id);
      if (!caller) {
        throw new RuntimeError("AccountNotPassed", id);
      }
      if (meta.isSigner && !caller.isSigner && !pdaSigners.has(id)) {
        throw new RuntimeError("PrivilegeEscalation", `${id} is not a signer`);
      }
      const wantsWrite = meta.isWritable && !isReservedAccountKey(meta.pubkey);
      if (wantsWrite && !caller.isWritable) {
        throw new RuntimeError("PrivilegeEscalation", `${id} is not writable`);
      }
      const previous = granted.get(id);
      granted.set(id, {
        isSigner: meta.isSigner || (previous?.isSigner ?? false),
        isWritable: wantsWrite || (previous?.isWritable ?? false),
      });
    }

    this.verify();
    this.tx.clearReturnData();
    this.tx.execute(instruction, granted, this.depth + 1);
    this.rebaseline();

    const returned = this.tx.getReturnData();
    return returned && returned.programId.equals(instruction.programId) ? returned.data : null;
  }

  /**
   * Check this frame's writes since the last baseline:
   * only the owner debits lamports, changes data or reassigns an account,
   * readonly accounts stay untouched and total lamports are conserved.
   */
  verify(): void {
    let before = 0n;
    let after = 0n;

    for (const [id, pre] of this.pre) {
      const account = this.tx.store.load(pre.key);
      const writable = this.privileges.get(id)?.isWritable ?? false;
      const ownedByProgram = pre.owner.equals(this.programId);
      before += pre.lamports;
      after += account.lamports;

      if (!account.owner.equals(pre.owner)) {
        if (!writable || !ownedByProgram || !isZeroed(account.data)) {
          throw new RuntimeError("ModifiedProgramId", id);
        }
      }

      if (account.lamports !== pre.lamports) {
        if (!writable) throw new RuntimeError("ReadonlyAccountModified", id);
        if (account.lamports < pre.lamports && !ownedByProgram) {
          throw new RuntimeError("ExternalAccountLamportSpend", id);
        }
      }

      if (!account.data.equals(pre.data)) {
        if (!writable) throw new RuntimeError("ReadonlyAccountModified", id);
        if (!ownedByProgram) throw new RuntimeError("ExternalAccountDataModified", id);
      }
    }

    if (before !== after) {
      throw new RuntimeError("UnbalancedInstruction", `${before} lamports before, ${after} after`);
    }
  }

  private rebaseline(): void {
    const pre = new Map<string, PreAccount>();
    for (const meta of this.instruction.keys) {
      const account = this.tx.store.load(meta.pubkey);
      pre.set(meta.pubkey.toBase58(), {
        key: meta.pubkey,
        lamports: account.lamports,
        owner: account.owner,
        data: Buffer.from(account.data),
      });
    }
    this.pre = pre;
  }
}
