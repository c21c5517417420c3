import { Keypair, PublicKey, SystemProgram, Transaction, TransactionInstruction } from "@solana/web3.js";
import { sha256 } from "@noble/hashes/sha256";
import bs58 from "bs58";
import { DEFAULT_LEDGER_CONFIG, LedgerConfig } from "../config.js";
import { creditStakeRewards, getMinimumDelegationInstruction } from "../interfaces/stake.js";
import { AccountStore, cloneAccount, LedgerAccount } from "./accounts.js";
import { RuntimeError, TransactionError } from "./errors.js";
import { AccountPrivileges, Program, TransactionContext } from "./invoke.js";
import { Clock, isReservedAccountKey, Rent } from "./sysvars.js";

export const NATIVE_LOADER_ID = new PublicKey("NativeLoader1111111111111111111111111111111");

const GENESIS_UNIX_TIMESTAMP = 1_700_000_000n;
const SLOT_DURATION_MS = 400n;

export interface TransactionResult {
  signature: string;
  logs: string[];
  fee: bigint;
}

export interface EpochRewards {
  epoch: bigint;
  rewardedAccounts: number;
  lamports: bigint;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * In-process ledger: account storage, clock, rent and atomic transaction
 * execution for the registered programs.
 */
export class Ledger {
  private store = new AccountStore();
  private readonly programs = new Map<string, Program>();
  private epoch: bigint;
  private blockhash: string;
  readonly rent: Rent;

  constructor(readonly config: LedgerConfig = DEFAULT_LEDGER_CONFIG) {
    this.epoch = config.startingEpoch;
    this.rent = Rent.fromConfig(config);
    this.blockhash = this.deriveBlockhash();
  }

  // ============================================================================
  // PROGRAMS AND ACCOUNTS
  // ============================================================================

  addProgram(program: Program, loader: PublicKey = NATIVE_LOADER_ID): void {
    this.programs.set(program.programId.toBase58(), program);
    this.store.set(program.programId, {
      lamports: 1n,
      data: Buffer.alloc(0),
      owner: loader,
      executable: true,
    });
  }

  hasProgram(programId: PublicKey): boolean {
    return this.programs.has(programId.toBase58());
  }

  get clock(): Clock {
    const slot = this.epoch * this.config.slotsPerEpoch;
    const epochStartTimestamp = GENESIS_UNIX_TIMESTAMP + (slot * SLOT_DURATION_MS) / 1000n;
    return { slot, epoch: this.epoch, epochStartTimestamp, unixTimestamp: epochStartTimestamp };
  }

  get latestBlockhash(): string {
    return this.blockhash;
  }

  getAccount(key: PublicKey): LedgerAccount | null {
    const account = this.store.peek(key);
    return account ? cloneAccount(account) : null;
  }

  getBalance(key: PublicKey): bigint {
    return this.store.peek(key)?.lamports ?? 0n;
  }

  airdrop(key: PublicKey, lamports: bigint): void {
    this.store.load(key).lamports += lamports;
  }

  setAccount(key: PublicKey, account: LedgerAccount): void {
    this.store.set(key, account);
  }

  // Connection-style queries used by the client flows

  async getAccountInfo(key: PublicKey): Promise<LedgerAccount | null> {
    return this.getAccount(key);
  }

  async getMinimumBalanceForRentExemption(dataLength: number): Promise<bigint> {
    return this.rent.minimumBalance(dataLength);
  }

  /**
   * Ask the stake program for its minimum delegation, as a wallet would
   * through a simulated transaction
   */
  async getStakeMinimumDelegation(): Promise<bigint> {
    const returned = this.simulateInstruction(getMinimumDelegationInstruction());
    if (!returned || returned.length < 8) {
      throw new RuntimeError("InvalidInstructionData", "stake program returned no minimum delegation");
    }
    return returned.readBigUInt64LE(0);
  }

  /**
   * Run a signer-free instruction against a scratch copy of the ledger and
   * return its return data. Nothing is committed.
   */
  simulateInstruction(instruction: TransactionInstruction): Buffer | null {
    const tx = new TransactionContext(this.store.fork(), this.clock, this.rent, this.config, this.programs);
    const privileges = new Map<string, AccountPrivileges>();
    for (const meta of instruction.keys) {
      privileges.set(meta.pubkey.toBase58(), { isSigner: false, isWritable: meta.isWritable });
    }
    tx.execute(instruction, privileges, 1);
    return tx.getReturnData()?.data ?? null;
  }

  // ============================================================================
  // TRANSACTIONS
  // ============================================================================

  /**
   * Sign, charge fees and execute a transaction. Either every instruction
   * commits or none does; fees are kept either way.
   */
  async sendTransaction(transaction: Transaction, signers: Keypair[]): Promise<TransactionResult> {
    if (!transaction.feePayer) {
      const [payer] = signers;
      if (!payer) throw new RuntimeError("MissingRequiredSignature", "no fee payer");
      transaction.feePayer = payer.publicKey;
    }
    transaction.recentBlockhash = this.blockhash;
    transaction.sign(...signers);

    const message = transaction.compileMessage();
    const signatureCount = message.header.numRequiredSignatures;
    if (!transaction.verifySignatures(true)) {
      throw new TransactionError(-1, new RuntimeError("MissingRequiredSignature"), []);
    }

    const signed = new Set<string>();
    const writable = new Set<string>();
    message.accountKeys.forEach((key, index) => {
      if (message.isAccountSigner(index)) signed.add(key.toBase58());
      if (message.isAccountWritable(index) && !isReservedAccountKey(key)) writable.add(key.toBase58());
    });

    const fee = this.config.lamportsPerSignature * BigInt(signatureCount);
    this.chargeFee(transaction.feePayer, fee);

    const working = this.store.fork();
    const tx = new TransactionContext(working, this.clock, this.rent, this.config, this.programs);
    transaction.instructions.forEach((instruction, index) => {
      const privileges = new Map<string, AccountPrivileges>();
      for (const meta of instruction.keys) {
        const id = meta.pubkey.toBase58();
        privileges.set(id, { isSigner: signed.has(id), isWritable: writable.has(id) });
      }
      try {
        tx.execute(instruction, privileges, 1);
      } catch (error) {
        throw new TransactionError(index, toError(error), [...tx.logs]);
      }
    });

    working.purge();
    this.store = working;

    const signature = transaction.signature;
    return {
      signature: signature ? bs58.encode(signature) : "",
      logs: [...tx.logs],
      fee,
    };
  }

  private chargeFee(payer: PublicKey, fee: bigint): void {
    const account = this.store.peek(payer);
    if (!account || !account.owner.equals(SystemProgram.programId) || account.lamports < fee) {
      throw new TransactionError(-1, new RuntimeError("InsufficientFundsForFee", payer.toBase58()), []);
    }
    account.lamports -= fee;
    this.store.purge();
  }

  // ============================================================================
  // EPOCHS
  // ============================================================================

  /**
   * Close the current epoch. Stake that was fully active during it earns
   * `rewardBps` basis points, credited to both lamports and delegation.
   */
  advanceEpoch(rewardBps: bigint = 0n): EpochRewards {
    const rewards: EpochRewards = { epoch: this.epoch, rewardedAccounts: 0, lamports: 0n };
    if (rewardBps > 0n) {
      for (const [, account] of this.store.entries()) {
        const credited = creditStakeRewards(account, this.epoch, rewardBps);
        if (credited > 0n) {
          rewards.rewardedAccounts += 1;
          rewards.lamports += credited;
        }
      }
    }
    this.epoch += 1n;
    this.blockhash = this.deriveBlockhash();
    return rewards;
  }

  warpEpochs(count: number): void {
    for (let i = 0; i < count; i++) this.advanceEpoch();
  }

  private deriveBlockhash(): string {
    const seed = Buffer.alloc(8);
    seed.writeBigUInt64LE(this.epoch);
    return new PublicKey(sha256(Buffer.concat([Buffer.from("blockhash"), seed]))).toBase58();
  }
}
