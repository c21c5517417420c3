import {
  Keypair,
  PublicKey,
  SYSVAR_CLOCK_PUBKEY,
  SystemProgram,
  Transaction,
  TransactionInstruction,
} from "@solana/web3.js";
import { expect } from "chai";
import { DEFAULT_LEDGER_CONFIG, LAMPORTS_PER_SOL } from "../src/config.js";
import { RuntimeError, RuntimeErrorKind } from "../src/runtime/errors.js";
import { InvokeContext, Program } from "../src/runtime/invoke.js";
import { Ledger } from "../src/runtime/ledger.js";
import { createFundedKeypair, createLocalLedger } from "../src/setup/ledger.js";
import { expectTransactionError } from "./helpers.js";

/** Test program whose behavior is chosen by the first data byte */
class ScriptedProgram implements Program {
  readonly programId = Keypair.generate().publicKey;
  readonly name = "scripted";

  process(ctx: InvokeContext): void {
    const from = ctx.account(0);
    const to = ctx.account(1);
    switch (ctx.data[0]) {
      case 0:
        // transfer on behalf of an account that did not sign
        ctx.invoke(SystemProgram.transfer({ fromPubkey: from.key, toPubkey: to.key, lamports: 1 }));
        return;
      case 1:
        // debit an account owned by the system program
        from.lamports -= 1n;
        to.lamports += 1n;
        return;
      case 2: {
        // transfer with the clock sysvar flagged writable
        const transfer = SystemProgram.transfer({ fromPubkey: from.key, toPubkey: to.key, lamports: 1 });
        transfer.keys.push({ pubkey: SYSVAR_CLOCK_PUBKEY, isSigner: false, isWritable: true });
        ctx.invoke(transfer);
        return;
      }
      case 3:
        ctx.log(`clock writable: ${ctx.account(3).isWritable}`);
        return;
      default:
        throw new Error("scripted failure");
    }
  }
}

function scripted(program: ScriptedProgram, mode: number, from: PublicKey, to: PublicKey): TransactionInstruction {
  return new TransactionInstruction({
    programId: program.programId,
    keys: [
      { pubkey: from, isSigner: false, isWritable: true },
      { pubkey: to, isSigner: false, isWritable: true },
      { pubkey: SystemProgram.programId, isSigner: false, isWritable: false },
      { pubkey: SYSVAR_CLOCK_PUBKEY, isSigner: false, isWritable: false },
    ],
    data: Buffer.from([mode]),
  });
}

async function expectRuntimeError(promise: Promise<unknown>, kind: RuntimeErrorKind): Promise<void> {
  const error = await expectTransactionError(promise);
  expect(error.failure).to.be.instanceOf(RuntimeError);
  if (error.failure instanceof RuntimeError) expect(error.failure.kind).to.equal(kind);
}

describe("ledger runtime", () => {
  let ledger: Ledger;
  let program: ScriptedProgram;
  let payer: Keypair;
  let victim: Keypair;
  let recipient: PublicKey;

  beforeEach(() => {
    ledger = createLocalLedger();
    program = new ScriptedProgram();
    ledger.addProgram(program);
    payer = createFundedKeypair(ledger, 10n * LAMPORTS_PER_SOL);
    victim = createFundedKeypair(ledger, LAMPORTS_PER_SOL);
    recipient = Keypair.generate().publicKey;
  });

  it("charges 5000 lamports per signature", async () => {
    const transfer = SystemProgram.transfer({ fromPubkey: victim.publicKey, toPubkey: recipient, lamports: 1_000 });
    const result = await ledger.sendTransaction(new Transaction().add(transfer), [payer, victim]);

    expect(result.fee).to.equal(10_000n);
    expect(ledger.getBalance(payer.publicKey)).to.equal(10n * LAMPORTS_PER_SOL - 10_000n);
    expect(ledger.getBalance(victim.publicKey)).to.equal(LAMPORTS_PER_SOL - 1_000n);
    expect(ledger.getBalance(recipient)).to.equal(1_000n);
  });

  it("rolls back every instruction when one fails but keeps the fee", async () => {
    const transaction = new Transaction()
      .add(SystemProgram.transfer({ fromPubkey: payer.publicKey, toPubkey: recipient, lamports: 1_000 }))
      .add(scripted(program, 9, victim.publicKey, recipient));

    const error = await expectTransactionError(ledger.sendTransaction(transaction, [payer]));

    expect(error.instructionIndex).to.equal(1);
    expect(error.failure.message).to.equal("scripted failure");
    expect(ledger.getAccount(recipient)).to.be.null;
    expect(ledger.getBalance(payer.publicKey)).to.equal(10n * LAMPORTS_PER_SOL - 5_000n);
  });

  it("records program logs for failed transactions", async () => {
    const transaction = new Transaction().add(scripted(program, 9, victim.publicKey, recipient));
    const error = await expectTransactionError(ledger.sendTransaction(transaction, [payer]));

    const id = program.programId.toBase58();
    expect(error.logs).to.deep.equal([`Program ${id} invoke [1]`, `Program ${id} failed: scripted failure`]);
  });

  it("refuses signer privileges the caller does not hold", async () => {
    const transaction = new Transaction().add(scripted(program, 0, victim.publicKey, recipient));
    await expectRuntimeError(ledger.sendTransaction(transaction, [payer]), "PrivilegeEscalation");
    expect(ledger.getBalance(victim.publicKey)).to.equal(LAMPORTS_PER_SOL);
  });

  it("treats a writable sysvar in a cross-program call as read-only", async () => {
    const transaction = new Transaction().add(scripted(program, 2, payer.publicKey, recipient));
    await ledger.sendTransaction(transaction, [payer]);

    expect(ledger.getBalance(recipient)).to.equal(1n);
    expect(ledger.getBalance(payer.publicKey)).to.equal(10n * LAMPORTS_PER_SOL - 5_000n - 1n);
  });

  it("demotes a writable sysvar in a top-level instruction", async () => {
    const instruction = scripted(program, 3, payer.publicKey, recipient);
    instruction.keys = instruction.keys.map((meta) =>
      meta.pubkey.equals(SYSVAR_CLOCK_PUBKEY) ? { ...meta, isWritable: true } : meta
    );
    const result = await ledger.sendTransaction(new Transaction().add(instruction), [payer]);

    expect(result.logs).to.include("Program log: clock writable: false");
  });

  it("refuses debits from accounts the program does not own", async () => {
    const transaction = new Transaction().add(scripted(program, 1, victim.publicKey, recipient));
    await expectRuntimeError(ledger.sendTransaction(transaction, [payer]), "ExternalAccountLamportSpend");
  });

  it("requires every signature", async () => {
    const transfer = SystemProgram.transfer({ fromPubkey: victim.publicKey, toPubkey: recipient, lamports: 1_000 });
    const transaction = new Transaction().add(transfer);
    transaction.feePayer = payer.publicKey;

    await expectRuntimeError(ledger.sendTransaction(transaction, [payer]), "MissingRequiredSignature");
    expect(ledger.getBalance(payer.publicKey)).to.equal(10n * LAMPORTS_PER_SOL);
  });

  it("requires the fee payer to afford the fee", async () => {
    const broke = Keypair.generate();
    const transfer = SystemProgram.transfer({ fromPubkey: broke.publicKey, toPubkey: recipient, lamports: 0 });
    await expectRuntimeError(ledger.sendTransaction(new Transaction().add(transfer), [broke]), "InsufficientFundsForFee");
  });

  it("reports the stake program's minimum delegation", async () => {
    const custom = createLocalLedger({ ...DEFAULT_LEDGER_CONFIG, minimumDelegation: 2n * LAMPORTS_PER_SOL });
    expect(await custom.getStakeMinimumDelegation()).to.equal(2n * LAMPORTS_PER_SOL);
  });

  it("advances epochs and changes the blockhash", () => {
    const blockhash = ledger.latestBlockhash;
    const rewards = ledger.advanceEpoch();

    expect(rewards.epoch).to.equal(0n);
    expect(ledger.clock.epoch).to.equal(1n);
    expect(ledger.clock.slot).to.equal(DEFAULT_LEDGER_CONFIG.slotsPerEpoch);
    expect(ledger.latestBlockhash).to.not.equal(blockhash);
  });
});
