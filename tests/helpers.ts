import { Keypair, PublicKey, SystemProgram, Transaction } from "@solana/web3.js";
import { expect } from "chai";
import { DEFAULT_LEDGER_CONFIG, LAMPORTS_PER_SOL, LedgerConfig } from "../src/config.js";
import { PoolProgramError, SinglePoolError } from "../src/errors.js";
import { STAKE_STATE_SIZE, decodeStakeState, StakeState } from "../src/interfaces/stake.js";
import { PoolAddresses, findDefaultDepositAccountAddress, getPoolAddresses } from "../src/program/addresses.js";
import { SinglePoolProgram } from "../src/program/transactions.js";
import { TransactionError } from "../src/runtime/errors.js";
import { Ledger, TransactionResult } from "../src/runtime/ledger.js";
import { VoteAccountSetup, createFundedKeypair, createLocalLedger, createVoteAccount } from "../src/setup/ledger.js";

export interface PoolFixture {
  ledger: Ledger;
  payer: Keypair;
  vote: VoteAccountSetup;
  addresses: PoolAddresses;
  stakeRent: bigint;
  minimumDelegation: bigint;
}

/**
 * Fresh ledger with a vote account and a funded payer. The pool is
 * initialized (with metadata) unless `initialize` is false.
 */
export async function createPoolFixture(
  options: { initialize?: boolean; config?: LedgerConfig } = {}
): Promise<PoolFixture> {
  const config = options.config ?? DEFAULT_LEDGER_CONFIG;
  const ledger = createLocalLedger(config);
  const payer = createFundedKeypair(ledger, 100n * LAMPORTS_PER_SOL);
  const vote = createVoteAccount(ledger);
  const fixture: PoolFixture = {
    ledger,
    payer,
    vote,
    addresses: getPoolAddresses(vote.address),
    stakeRent: ledger.rent.minimumBalance(STAKE_STATE_SIZE),
    minimumDelegation: config.minimumDelegation,
  };

  if (options.initialize ?? true) {
    await send(fixture, await SinglePoolProgram.initialize(ledger, vote.address, payer.publicKey), [payer]);
  }
  return fixture;
}

export function send(fixture: PoolFixture, transaction: Transaction, signers: Keypair[]): Promise<TransactionResult> {
  return fixture.ledger.sendTransaction(transaction, signers);
}

/**
 * A wallet holding `stakeLamports` of stake (plus rent) in its default
 * deposit account for the fixture's pool, delegated to `voteAccount`
 * (the pool's validator unless given)
 */
export async function createDelegatedUser(
  fixture: PoolFixture,
  stakeLamports: bigint,
  voteAccount: PublicKey = fixture.vote.address
): Promise<{ wallet: Keypair; stakeAccount: PublicKey }> {
  const wallet = createFundedKeypair(fixture.ledger, stakeLamports + LAMPORTS_PER_SOL);
  const transaction = await SinglePoolProgram.createAndDelegateUserStake(
    fixture.ledger,
    voteAccount,
    wallet.publicKey,
    stakeLamports,
    fixture.addresses.pool
  );
  await send(fixture, transaction, [wallet]);
  return { wallet, stakeAccount: findDefaultDepositAccountAddress(fixture.addresses.pool, wallet.publicKey) };
}

export async function depositDefault(fixture: PoolFixture, wallet: Keypair): Promise<TransactionResult> {
  const transaction = await SinglePoolProgram.deposit({
    connection: fixture.ledger,
    pool: fixture.addresses.pool,
    userWallet: wallet.publicKey,
    depositFromDefaultAccount: true,
  });
  return send(fixture, transaction, [wallet]);
}

export function readStake(ledger: Ledger, address: PublicKey): StakeState {
  const account = ledger.getAccount(address);
  const state = account ? decodeStakeState(account.data) : null;
  if (!state) throw new Error(`${address.toBase58()} is not a stake account`);
  return state;
}

/** Delegated stake of a stake account; fails the test if it is not delegated */
export function delegatedStake(ledger: Ledger, address: PublicKey): bigint {
  const state = readStake(ledger, address);
  if (state.kind !== "stake") expect.fail(`${address.toBase58()} is ${state.kind}, not delegated`);
  return state.delegation.stake;
}

export async function expectTransactionError(promise: Promise<unknown>): Promise<TransactionError> {
  let caught: unknown = null;
  try {
    await promise;
  } catch (error) {
    caught = error;
  }
  if (!(caught instanceof TransactionError)) {
    expect.fail(`expected a failed transaction, got ${caught === null ? "success" : String(caught)}`);
  }
  return caught;
}

/**
 * Await a transaction that must fail with the given pool program error
 */
export async function expectPoolError(promise: Promise<unknown>, code: SinglePoolError): Promise<TransactionError> {
  const error = await expectTransactionError(promise);
  if (!(error.failure instanceof PoolProgramError)) {
    expect.fail(`expected ${SinglePoolError[code]}, got ${error.failure.message}`);
  }
  expect(error.failure.errorName).to.equal(SinglePoolError[code]);
  return error;
}

export async function replenish(fixture: PoolFixture): Promise<string[]> {
  const result = await send(fixture, await SinglePoolProgram.replenishPool(fixture.vote.address), [fixture.payer]);
  return result.logs;
}

/** Pay `lamports` from the fixture payer straight into an account */
export async function tip(fixture: PoolFixture, to: PublicKey, lamports: bigint): Promise<void> {
  const transfer = SystemProgram.transfer({ fromPubkey: fixture.payer.publicKey, toPubkey: to, lamports });
  await send(fixture, new Transaction().add(transfer), [fixture.payer]);
}

/**
 * Burn `tokenAmount` of the wallet's pool tokens for a new stake account
 */
export async function withdrawToNewAccount(
  fixture: PoolFixture,
  wallet: Keypair,
  tokenAmount: bigint
): Promise<PublicKey> {
  const stakeAccount = Keypair.generate();
  const transaction = await SinglePoolProgram.withdraw({
    connection: fixture.ledger,
    pool: fixture.addresses.pool,
    userWallet: wallet.publicKey,
    userStakeAccount: stakeAccount.publicKey,
    tokenAmount,
    createStakeAccount: true,
  });
  await send(fixture, transaction, [wallet, stakeAccount]);
  return stakeAccount.publicKey;
}
