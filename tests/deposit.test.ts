import { Transaction } from "@solana/web3.js";
import { ACCOUNT_SIZE, getAssociatedTokenAddressSync } from "@solana/spl-token";
import { expect } from "chai";
import { LAMPORTS_PER_SOL } from "../src/config.js";
import { SinglePoolError } from "../src/errors.js";
import { getPoolStatus, getTokenBalance } from "../src/program/queries.js";
import { SinglePoolInstruction } from "../src/program/instruction.js";
import { DepositParams, SinglePoolProgram } from "../src/program/transactions.js";
import { createFundedKeypair, createVoteAccount } from "../src/setup/ledger.js";
import {
  createDelegatedUser,
  createPoolFixture,
  delegatedStake,
  depositDefault,
  readStake,
  expectPoolError,
  replenish,
  send,
  tip,
  withdrawToNewAccount,
} from "./helpers.js";

describe("deposit", () => {
  it("merges an active stake account and mints tokens 1:1 into an empty pool", async () => {
    const fixture = await createPoolFixture();
    const { ledger, addresses, stakeRent, minimumDelegation } = fixture;
    const { wallet, stakeAccount } = await createDelegatedUser(fixture, minimumDelegation);
    ledger.advanceEpoch();

    const walletBefore = ledger.getBalance(wallet.publicKey);
    await depositDefault(fixture, wallet);

    const tokenAccount = getAssociatedTokenAddressSync(addresses.mint, wallet.publicKey);
    expect(await getTokenBalance(ledger, tokenAccount)).to.equal(minimumDelegation);
    expect(ledger.getBalance(addresses.stake)).to.equal(stakeRent + LAMPORTS_PER_SOL + minimumDelegation);
    expect(delegatedStake(ledger, addresses.stake)).to.equal(LAMPORTS_PER_SOL + minimumDelegation);
    expect(ledger.getAccount(stakeAccount)).to.be.null;

    // stake rent comes back; the token account and fee are paid from the wallet
    const tokenAccountRent = ledger.rent.minimumBalance(ACCOUNT_SIZE);
    expect(ledger.getBalance(wallet.publicKey)).to.equal(walletBefore + stakeRent - tokenAccountRent - 5_000n);
  });

  it("mints in proportion once the pool holds value", async () => {
    const fixture = await createPoolFixture();
    const { ledger, addresses } = fixture;
    const first = await createDelegatedUser(fixture, 4n * LAMPORTS_PER_SOL);
    const second = await createDelegatedUser(fixture, 3n * LAMPORTS_PER_SOL);
    ledger.advanceEpoch();

    await depositDefault(fixture, first.wallet);
    await depositDefault(fixture, second.wallet);

    const status = await getPoolStatus(ledger, addresses.pool);
    expect(status.tokenSupply).to.equal(7n * LAMPORTS_PER_SOL);
    expect(status.value).to.equal(7n * LAMPORTS_PER_SOL);
    const secondTokens = getAssociatedTokenAddressSync(addresses.mint, second.wallet.publicKey);
    expect(await getTokenBalance(ledger, secondTokens)).to.equal(3n * LAMPORTS_PER_SOL);
  });

  it("rejects stake delegated to another validator", async () => {
    const fixture = await createPoolFixture();
    const otherVote = createVoteAccount(fixture.ledger);
    const { wallet } = await createDelegatedUser(fixture, fixture.minimumDelegation, otherVote.address);
    fixture.ledger.advanceEpoch();

    await expectPoolError(depositDefault(fixture, wallet), SinglePoolError.WrongValidator);
  });

  it("rejects stake that is still activating", async () => {
    const fixture = await createPoolFixture();
    fixture.ledger.advanceEpoch();
    const { wallet, stakeAccount } = await createDelegatedUser(fixture, fixture.minimumDelegation);

    await expectPoolError(depositDefault(fixture, wallet), SinglePoolError.StakeNotFullyActive);
    expect(delegatedStake(fixture.ledger, stakeAccount)).to.equal(fixture.minimumDelegation);
  });

  it("returns undelegated lamports above 2^53 with the stake rent", async () => {
    const fixture = await createPoolFixture();
    const { ledger, addresses, stakeRent, minimumDelegation } = fixture;
    const { wallet, stakeAccount } = await createDelegatedUser(fixture, minimumDelegation);
    ledger.advanceEpoch();
    const loose = 2n ** 53n;
    ledger.airdrop(stakeAccount, loose);

    const walletBefore = ledger.getBalance(wallet.publicKey);
    await depositDefault(fixture, wallet);

    const tokenAccountRent = ledger.rent.minimumBalance(ACCOUNT_SIZE);
    expect(ledger.getBalance(wallet.publicKey)).to.equal(walletBefore + stakeRent + loose - tokenAccountRent - 5_000n);
    expect(ledger.getBalance(addresses.stake)).to.equal(stakeRent + LAMPORTS_PER_SOL + minimumDelegation);
    expect(delegatedStake(ledger, addresses.stake)).to.equal(LAMPORTS_PER_SOL + minimumDelegation);
  });

  it("rejects a deposit worth less than one pool token", async () => {
    const fixture = await createPoolFixture();
    const { ledger, addresses } = fixture;
    const alice = await createDelegatedUser(fixture, 2n * LAMPORTS_PER_SOL);
    const bob = await createDelegatedUser(fixture, LAMPORTS_PER_SOL);
    ledger.advanceEpoch();

    // a single token left, backed by a single lamport
    await depositDefault(fixture, alice.wallet);
    await withdrawToNewAccount(fixture, alice.wallet, 2n * LAMPORTS_PER_SOL - 1n);

    // 2 SOL of tips activate in the onramp and join the pool stake
    await tip(fixture, addresses.onRamp, 2n * LAMPORTS_PER_SOL);
    await replenish(fixture);
    ledger.advanceEpoch();
    await replenish(fixture);
    const status = await getPoolStatus(ledger, addresses.pool);
    expect(status.tokenSupply).to.equal(1n);
    expect(status.value).to.equal(2n * LAMPORTS_PER_SOL + 1n);

    // 1 SOL * 1 / (2 SOL + 1) rounds down to zero tokens
    await expectPoolError(depositDefault(fixture, bob.wallet), SinglePoolError.DepositTooSmall);
    expect(delegatedStake(ledger, bob.stakeAccount)).to.equal(LAMPORTS_PER_SOL);
  });

  it("requires the stake authority to sign when it is not the pool", async () => {
    const fixture = await createPoolFixture();
    const { ledger, addresses, payer, minimumDelegation } = fixture;
    const { wallet, stakeAccount } = await createDelegatedUser(fixture, minimumDelegation);
    ledger.advanceEpoch();

    const instruction = SinglePoolInstruction.depositStake({
      pool: addresses.pool,
      userStakeAccount: stakeAccount,
      userTokenAccount: getAssociatedTokenAddressSync(addresses.mint, wallet.publicKey),
      userLamportAccount: wallet.publicKey,
      userStakeAuthority: wallet.publicKey,
    });
    instruction.keys = instruction.keys.map((meta) =>
      meta.pubkey.equals(wallet.publicKey) ? { ...meta, isSigner: false } : meta
    );

    await expectPoolError(send(fixture, new Transaction().add(instruction), [payer]), SinglePoolError.SignatureMissing);
    const state = readStake(ledger, stakeAccount);
    if (state.kind !== "stake") expect.fail(`user stake is ${state.kind}`);
    expect(state.meta.staker.equals(wallet.publicKey)).to.be.true;
  });

  it("requires the pool stake to be active", async () => {
    const fixture = await createPoolFixture();
    const { wallet } = await createDelegatedUser(fixture, fixture.minimumDelegation);

    await expectPoolError(depositDefault(fixture, wallet), SinglePoolError.WrongStakeState);
  });

  it("refuses the pool's own onramp as a deposit", async () => {
    const fixture = await createPoolFixture();
    fixture.ledger.advanceEpoch();
    const wallet = createFundedKeypair(fixture.ledger, LAMPORTS_PER_SOL);

    const transaction = await SinglePoolProgram.deposit({
      connection: fixture.ledger,
      pool: fixture.addresses.pool,
      userWallet: wallet.publicKey,
      userStakeAccount: fixture.addresses.onRamp,
    });
    await expectPoolError(send(fixture, transaction, [wallet]), SinglePoolError.InvalidPoolStakeAccountUsage);
  });

  describe("client", () => {
    it("needs exactly one stake source", async () => {
      const fixture = await createPoolFixture();
      const wallet = createFundedKeypair(fixture.ledger, LAMPORTS_PER_SOL);
      const base = { connection: fixture.ledger, pool: fixture.addresses.pool, userWallet: wallet.publicKey };

      const cases: [DepositParams, string][] = [
        [base, "no stake account to deposit"],
        [
          { ...base, userStakeAccount: wallet.publicKey, depositFromDefaultAccount: true },
          "pass either userStakeAccount or depositFromDefaultAccount, not both",
        ],
      ];
      for (const [params, message] of cases) {
        try {
          await SinglePoolProgram.deposit(params);
          expect.fail("Should have rejected the stake source");
        } catch (error) {
          expect(error instanceof Error ? error.message : "").to.equal(message);
        }
      }
    });

    it("fails for an address that is not a pool", async () => {
      const fixture = await createPoolFixture({ initialize: false });
      const wallet = createFundedKeypair(fixture.ledger, LAMPORTS_PER_SOL);
      try {
        await SinglePoolProgram.deposit({
          connection: fixture.ledger,
          pool: fixture.addresses.pool,
          userWallet: wallet.publicKey,
          depositFromDefaultAccount: true,
        });
        expect.fail("Should have thrown for a missing pool");
      } catch (error) {
        expect(error instanceof Error ? error.message : "").to.equal(
          `${fixture.addresses.pool.toBase58()} is not a single-validator pool`
        );
      }
    });
  });
});
