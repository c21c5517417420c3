import { Keypair } from "@solana/web3.js";
import { AccountLayout, getAssociatedTokenAddressSync } from "@solana/spl-token";
import { expect } from "chai";
import { LAMPORTS_PER_SOL } from "../src/config.js";
import { SinglePoolError } from "../src/errors.js";
import { getPoolStatus, getTokenBalance } from "../src/program/queries.js";
import { SinglePoolProgram } from "../src/program/transactions.js";
import {
  PoolFixture,
  createDelegatedUser,
  createPoolFixture,
  delegatedStake,
  depositDefault,
  expectPoolError,
  readStake,
  send,
} from "./helpers.js";

/** A pool holding one depositor's minimum delegation */
async function createDepositedPool(): Promise<{ fixture: PoolFixture; wallet: Keypair }> {
  const fixture = await createPoolFixture();
  const { wallet } = await createDelegatedUser(fixture, fixture.minimumDelegation);
  fixture.ledger.advanceEpoch();
  await depositDefault(fixture, wallet);
  return { fixture, wallet };
}

async function withdrawInto(
  fixture: PoolFixture,
  wallet: Keypair,
  tokenAmount: bigint,
  options: { userStakeAuthority?: Keypair } = {}
): Promise<Keypair> {
  const stakeAccount = Keypair.generate();
  const transaction = await SinglePoolProgram.withdraw({
    connection: fixture.ledger,
    pool: fixture.addresses.pool,
    userWallet: wallet.publicKey,
    userStakeAccount: stakeAccount.publicKey,
    tokenAmount,
    createStakeAccount: true,
    userStakeAuthority: options.userStakeAuthority?.publicKey,
  });
  await send(fixture, transaction, [wallet, stakeAccount]);
  return stakeAccount;
}

describe("withdraw", () => {
  it("splits redeemed stake into a new account owned by the user", async () => {
    const { fixture, wallet } = await createDepositedPool();
    const { ledger, addresses, stakeRent, minimumDelegation } = fixture;

    const stakeAccount = await withdrawInto(fixture, wallet, minimumDelegation);

    expect(ledger.getBalance(stakeAccount.publicKey)).to.equal(minimumDelegation + stakeRent);
    const state = readStake(ledger, stakeAccount.publicKey);
    if (state.kind !== "stake") expect.fail(`withdrawn account is ${state.kind}`);
    expect(state.delegation.stake).to.equal(minimumDelegation);
    expect(state.delegation.voter.equals(fixture.vote.address)).to.be.true;
    expect(state.meta.staker.equals(wallet.publicKey)).to.be.true;
    expect(state.meta.withdrawer.equals(wallet.publicKey)).to.be.true;

    const tokenAccount = getAssociatedTokenAddressSync(addresses.mint, wallet.publicKey);
    expect(await getTokenBalance(ledger, tokenAccount)).to.equal(0n);
    expect(ledger.getBalance(addresses.stake)).to.equal(stakeRent + LAMPORTS_PER_SOL);
    expect(delegatedStake(ledger, addresses.stake)).to.equal(LAMPORTS_PER_SOL);
    expect((await getPoolStatus(ledger, addresses.pool)).tokenSupply).to.equal(0n);
  });

  it("hands the new account to the requested authority", async () => {
    const { fixture, wallet } = await createDepositedPool();
    const authority = Keypair.generate();

    const stakeAccount = await withdrawInto(fixture, wallet, fixture.minimumDelegation, { userStakeAuthority: authority });

    const state = readStake(fixture.ledger, stakeAccount.publicKey);
    if (state.kind !== "stake") expect.fail(`withdrawn account is ${state.kind}`);
    expect(state.meta.staker.equals(authority.publicKey)).to.be.true;
    expect(state.meta.withdrawer.equals(authority.publicKey)).to.be.true;
  });

  it("rolls back everything when the pool would be undersized", async () => {
    const { fixture, wallet } = await createDepositedPool();
    const { ledger, addresses, minimumDelegation } = fixture;
    const tokenAccount = getAssociatedTokenAddressSync(addresses.mint, wallet.publicKey);
    const stakeBefore = ledger.getBalance(addresses.stake);

    const stakeAccount = Keypair.generate();
    const transaction = await SinglePoolProgram.withdraw({
      connection: ledger,
      pool: addresses.pool,
      userWallet: wallet.publicKey,
      userStakeAccount: stakeAccount.publicKey,
      tokenAmount: minimumDelegation + 1n,
      createStakeAccount: true,
    });
    const error = await expectPoolError(
      send(fixture, transaction, [wallet, stakeAccount]),
      SinglePoolError.PoolWouldBeUndersized
    );

    expect(error.instructionIndex).to.equal(2);
    expect(ledger.getBalance(addresses.stake)).to.equal(stakeBefore);
    expect(await getTokenBalance(ledger, tokenAccount)).to.equal(minimumDelegation);
    const token = AccountLayout.decode(ledger.getAccount(tokenAccount)?.data ?? Buffer.alloc(0));
    expect(token.delegateOption).to.equal(0);
    expect(ledger.getAccount(stakeAccount.publicKey)).to.be.null;
  });

  it("rejects burning zero tokens", async () => {
    const { fixture, wallet } = await createDepositedPool();
    await expectPoolError(withdrawInto(fixture, wallet, 0n), SinglePoolError.WithdrawalTooSmall);
  });

  it("rejects a withdrawal below the minimum delegation", async () => {
    const { fixture, wallet } = await createDepositedPool();
    await expectPoolError(
      withdrawInto(fixture, wallet, fixture.minimumDelegation / 2n),
      SinglePoolError.InsufficientWithdrawAmount
    );
  });

  it("refuses to split into the pool stake account", async () => {
    const { fixture, wallet } = await createDepositedPool();
    const transaction = await SinglePoolProgram.withdraw({
      connection: fixture.ledger,
      pool: fixture.addresses.pool,
      userWallet: wallet.publicKey,
      userStakeAccount: fixture.addresses.stake,
      tokenAmount: fixture.minimumDelegation,
    });
    await expectPoolError(send(fixture, transaction, [wallet]), SinglePoolError.InvalidPoolStakeAccountUsage);
  });
});
