import { Transaction } from "@solana/web3.js";
import { expect } from "chai";
import { LAMPORTS_PER_SOL, U64_MAX } from "../src/config.js";
import { SinglePoolError } from "../src/errors.js";
import { deactivateDelinquentInstruction, stakeStatus } from "../src/interfaces/stake.js";
import { emptyAccount } from "../src/runtime/accounts.js";
import { getPoolStatus } from "../src/program/queries.js";
import { SinglePoolProgram } from "../src/program/transactions.js";
import { createVoteAccount } from "../src/setup/ledger.js";
import {
  PoolFixture,
  createDelegatedUser,
  createPoolFixture,
  delegatedStake,
  depositDefault,
  expectPoolError,
  readStake,
  replenish,
  send,
  tip,
} from "./helpers.js";

const STAKE_TIP = 600_000_000n;
const ONRAMP_TIP = 400_000_000n;

async function tipBoth(fixture: PoolFixture): Promise<void> {
  await tip(fixture, fixture.addresses.stake, STAKE_TIP);
  await tip(fixture, fixture.addresses.onRamp, ONRAMP_TIP);
}

/**
 * Deactivate the pool stake through a reference validator that voted in
 * every one of the last five epochs while the pool's validator voted in none
 */
async function deactivateDelinquentPool(fixture: PoolFixture): Promise<void> {
  const epoch = fixture.ledger.clock.epoch;
  const reference = createVoteAccount(fixture.ledger, {
    votedEpochs: [epoch - 4n, epoch - 3n, epoch - 2n, epoch - 1n, epoch],
  });
  const instruction = deactivateDelinquentInstruction({
    stake: fixture.addresses.stake,
    delinquentVote: fixture.vote.address,
    referenceVote: reference.address,
  });
  await send(fixture, new Transaction().add(instruction), [fixture.payer]);
}

function poolStakeStatus(fixture: PoolFixture): string {
  const state = readStake(fixture.ledger, fixture.addresses.stake);
  if (state.kind !== "stake") expect.fail(`pool stake is ${state.kind}`);
  return stakeStatus(state.delegation, fixture.ledger.clock.epoch);
}

describe("replenish", () => {
  it("does nothing while the pool stake is activating", async () => {
    const fixture = await createPoolFixture();
    const logs = await replenish(fixture);

    expect(logs).to.include("Program log: Pool stake is activating, nothing to replenish");
    expect(delegatedStake(fixture.ledger, fixture.addresses.stake)).to.equal(LAMPORTS_PER_SOL);
  });

  it("does nothing when there is no excess", async () => {
    const fixture = await createPoolFixture();
    fixture.ledger.advanceEpoch();
    const logs = await replenish(fixture);

    expect(logs).to.include("Program log: No excess lamports to delegate");
    expect(fixture.ledger.getBalance(fixture.addresses.onRamp)).to.equal(fixture.stakeRent);
    expect(delegatedStake(fixture.ledger, fixture.addresses.stake)).to.equal(LAMPORTS_PER_SOL);
  });

  it("gathers tips in the onramp and starts activating them", async () => {
    const fixture = await createPoolFixture();
    const { ledger, addresses, stakeRent } = fixture;
    ledger.advanceEpoch();
    await tipBoth(fixture);

    const logs = await replenish(fixture);

    expect(logs).to.include(`Program log: Moved ${STAKE_TIP} excess lamports to the onramp`);
    expect(logs).to.include(`Program log: Delegated ${STAKE_TIP + ONRAMP_TIP} lamports in the onramp`);
    expect(ledger.getBalance(addresses.stake)).to.equal(stakeRent + LAMPORTS_PER_SOL);
    expect(delegatedStake(ledger, addresses.stake)).to.equal(LAMPORTS_PER_SOL);
    expect(ledger.getBalance(addresses.onRamp)).to.equal(stakeRent + STAKE_TIP + ONRAMP_TIP);

    const onRamp = readStake(ledger, addresses.onRamp);
    if (onRamp.kind !== "stake") expect.fail(`onramp is ${onRamp.kind}`);
    expect(onRamp.delegation.stake).to.equal(STAKE_TIP + ONRAMP_TIP);
    expect(stakeStatus(onRamp.delegation, ledger.clock.epoch)).to.equal("activating");

    // activating tips are not pool value yet
    expect((await getPoolStatus(ledger, addresses.pool)).value).to.equal(0n);
  });

  it("moves activated onramp stake into the pool stake next epoch", async () => {
    const fixture = await createPoolFixture();
    const { ledger, addresses, stakeRent } = fixture;
    ledger.advanceEpoch();
    await tipBoth(fixture);
    await replenish(fixture);
    ledger.advanceEpoch();

    const logs = await replenish(fixture);

    expect(logs).to.include(`Program log: Moved ${STAKE_TIP + ONRAMP_TIP} lamports of active onramp stake into the pool`);
    expect(logs).to.not.include("Program log: No excess lamports to delegate");
    expect(delegatedStake(ledger, addresses.stake)).to.equal(2n * LAMPORTS_PER_SOL);
    expect(ledger.getBalance(addresses.stake)).to.equal(stakeRent + 2n * LAMPORTS_PER_SOL);
    expect(ledger.getBalance(addresses.onRamp)).to.equal(stakeRent);
    expect(readStake(ledger, addresses.onRamp).kind).to.equal("initialized");

    const status = await getPoolStatus(ledger, addresses.pool);
    expect(status.value).to.equal(LAMPORTS_PER_SOL);
    expect(status.onRampLamports).to.equal(stakeRent);
  });

  it("can be cranked repeatedly", async () => {
    const fixture = await createPoolFixture();
    fixture.ledger.advanceEpoch();
    await tipBoth(fixture);
    await replenish(fixture);
    const logs = await replenish(fixture);

    expect(logs).to.include("Program log: No excess lamports to delegate");
    expect(delegatedStake(fixture.ledger, fixture.addresses.stake)).to.equal(LAMPORTS_PER_SOL);
    expect(delegatedStake(fixture.ledger, fixture.addresses.onRamp)).to.equal(STAKE_TIP + ONRAMP_TIP);
  });

  it("holds tips below the minimum delegation in the onramp", async () => {
    const fixture = await createPoolFixture();
    const { ledger, addresses, stakeRent } = fixture;
    ledger.advanceEpoch();
    await tip(fixture, addresses.stake, STAKE_TIP);

    const logs = await replenish(fixture);

    expect(logs).to.include(`Program log: Moved ${STAKE_TIP} excess lamports to the onramp`);
    expect(logs).to.not.include(`Program log: Delegated ${STAKE_TIP} lamports in the onramp`);
    expect(ledger.getBalance(addresses.onRamp)).to.equal(stakeRent + STAKE_TIP);
    expect(readStake(ledger, addresses.onRamp).kind).to.equal("initialized");
  });

  it("requires the onramp account to exist", async () => {
    const fixture = await createPoolFixture();
    fixture.ledger.advanceEpoch();
    fixture.ledger.setAccount(fixture.addresses.onRamp, emptyAccount());

    const transaction = await SinglePoolProgram.replenishPool(fixture.vote.address);
    await expectPoolError(send(fixture, transaction, [fixture.payer]), SinglePoolError.OnRampDoesntExist);
  });

  it("rejects a vote account that does not match the pool", async () => {
    const fixture = await createPoolFixture();
    const other = createVoteAccount(fixture.ledger);
    const transaction = await SinglePoolProgram.replenishPool(other.address);
    await expectPoolError(send(fixture, transaction, [fixture.payer]), SinglePoolError.InvalidPoolAccount);
  });

  describe("after a delinquent deactivation", () => {
    it("cancels the deactivation within the same epoch", async () => {
      const fixture = await createPoolFixture();
      fixture.ledger.warpEpochs(5);
      await deactivateDelinquentPool(fixture);
      expect(poolStakeStatus(fixture)).to.equal("deactivating");

      const logs = await replenish(fixture);

      expect(logs).to.include("Program log: Pool stake is deactivating, delegating it again");
      const state = readStake(fixture.ledger, fixture.addresses.stake);
      if (state.kind !== "stake") expect.fail(`pool stake is ${state.kind}`);
      expect(state.delegation.deactivationEpoch).to.equal(U64_MAX);
      expect(state.delegation.activationEpoch).to.equal(0n);
      expect(poolStakeStatus(fixture)).to.equal("active");
    });

    it("re-delegates inactive pool stake so deposits resume an epoch later", async () => {
      const fixture = await createPoolFixture();
      const { ledger } = fixture;
      const { wallet } = await createDelegatedUser(fixture, fixture.minimumDelegation);
      ledger.warpEpochs(5);
      await deactivateDelinquentPool(fixture);

      await expectPoolError(depositDefault(fixture, wallet), SinglePoolError.WrongStakeState);
      ledger.advanceEpoch();
      expect(poolStakeStatus(fixture)).to.equal("inactive");

      const logs = await replenish(fixture);
      expect(logs).to.include("Program log: Pool stake is inactive, delegating it again");
      expect(poolStakeStatus(fixture)).to.equal("activating");
      await expectPoolError(depositDefault(fixture, wallet), SinglePoolError.WrongStakeState);

      ledger.advanceEpoch();
      await depositDefault(fixture, wallet);
      expect(delegatedStake(ledger, fixture.addresses.stake)).to.equal(LAMPORTS_PER_SOL + fixture.minimumDelegation);
    });
  });
});
