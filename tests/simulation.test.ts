import { expect } from "chai";
import { DEFAULT_LEDGER_CONFIG, LAMPORTS_PER_SOL, LedgerConfig, SimulationConfig } from "../src/config.js";
import { serializeResults, sharePriceGrowth } from "../src/simulation/report.js";
import { PoolSimulation, SimulationResults, sharePrice } from "../src/simulation/scenario.js";

const SOL = LAMPORTS_PER_SOL;

// Low enough that each epoch's tips can start activating in the onramp
const ledgerConfig: LedgerConfig = { ...DEFAULT_LEDGER_CONFIG, minimumDelegation: 1_000_000n };
const stakeRent = DEFAULT_LEDGER_CONFIG.lamportsPerByteYear * 2n * 328n;

const config: SimulationConfig = {
  epochs: 2,
  depositors: 2,
  depositLamports: 2n * SOL,
  tipLamports: 10_000_000n,
  rewardBps: 0n,
  withdrawFraction: 0.5,
  outputFile: null,
};

describe("simulation", () => {
  let results: SimulationResults;

  before(async () => {
    results = await new PoolSimulation(config, ledgerConfig).run();
  });

  it("mints 1:1 for depositors joining at the same price", () => {
    expect(results.deposits.map((deposit) => deposit.tokensMinted)).to.deep.equal([2n * SOL, 2n * SOL]);
  });

  it("grows the pool by each epoch's tips one epoch after they land", () => {
    expect(results.epochs.map((epoch) => epoch.epoch)).to.deep.equal([1n, 2n]);
    expect(results.epochs.map((epoch) => epoch.delegatedStake)).to.deep.equal([5_000_000_000n, 5_010_000_000n]);
    expect(results.epochs.map((epoch) => epoch.onRampLamports)).to.deep.equal([
      stakeRent + 10_000_000n,
      stakeRent + 10_000_000n,
    ]);
    expect(results.epochs.map((epoch) => epoch.sharePrice)).to.deep.equal([1, 1.0025]);
  });

  it("pays withdrawing depositors their share of the activated tips", () => {
    expect(results.withdrawals.length).to.equal(1);
    expect(results.withdrawals[0]?.tokensBurned).to.equal(2n * SOL);
    expect(results.withdrawals[0]?.stakeReceived).to.equal(2_005_000_000n);
    expect(results.withdrawals[0]?.gain).to.equal(5_000_000n);
  });

  it("leaves the remaining depositor's share in the pool", () => {
    expect(results.final.tokenSupply).to.equal(2n * SOL);
    expect(results.final.delegatedStake).to.equal(3_005_000_000n);
    expect(results.final.value).to.equal(2_005_000_000n);
    expect(sharePrice(results.final)).to.be.closeTo(1.0025, 1e-9);
    expect(sharePriceGrowth(results)).to.be.closeTo(0.25, 1e-6);
  });

  it("counts transactions and fees", () => {
    expect(results.transactions).to.equal(10);
    expect(results.feesPaid).to.equal(55_000n);
  });

  it("serializes bigints and keys as strings", () => {
    const parsed: unknown = JSON.parse(serializeResults(results));
    expect(parsed).to.have.nested.property("final.tokenSupply", "2000000000");
    expect(parsed).to.have.nested.property("final.pool", results.pool);
  });
});
