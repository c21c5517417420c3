import { Keypair, PublicKey, SystemProgram, Transaction, TransactionInstruction } from "@solana/web3.js";
import { getAssociatedTokenAddressSync } from "@solana/spl-token";
import { LAMPORTS_PER_SOL, LedgerConfig, DEFAULT_LEDGER_CONFIG, SimulationConfig, formatSol } from "../config.js";
import { STAKE_STATE_SIZE } from "../interfaces/stake.js";
import { getPoolAddresses, PoolAddresses } from "../program/addresses.js";
import { getPoolStatus, getTokenBalance, PoolStatus } from "../program/queries.js";
import { SinglePoolProgram } from "../program/transactions.js";
import { TransactionError } from "../runtime/errors.js";
import { Ledger } from "../runtime/ledger.js";
import { createFundedKeypair, createLocalLedger, createVoteAccount } from "../setup/ledger.js";
import { endProgress, logItem, logOk, logProgress, logSection, logTransaction, logger } from "../utils/logger.js";

// ============================================================================
// RESULT TYPES
// ============================================================================

export interface DepositRecord {
  depositor: string;
  stakeLamports: bigint;
  tokensMinted: bigint;
}

export interface EpochRecord {
  epoch: bigint;
  tips: bigint;
  rewards: bigint;
  delegatedStake: bigint;
  onRampLamports: bigint;
  tokenSupply: bigint;
  value: bigint;
  /** Lamports of pool value per pool token */
  sharePrice: number;
}

export interface WithdrawalRecord {
  depositor: string;
  tokensBurned: bigint;
  stakeReceived: bigint;
  /** stakeReceived minus the stake originally deposited */
  gain: bigint;
}

export interface SimulationResults {
  voteAccount: string;
  pool: string;
  deposits: DepositRecord[];
  epochs: EpochRecord[];
  withdrawals: WithdrawalRecord[];
  final: PoolStatus;
  transactions: number;
  feesPaid: bigint;
}

interface Depositor {
  keypair: Keypair;
  deposited: bigint;
}

/** Fee headroom each depositor gets on top of the stake it deposits */
const DEPOSITOR_FEE_BUDGET = LAMPORTS_PER_SOL;

export function sharePrice(status: Pick<PoolStatus, "value" | "tokenSupply">): number {
  return status.tokenSupply === 0n ? 1 : Number(status.value) / Number(status.tokenSupply);
}

// ============================================================================
// SIMULATION
// ============================================================================

/**
 * Scripted life of one pool: depositors join through their default deposit
 * accounts, tips land in the stake and onramp accounts every epoch, a crank
 * replenishes, rewards accrue, and some depositors redeem at the end.
 */
export class PoolSimulation {
  readonly ledger: Ledger;
  private readonly payer: Keypair;
  private readonly depositors: Depositor[] = [];
  private transactions = 0;
  private feesPaid = 0n;

  constructor(
    private readonly config: SimulationConfig,
    ledgerConfig: LedgerConfig = DEFAULT_LEDGER_CONFIG
  ) {
    this.ledger = createLocalLedger(ledgerConfig);
    const tipBudget = config.tipLamports * BigInt(config.epochs);
    this.payer = createFundedKeypair(this.ledger, 100n * LAMPORTS_PER_SOL + tipBudget);
  }

  async run(): Promise<SimulationResults> {
    const addresses = await this.setupPool();
    const deposits = await this.depositAll(addresses);
    const epochs = await this.runEpochs(addresses);
    const withdrawals = await this.withdrawSome(addresses);

    return {
      voteAccount: addresses.voteAccount.toBase58(),
      pool: addresses.pool.toBase58(),
      deposits,
      epochs,
      withdrawals,
      final: await getPoolStatus(this.ledger, addresses.pool),
      transactions: this.transactions,
      feesPaid: this.feesPaid,
    };
  }

  private async setupPool(): Promise<PoolAddresses> {
    logSection("Setting Up Pool");

    const vote = createVoteAccount(this.ledger);
    const addresses = getPoolAddresses(vote.address);
    logItem(`Vote account: ${vote.address.toBase58()}`);
    logItem(`Pool: ${addresses.pool.toBase58()}`);

    await this.send(await SinglePoolProgram.initialize(this.ledger, vote.address, this.payer.publicKey), [this.payer]);
    logOk("Pool initialized with token metadata");

    for (let i = 0; i < this.config.depositors; i++) {
      const keypair = createFundedKeypair(this.ledger, this.config.depositLamports + DEPOSITOR_FEE_BUDGET);
      const transaction = await SinglePoolProgram.createAndDelegateUserStake(
        this.ledger,
        vote.address,
        keypair.publicKey,
        this.config.depositLamports
      );
      await this.send(transaction, [keypair]);
      this.depositors.push({ keypair, deposited: this.config.depositLamports });
    }
    logOk(`${this.depositors.length} depositors delegated ${formatSol(this.config.depositLamports)} SOL each`);

    // Pool stake and user stake activate at the epoch boundary
    this.ledger.advanceEpoch();
    return addresses;
  }

  private async depositAll(addresses: PoolAddresses): Promise<DepositRecord[]> {
    logSection("Depositing Stake");

    const records: DepositRecord[] = [];
    for (const [index, depositor] of this.depositors.entries()) {
      logProgress(index + 1, this.depositors.length, "deposits");
      const owner = depositor.keypair.publicKey;
      const tokenAccount = getAssociatedTokenAddressSync(addresses.mint, owner);
      const before = await getTokenBalance(this.ledger, tokenAccount);

      const transaction = await SinglePoolProgram.deposit({
        connection: this.ledger,
        pool: addresses.pool,
        userWallet: owner,
        depositFromDefaultAccount: true,
      });
      await this.send(transaction, [depositor.keypair]);

      records.push({
        depositor: owner.toBase58(),
        stakeLamports: depositor.deposited,
        tokensMinted: (await getTokenBalance(this.ledger, tokenAccount)) - before,
      });
    }
    endProgress();
    logOk(`Deposited ${records.length} stake accounts`);
    return records;
  }

  private async runEpochs(addresses: PoolAddresses): Promise<EpochRecord[]> {
    logSection("Running Epochs");

    const records: EpochRecord[] = [];
    const stakeTip = this.config.tipLamports / 2n;
    const onRampTip = this.config.tipLamports - stakeTip;

    for (let i = 0; i < this.config.epochs; i++) {
      logProgress(i + 1, this.config.epochs, `epoch ${this.ledger.clock.epoch}`);

      if (this.config.tipLamports > 0n) {
        const tips = new Transaction();
        if (stakeTip > 0n) tips.add(this.transfer(addresses.stake, stakeTip));
        if (onRampTip > 0n) tips.add(this.transfer(addresses.onRamp, onRampTip));
        await this.send(tips, [this.payer]);
      }

      await this.send(await SinglePoolProgram.replenishPool(addresses.voteAccount), [this.payer]);
      const status = await getPoolStatus(this.ledger, addresses.pool);
      const { epoch, lamports } = this.ledger.advanceEpoch(this.config.rewardBps);

      records.push({
        epoch,
        tips: this.config.tipLamports,
        rewards: lamports,
        delegatedStake: status.delegatedStake,
        onRampLamports: status.onRampLamports,
        tokenSupply: status.tokenSupply,
        value: status.value,
        sharePrice: sharePrice(status),
      });
    }
    endProgress();
    logOk(`Ran ${records.length} epochs`);
    return records;
  }

  private async withdrawSome(addresses: PoolAddresses): Promise<WithdrawalRecord[]> {
    logSection("Withdrawing Stake");

    const count = Math.floor(this.depositors.length * this.config.withdrawFraction);
    const stakeRent = this.ledger.rent.minimumBalance(STAKE_STATE_SIZE);
    const records: WithdrawalRecord[] = [];

    for (const depositor of this.depositors.slice(0, count)) {
      const owner = depositor.keypair.publicKey;
      const tokenAmount = await getTokenBalance(this.ledger, getAssociatedTokenAddressSync(addresses.mint, owner));
      const stakeAccount = Keypair.generate();

      const transaction = await SinglePoolProgram.withdraw({
        connection: this.ledger,
        pool: addresses.pool,
        userWallet: owner,
        userStakeAccount: stakeAccount.publicKey,
        tokenAmount,
        createStakeAccount: true,
      });
      await this.send(transaction, [depositor.keypair, stakeAccount]);

      const stakeReceived = this.ledger.getBalance(stakeAccount.publicKey) - stakeRent;
      records.push({
        depositor: owner.toBase58(),
        tokensBurned: tokenAmount,
        stakeReceived,
        gain: stakeReceived - depositor.deposited,
      });
      logItem(`${owner.toBase58().slice(0, 8)}… redeemed ${formatSol(stakeReceived)} SOL of stake`);
    }
    logOk(`${records.length} of ${this.depositors.length} depositors withdrew`);
    return records;
  }

  private transfer(toPubkey: PublicKey, lamports: bigint): TransactionInstruction {
    return SystemProgram.transfer({ fromPubkey: this.payer.publicKey, toPubkey, lamports });
  }

  private async send(transaction: Transaction, signers: Keypair[]): Promise<void> {
    try {
      const result = await this.ledger.sendTransaction(transaction, signers);
      this.transactions += 1;
      this.feesPaid += result.fee;
    } catch (error) {
      if (error instanceof TransactionError) {
        endProgress();
        logger.error(error.message);
        logTransaction(error.logs);
      }
      throw error;
    }
  }
}
