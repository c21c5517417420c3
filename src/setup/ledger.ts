import { BPF_LOADER_PROGRAM_ID, Keypair, PublicKey } from "@solana/web3.js";
import { DEFAULT_LEDGER_CONFIG, LedgerConfig, PROGRAM_IDS } from "../config.js";
import { VOTE_STATE_SIZE, VoteStateVersion, createVoteAccountData, epochCreditsFor } from "../interfaces/vote.js";
import { SinglePoolProcessor } from "../program/processor.js";
import { Ledger } from "../runtime/ledger.js";
import { AssociatedTokenProgramStandIn } from "../runtime/native/associated-token.js";
import { MetadataProgramStandIn } from "../runtime/native/metadata.js";
import { StakeProgramStandIn } from "../runtime/native/stake.js";
import { SystemProgramStandIn } from "../runtime/native/system.js";
import { TokenProgramStandIn } from "../runtime/native/token.js";

/**
 * A ledger with the native programs, the token metadata program and the
 * pool program deployed
 */
export function createLocalLedger(
  config: LedgerConfig = DEFAULT_LEDGER_CONFIG,
  poolProgramId: PublicKey = PROGRAM_IDS.SINGLE_POOL
): Ledger {
  const ledger = new Ledger(config);
  ledger.addProgram(new SystemProgramStandIn());
  ledger.addProgram(new StakeProgramStandIn());
  ledger.addProgram(new TokenProgramStandIn());
  ledger.addProgram(new AssociatedTokenProgramStandIn());
  ledger.addProgram(new MetadataProgramStandIn(), BPF_LOADER_PROGRAM_ID);
  ledger.addProgram(new SinglePoolProcessor(poolProgramId), BPF_LOADER_PROGRAM_ID);
  return ledger;
}

export interface VoteAccountSetup {
  address: PublicKey;
  authorizedWithdrawer: Keypair;
}

export interface VoteAccountOptions {
  authorizedWithdrawer?: Keypair;
  version?: VoteStateVersion;
  commission?: number;
  /** Epochs the validator earned credits in, oldest first */
  votedEpochs?: readonly bigint[];
}

/**
 * Write a vote account straight into the ledger
 */
export function createVoteAccount(ledger: Ledger, options: VoteAccountOptions = {}): VoteAccountSetup {
  const address = Keypair.generate().publicKey;
  const authorizedWithdrawer = options.authorizedWithdrawer ?? Keypair.generate();
  ledger.setAccount(
    address,
    createVoteAccountData({
      authorizedWithdrawer: authorizedWithdrawer.publicKey,
      lamports: ledger.rent.minimumBalance(VOTE_STATE_SIZE),
      version: options.version,
      commission: options.commission,
      epochCredits: epochCreditsFor(options.votedEpochs ?? []),
    })
  );
  return { address, authorizedWithdrawer };
}

export function createFundedKeypair(ledger: Ledger, lamports: bigint): Keypair {
  const keypair = Keypair.generate();
  ledger.airdrop(keypair.publicKey, lamports);
  return keypair;
}
