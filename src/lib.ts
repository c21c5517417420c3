export * from "./config.js";
export * from "./errors.js";
export * from "./program/addresses.js";
export * from "./program/instruction.js";
export * from "./program/math.js";
export * from "./program/processor.js";
export * from "./program/queries.js";
export * from "./program/state.js";
export * from "./program/transactions.js";
export { Ledger, type TransactionResult, type EpochRewards } from "./runtime/ledger.js";
export { RuntimeError, NativeProgramError, TransactionError } from "./runtime/errors.js";
export { createFundedKeypair, createLocalLedger, createVoteAccount } from "./setup/ledger.js";
export { PoolSimulation, type SimulationResults } from "./simulation/scenario.js";
