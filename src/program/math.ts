import { MINIMUM_POOL_BALANCE_FLOOR, U64_MAX } from "../config.js";
import { SinglePoolError, poolError } from "../errors.js";

// ============================================================================
// CHECKED ARITHMETIC
// ============================================================================

/**
 * Reject values outside the u64 range
 */
export function checkedU64(value: bigint): bigint {
  if (value < 0n || value > U64_MAX) throw poolError(SinglePoolError.ArithmeticOverflow);
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  return checkedU64(a + b);
}

export function checkedSub(a: bigint, b: bigint): bigint {
  return checkedU64(a - b);
}

export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

// ============================================================================
// POOL VALUE
// ============================================================================

/**
 * Stake the pool keeps permanently: the network minimum delegation, but
 * never less than 1 SOL
 */
export function minimumPoolBalance(minimumDelegation: bigint): bigint {
  return minimumDelegation > MINIMUM_POOL_BALANCE_FLOOR ? minimumDelegation : MINIMUM_POOL_BALANCE_FLOOR;
}

/** Stake backing the token supply */
export function poolValue(delegatedStake: bigint, minimumBalance: bigint): bigint {
  return saturatingSub(delegatedStake, minimumBalance);
}

// ============================================================================
// CONVERSIONS
// ============================================================================

/**
 * Pool tokens for `stakeToDeposit` lamports of active stake, rounded down.
 * An empty or worthless pool mints 1:1.
 */
export function calculateDepositAmount(
  preTokenSupply: bigint,
  prePoolStake: bigint,
  stakeToDeposit: bigint
): bigint {
  if (preTokenSupply === 0n || prePoolStake === 0n) return checkedU64(stakeToDeposit);
  return checkedU64((stakeToDeposit * preTokenSupply) / prePoolStake);
}

/**
 * Lamports of stake redeemed by burning `tokensToBurn`, rounded down.
 * Zero when there is no supply.
 */
export function calculateWithdrawAmount(
  preTokenSupply: bigint,
  prePoolStake: bigint,
  tokensToBurn: bigint
): bigint {
  if (preTokenSupply === 0n) return 0n;
  return checkedU64((tokensToBurn * prePoolStake) / preTokenSupply);
}
