/**
 * Errors returned by the single-validator pool program. Codes are stable and
 * part of the program's interface.
 */
export enum SinglePoolError {
  InvalidPoolAccount = 0,
  InvalidPoolStakeAccount = 1,
  InvalidPoolMint = 2,
  InvalidPoolStakeAuthority = 3,
  InvalidPoolMintAuthority = 4,
  InvalidPoolMplAuthority = 5,
  InvalidMetadataAccount = 6,
  InvalidMetadataSigner = 7,
  DepositTooSmall = 8,
  WithdrawalTooSmall = 9,
  PoolWouldBeUndersized = 10,
  SignatureMissing = 11,
  WrongStakeState = 12,
  ArithmeticOverflow = 13,
  UnexpectedMathError = 14,
  LegacyVoteAccount = 15,
  UnparseableVoteAccount = 16,
  WrongRentAmount = 17,
  InvalidPoolStakeAccountUsage = 18,
  PoolAlreadyInitialized = 19,
  InvalidPoolOnRampAccount = 20,
  OnRampDoesntExist = 21,
  InvalidValidator = 22,
  WrongValidator = 23,
  StakeNotFullyActive = 24,
  InsufficientWithdrawAmount = 25,
}

const ERROR_MESSAGES: Record<SinglePoolError, string> = {
  [SinglePoolError.InvalidPoolAccount]:
    "Provided pool account has the wrong address for its vote account, is uninitialized, or is otherwise invalid.",
  [SinglePoolError.InvalidPoolStakeAccount]:
    "Provided pool stake account does not match address derived from the pool account.",
  [SinglePoolError.InvalidPoolMint]: "Provided pool mint does not match address derived from the pool account.",
  [SinglePoolError.InvalidPoolStakeAuthority]:
    "Provided pool stake authority does not match address derived from the pool account.",
  [SinglePoolError.InvalidPoolMintAuthority]:
    "Provided pool mint authority does not match address derived from the pool account.",
  [SinglePoolError.InvalidPoolMplAuthority]:
    "Provided pool MPL authority does not match address derived from the pool account.",
  [SinglePoolError.InvalidMetadataAccount]:
    "Provided metadata account does not match metadata account derived for pool mint.",
  [SinglePoolError.InvalidMetadataSigner]:
    "Authorized withdrawer provided for metadata update does not match the vote account.",
  [SinglePoolError.DepositTooSmall]: "Not enough lamports provided for deposit to result in one pool token.",
  [SinglePoolError.WithdrawalTooSmall]: "Not enough pool tokens provided to withdraw stake worth one lamport.",
  [SinglePoolError.PoolWouldBeUndersized]:
    "Withdrawal would leave the pool stake account below its rent-exempt reserve plus minimum balance.",
  [SinglePoolError.SignatureMissing]: "Required signature is missing.",
  [SinglePoolError.WrongStakeState]: "Stake account is not in the state expected by the program.",
  [SinglePoolError.ArithmeticOverflow]: "Arithmetic overflowed or crossed zero.",
  [SinglePoolError.UnexpectedMathError]: "A calculation failed unexpectedly.",
  [SinglePoolError.LegacyVoteAccount]: "The legacy vote account format is unsupported.",
  [SinglePoolError.UnparseableVoteAccount]: "Failed to parse vote account.",
  [SinglePoolError.WrongRentAmount]: "Incorrect number of lamports provided for rent-exemption when initializing.",
  [SinglePoolError.InvalidPoolStakeAccountUsage]: "Attempted to deposit from or withdraw to pool stake account.",
  [SinglePoolError.PoolAlreadyInitialized]: "Attempted to initialize a pool that is already initialized.",
  [SinglePoolError.InvalidPoolOnRampAccount]:
    "Provided pool onramp account does not match address derived from the pool account.",
  [SinglePoolError.OnRampDoesntExist]: "The onramp account for this pool does not exist.",
  [SinglePoolError.InvalidValidator]: "Provided validator account is not owned by the vote program.",
  [SinglePoolError.WrongValidator]: "Stake account is delegated to a different validator than the pool.",
  [SinglePoolError.StakeNotFullyActive]: "Stake account is not fully active.",
  [SinglePoolError.InsufficientWithdrawAmount]:
    "Withdrawal is too small to fund a rent-exempt stake account with the minimum delegation.",
};

export class PoolProgramError extends Error {
  constructor(public readonly code: SinglePoolError) {
    super(`Error: ${ERROR_MESSAGES[code]}`);
    this.name = "PoolProgramError";
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /** Variant name, e.g. `DepositTooSmall` */
  get errorName(): string {
    return SinglePoolError[this.code];
  }
}

export function poolError(code: SinglePoolError): PoolProgramError {
  return new PoolProgramError(code);
}
