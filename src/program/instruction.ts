import {
  AccountMeta,
  PublicKey,
  STAKE_CONFIG_ID,
  SYSVAR_CLOCK_PUBKEY,
  SYSVAR_RENT_PUBKEY,
  SYSVAR_STAKE_HISTORY_PUBKEY,
  StakeProgram,
  SystemProgram,
  TransactionInstruction,
} from "@solana/web3.js";
import { TOKEN_PROGRAM_ID } from "@solana/spl-token";
import { PROGRAM_IDS } from "../config.js";
import { RuntimeError } from "../runtime/errors.js";
import { ByteReader, stringToBytes, u64ToBytes } from "../utils/bytes.js";
import { getPoolAddresses, getPoolSiblingAddresses } from "./addresses.js";

// ============================================================================
// INSTRUCTION DATA
// ============================================================================

export enum SinglePoolInstructionType {
  InitializePool = 0,
  ReplenishPool = 1,
  DepositStake = 2,
  WithdrawStake = 3,
  CreateTokenMetadata = 4,
  UpdateTokenMetadata = 5,
}

export type SinglePoolInstructionData =
  | { type: SinglePoolInstructionType.InitializePool }
  | { type: SinglePoolInstructionType.ReplenishPool }
  | { type: SinglePoolInstructionType.DepositStake }
  | { type: SinglePoolInstructionType.WithdrawStake; userStakeAuthority: PublicKey; tokenAmount: bigint }
  | { type: SinglePoolInstructionType.CreateTokenMetadata }
  | { type: SinglePoolInstructionType.UpdateTokenMetadata; name: string; symbol: string; uri: string };

export function encodeSinglePoolInstruction(instruction: SinglePoolInstructionData): Buffer {
  const tag = Buffer.from([instruction.type]);
  switch (instruction.type) {
    case SinglePoolInstructionType.WithdrawStake:
      return Buffer.concat([tag, instruction.userStakeAuthority.toBuffer(), u64ToBytes(instruction.tokenAmount)]);
    case SinglePoolInstructionType.UpdateTokenMetadata:
      return Buffer.concat([
        tag,
        stringToBytes(instruction.name),
        stringToBytes(instruction.symbol),
        stringToBytes(instruction.uri),
      ]);
    default:
      return tag;
  }
}

/**
 * Decode instruction data. Trailing bytes are rejected.
 */
export function decodeSinglePoolInstruction(data: Uint8Array): SinglePoolInstructionData {
  if (data.length === 0) throw new RuntimeError("InvalidInstructionData", "empty");
  const reader = new ByteReader(data.subarray(1));
  let decoded: SinglePoolInstructionData;

  try {
    switch (data[0]) {
      case SinglePoolInstructionType.InitializePool:
        decoded = { type: SinglePoolInstructionType.InitializePool };
        break;
      case SinglePoolInstructionType.ReplenishPool:
        decoded = { type: SinglePoolInstructionType.ReplenishPool };
        break;
      case SinglePoolInstructionType.DepositStake:
        decoded = { type: SinglePoolInstructionType.DepositStake };
        break;
      case SinglePoolInstructionType.WithdrawStake:
        decoded = {
          type: SinglePoolInstructionType.WithdrawStake,
          userStakeAuthority: reader.pubkey(),
          tokenAmount: reader.u64(),
        };
        break;
      case SinglePoolInstructionType.CreateTokenMetadata:
        decoded = { type: SinglePoolInstructionType.CreateTokenMetadata };
        break;
      case SinglePoolInstructionType.UpdateTokenMetadata:
        decoded = {
          type: SinglePoolInstructionType.UpdateTokenMetadata,
          name: reader.string(),
          symbol: reader.string(),
          uri: reader.string(),
        };
        break;
      default:
        throw new RuntimeError("InvalidInstructionData", `unknown tag ${data[0]}`);
    }
  } catch (error) {
    if (error instanceof RangeError) throw new RuntimeError("InvalidInstructionData", error.message);
    throw error;
  }

  if (reader.remaining !== 0) throw new RuntimeError("InvalidInstructionData", "trailing bytes");
  return decoded;
}

// ============================================================================
// INSTRUCTION BUILDERS
// ============================================================================

const readonly = (pubkey: PublicKey): AccountMeta => ({ pubkey, isSigner: false, isWritable: false });
const writable = (pubkey: PublicKey): AccountMeta => ({ pubkey, isSigner: false, isWritable: true });
const signer = (pubkey: PublicKey): AccountMeta => ({ pubkey, isSigner: true, isWritable: false });

/**
 * Builders for each pool instruction with its fixed account order
 */
export class SinglePoolInstruction {
  static initializePool(voteAccount: PublicKey, programId: PublicKey = PROGRAM_IDS.SINGLE_POOL): TransactionInstruction {
    const addresses = getPoolAddresses(voteAccount, programId);
    return new TransactionInstruction({
      programId,
      keys: [
        readonly(voteAccount),
        writable(addresses.pool),
        writable(addresses.stake),
        writable(addresses.onRamp),
        writable(addresses.mint),
        readonly(addresses.stakeAuthority),
        readonly(addresses.mintAuthority),
        readonly(SYSVAR_RENT_PUBKEY),
        readonly(SYSVAR_CLOCK_PUBKEY),
        readonly(SYSVAR_STAKE_HISTORY_PUBKEY),
        readonly(STAKE_CONFIG_ID),
        readonly(SystemProgram.programId),
        readonly(TOKEN_PROGRAM_ID),
        readonly(StakeProgram.programId),
      ],
      data: encodeSinglePoolInstruction({ type: SinglePoolInstructionType.InitializePool }),
    });
  }

  static replenishPool(voteAccount: PublicKey, programId: PublicKey = PROGRAM_IDS.SINGLE_POOL): TransactionInstruction {
    const addresses = getPoolAddresses(voteAccount, programId);
    return new TransactionInstruction({
      programId,
      keys: [
        readonly(voteAccount),
        readonly(addresses.pool),
        writable(addresses.stake),
        writable(addresses.onRamp),
        readonly(addresses.stakeAuthority),
        readonly(SYSVAR_CLOCK_PUBKEY),
        readonly(SYSVAR_STAKE_HISTORY_PUBKEY),
        readonly(STAKE_CONFIG_ID),
        readonly(StakeProgram.programId),
      ],
      data: encodeSinglePoolInstruction({ type: SinglePoolInstructionType.ReplenishPool }),
    });
  }

  static depositStake(params: {
    pool: PublicKey;
    userStakeAccount: PublicKey;
    userTokenAccount: PublicKey;
    userLamportAccount: PublicKey;
    userStakeAuthority: PublicKey;
    programId?: PublicKey;
  }): TransactionInstruction {
    const programId = params.programId ?? PROGRAM_IDS.SINGLE_POOL;
    const addresses = getPoolSiblingAddresses(params.pool, programId);
    return new TransactionInstruction({
      programId,
      keys: [
        readonly(addresses.pool),
        writable(addresses.stake),
        writable(addresses.mint),
        readonly(addresses.stakeAuthority),
        readonly(addresses.mintAuthority),
        writable(params.userStakeAccount),
        writable(params.userTokenAccount),
        writable(params.userLamportAccount),
        signer(params.userStakeAuthority),
        readonly(SYSVAR_CLOCK_PUBKEY),
        readonly(SYSVAR_STAKE_HISTORY_PUBKEY),
        readonly(TOKEN_PROGRAM_ID),
        readonly(StakeProgram.programId),
      ],
      data: encodeSinglePoolInstruction({ type: SinglePoolInstructionType.DepositStake }),
    });
  }

  static withdrawStake(params: {
    pool: PublicKey;
    userStakeAccount: PublicKey;
    userStakeAuthority: PublicKey;
    userTokenAccount: PublicKey;
    tokenAmount: bigint;
    programId?: PublicKey;
  }): TransactionInstruction {
    const programId = params.programId ?? PROGRAM_IDS.SINGLE_POOL;
    const addresses = getPoolSiblingAddresses(params.pool, programId);
    return new TransactionInstruction({
      programId,
      keys: [
        readonly(addresses.pool),
        writable(addresses.stake),
        writable(addresses.mint),
        readonly(addresses.stakeAuthority),
        readonly(addresses.mintAuthority),
        writable(params.userStakeAccount),
        writable(params.userTokenAccount),
        readonly(SYSVAR_CLOCK_PUBKEY),
        readonly(TOKEN_PROGRAM_ID),
        readonly(StakeProgram.programId),
      ],
      data: encodeSinglePoolInstruction({
        type: SinglePoolInstructionType.WithdrawStake,
        userStakeAuthority: params.userStakeAuthority,
        tokenAmount: params.tokenAmount,
      }),
    });
  }

  static createTokenMetadata(
    pool: PublicKey,
    payer: PublicKey,
    programId: PublicKey = PROGRAM_IDS.SINGLE_POOL
  ): TransactionInstruction {
    const addresses = getPoolSiblingAddresses(pool, programId);
    return new TransactionInstruction({
      programId,
      keys: [
        writable(addresses.pool),
        readonly(addresses.mint),
        readonly(addresses.mintAuthority),
        readonly(addresses.mplAuthority),
        { pubkey: payer, isSigner: true, isWritable: true },
        writable(addresses.metadata),
        readonly(PROGRAM_IDS.TOKEN_METADATA),
        readonly(SystemProgram.programId),
      ],
      data: encodeSinglePoolInstruction({ type: SinglePoolInstructionType.CreateTokenMetadata }),
    });
  }

  static updateTokenMetadata(params: {
    voteAccount: PublicKey;
    authorizedWithdrawer: PublicKey;
    name: string;
    symbol: string;
    uri?: string;
    programId?: PublicKey;
  }): TransactionInstruction {
    const programId = params.programId ?? PROGRAM_IDS.SINGLE_POOL;
    const addresses = getPoolAddresses(params.voteAccount, programId);
    return new TransactionInstruction({
      programId,
      keys: [
        readonly(params.voteAccount),
        readonly(addresses.pool),
        readonly(addresses.mplAuthority),
        signer(params.authorizedWithdrawer),
        writable(addresses.metadata),
        readonly(PROGRAM_IDS.TOKEN_METADATA),
      ],
      data: encodeSinglePoolInstruction({
        type: SinglePoolInstructionType.UpdateTokenMetadata,
        name: params.name,
        symbol: params.symbol,
        uri: params.uri ?? "",
      }),
    });
  }
}
