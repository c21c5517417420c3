import { PublicKey } from "@solana/web3.js";
import {
  ACCOUNT_SIZE,
  AccountLayout,
  AccountState,
  MINT_SIZE,
  MintLayout,
  RawAccount,
  RawMint,
  TOKEN_PROGRAM_ID,
  TokenInstruction,
  decodeApproveInstruction,
  decodeBurnInstruction,
  decodeInitializeAccount3Instruction,
  decodeInitializeMint2Instruction,
  decodeMintToInstruction,
  decodeTransferInstruction,
} from "@solana/spl-token";
import { U64_MAX } from "../../config.js";
import { NativeProgramError } from "../errors.js";
import { AccountInfo, InvokeContext, Program } from "../invoke.js";

function fail(reason: string, detail?: string): NativeProgramError {
  return new NativeProgramError("token", reason, detail);
}

function find(ctx: InvokeContext, key: PublicKey): AccountInfo {
  const account = ctx.accounts.find((info) => info.key.equals(key));
  if (!account) throw fail("NotEnoughAccountKeys", key.toBase58());
  return account;
}

function loadMint(account: AccountInfo): RawMint {
  if (!account.isOwnedBy(TOKEN_PROGRAM_ID)) throw fail("IncorrectProgramId", account.key.toBase58());
  if (account.data.length !== MINT_SIZE) throw fail("InvalidAccountData", account.key.toBase58());
  const mint = MintLayout.decode(account.data);
  if (!mint.isInitialized) throw fail("UninitializedState", account.key.toBase58());
  return mint;
}

function loadTokenAccount(account: AccountInfo): RawAccount {
  if (!account.isOwnedBy(TOKEN_PROGRAM_ID)) throw fail("IncorrectProgramId", account.key.toBase58());
  if (account.data.length !== ACCOUNT_SIZE) throw fail("InvalidAccountData", account.key.toBase58());
  const tokenAccount = AccountLayout.decode(account.data);
  if (tokenAccount.state === AccountState.Uninitialized) throw fail("UninitializedState", account.key.toBase58());
  if (tokenAccount.state === AccountState.Frozen) throw fail("AccountFrozen", account.key.toBase58());
  return tokenAccount;
}

function saveMint(account: AccountInfo, mint: RawMint): void {
  MintLayout.encode(mint, account.data);
}

function saveTokenAccount(account: AccountInfo, tokenAccount: RawAccount): void {
  AccountLayout.encode(tokenAccount, account.data);
}

/**
 * Authorize a debit of `amount` from a token account by its owner or its
 * approved delegate, consuming the delegation in the latter case
 */
function authorizeDebit(ctx: InvokeContext, tokenAccount: RawAccount, authority: PublicKey, amount: bigint): RawAccount {
  if (!ctx.isSigner(authority)) throw fail("MissingRequiredSignature", authority.toBase58());
  if (tokenAccount.owner.equals(authority)) return tokenAccount;

  if (tokenAccount.delegateOption === 1 && tokenAccount.delegate.equals(authority)) {
    if (tokenAccount.delegatedAmount < amount) {
      throw fail("InsufficientFunds", `delegated ${tokenAccount.delegatedAmount}, need ${amount}`);
    }
    const delegatedAmount = tokenAccount.delegatedAmount - amount;
    return delegatedAmount === 0n
      ? { ...tokenAccount, delegateOption: 0, delegate: PublicKey.default, delegatedAmount }
      : { ...tokenAccount, delegatedAmount };
  }
  throw fail("OwnerMismatch", authority.toBase58());
}

/**
 * SPL token program: the mint and account operations a pool drives.
 */
export class TokenProgramStandIn implements Program {
  readonly programId = TOKEN_PROGRAM_ID;
  readonly name = "token";

  process(ctx: InvokeContext): void {
    const instruction = ctx.instruction;
    switch (instruction.data[0]) {
      case TokenInstruction.InitializeMint2: {
        const { keys, data } = decodeInitializeMint2Instruction(instruction, this.programId);
        const mint = find(ctx, keys.mint.pubkey);
        if (!mint.isOwnedBy(this.programId) || mint.data.length !== MINT_SIZE) {
          throw fail("InvalidAccountData", mint.key.toBase58());
        }
        if (MintLayout.decode(mint.data).isInitialized) throw fail("AlreadyInUse", mint.key.toBase58());
        if (!ctx.rent.isExempt(mint.lamports, MINT_SIZE)) throw fail("NotRentExempt", mint.key.toBase58());

        saveMint(mint, {
          mintAuthorityOption: 1,
          mintAuthority: data.mintAuthority,
          supply: 0n,
          decimals: data.decimals,
          isInitialized: true,
          freezeAuthorityOption: data.freezeAuthority ? 1 : 0,
          freezeAuthority: data.freezeAuthority ?? PublicKey.default,
        });
        return;
      }

      case TokenInstruction.InitializeAccount3: {
        const { keys, data } = decodeInitializeAccount3Instruction(instruction, this.programId);
        const account = find(ctx, keys.account.pubkey);
        loadMint(find(ctx, keys.mint.pubkey));
        if (!account.isOwnedBy(this.programId) || account.data.length !== ACCOUNT_SIZE) {
          throw fail("InvalidAccountData", account.key.toBase58());
        }
        if (AccountLayout.decode(account.data).state !== AccountState.Uninitialized) {
          throw fail("AlreadyInUse", account.key.toBase58());
        }
        if (!ctx.rent.isExempt(account.lamports, ACCOUNT_SIZE)) throw fail("NotRentExempt", account.key.toBase58());

        saveTokenAccount(account, {
          mint: keys.mint.pubkey,
          owner: data.owner,
          amount: 0n,
          delegateOption: 0,
          delegate: PublicKey.default,
          state: AccountState.Initialized,
          isNativeOption: 0,
          isNative: 0n,
          delegatedAmount: 0n,
          closeAuthorityOption: 0,
          closeAuthority: PublicKey.default,
        });
        return;
      }

      case TokenInstruction.MintTo: {
        const { keys, data } = decodeMintToInstruction(instruction, this.programId);
        const mintInfo = find(ctx, keys.mint.pubkey);
        const destinationInfo = find(ctx, keys.destination.pubkey);
        const mint = loadMint(mintInfo);
        const destination = loadTokenAccount(destinationInfo);
        if (!destination.mint.equals(mintInfo.key)) throw fail("MintMismatch");
        if (mint.mintAuthorityOption === 0) throw fail("FixedSupply");
        if (!mint.mintAuthority.equals(keys.authority.pubkey)) throw fail("OwnerMismatch", "mint authority");
        if (!ctx.isSigner(keys.authority.pubkey)) throw fail("MissingRequiredSignature", "mint authority");

        const supply = mint.supply + data.amount;
        if (supply > U64_MAX) throw fail("Overflow");
        saveMint(mintInfo, { ...mint, supply });
        saveTokenAccount(destinationInfo, { ...destination, amount: destination.amount + data.amount });
        return;
      }

      case TokenInstruction.Burn: {
        const { keys, data } = decodeBurnInstruction(instruction, this.programId);
        const accountInfo = find(ctx, keys.account.pubkey);
        const mintInfo = find(ctx, keys.mint.pubkey);
        const mint = loadMint(mintInfo);
        const account = loadTokenAccount(accountInfo);
        if (!account.mint.equals(mintInfo.key)) throw fail("MintMismatch");
        if (account.amount < data.amount) throw fail("InsufficientFunds", `balance ${account.amount}`);

        const authorized = authorizeDebit(ctx, account, keys.owner.pubkey, data.amount);
        saveTokenAccount(accountInfo, { ...authorized, amount: account.amount - data.amount });
        saveMint(mintInfo, { ...mint, supply: mint.supply - data.amount });
        return;
      }

      case TokenInstruction.Approve: {
        const { keys, data } = decodeApproveInstruction(instruction, this.programId);
        const accountInfo = find(ctx, keys.account.pubkey);
        const account = loadTokenAccount(accountInfo);
        if (!account.owner.equals(keys.owner.pubkey)) throw fail("OwnerMismatch");
        if (!ctx.isSigner(keys.owner.pubkey)) throw fail("MissingRequiredSignature", "owner");

        saveTokenAccount(accountInfo, {
          ...account,
          delegateOption: 1,
          delegate: keys.delegate.pubkey,
          delegatedAmount: data.amount,
        });
        return;
      }

      case TokenInstruction.Transfer: {
        const { keys, data } = decodeTransferInstruction(instruction, this.programId);
        const sourceInfo = find(ctx, keys.source.pubkey);
        const destinationInfo = find(ctx, keys.destination.pubkey);
        const source = loadTokenAccount(sourceInfo);
        const destination = loadTokenAccount(destinationInfo);
        if (!source.mint.equals(destination.mint)) throw fail("MintMismatch");
        if (source.amount < data.amount) throw fail("InsufficientFunds", `balance ${source.amount}`);

        const authorized = authorizeDebit(ctx, source, keys.owner.pubkey, data.amount);
        if (sourceInfo.key.equals(destinationInfo.key)) return;
        saveTokenAccount(sourceInfo, { ...authorized, amount: source.amount - data.amount });
        saveTokenAccount(destinationInfo, { ...destination, amount: destination.amount + data.amount });
        return;
      }

      default:
        throw fail("InvalidInstruction", `unsupported instruction ${instruction.data[0]}`);
    }
  }
}
