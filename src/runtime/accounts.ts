import { PublicKey, SystemProgram } from "@solana/web3.js";

/**
 * An account as the ledger stores it.
 */
export interface LedgerAccount {
  lamports: bigint;
  data: Buffer;
  owner: PublicKey;
  executable: boolean;
}

export function emptyAccount(): LedgerAccount {
  return { lamports: 0n, data: Buffer.alloc(0), owner: SystemProgram.programId, executable: false };
}

export function cloneAccount(account: LedgerAccount): LedgerAccount {
  return {
    lamports: account.lamports,
    data: Buffer.from(account.data),
    owner: account.owner,
    executable: account.executable,
  };
}

// ============================================================================
// ACCOUNT STORE
// ============================================================================

/**
 * Keyed account storage. A transaction runs against a fork of the store and
 * the fork replaces the original only if every instruction succeeded.
 */
export class AccountStore {
  private readonly accounts: Map<string, LedgerAccount>;

  constructor(accounts?: Map<string, LedgerAccount>) {
    this.accounts = accounts ?? new Map();
  }

  /** Read without materializing; returns null for missing accounts */
  peek(key: PublicKey): LedgerAccount | null {
    return this.accounts.get(key.toBase58()) ?? null;
  }

  /**
   * Mutable entry for an account, created as an empty system account if it
   * does not exist yet
   */
  load(key: PublicKey): LedgerAccount {
    const id = key.toBase58();
    let account = this.accounts.get(id);
    if (!account) {
      account = emptyAccount();
      this.accounts.set(id, account);
    }
    return account;
  }

  set(key: PublicKey, account: LedgerAccount): void {
    this.accounts.set(key.toBase58(), cloneAccount(account));
  }

  /** Deep copy */
  fork(): AccountStore {
    const copy = new Map<string, LedgerAccount>();
    for (const [id, account] of this.accounts) {
      copy.set(id, cloneAccount(account));
    }
    return new AccountStore(copy);
  }

  /** Drop accounts left with zero lamports */
  purge(): void {
    for (const [id, account] of this.accounts) {
      if (account.lamports === 0n && !account.executable) this.accounts.delete(id);
    }
  }

  *entries(): IterableIterator<[PublicKey, LedgerAccount]> {
    for (const [id, account] of this.accounts) {
      yield [new PublicKey(id), account];
    }
  }

  get size(): number {
    return this.accounts.size;
  }
}
