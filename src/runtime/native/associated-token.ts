import { PublicKey } from "@solana/web3.js";
import {
  ACCOUNT_SIZE,
  ASSOCIATED_TOKEN_PROGRAM_ID,
  AccountLayout,
  TOKEN_PROGRAM_ID,
  createInitializeAccount3Instruction,
} from "@solana/spl-token";
import { NativeProgramError } from "../errors.js";
import type { InvokeContext, Program } from "../invoke.js";
import { createPdaAccount } from "../pda.js";

function fail(reason: string, detail?: string): NativeProgramError {
  return new NativeProgramError("associated-token", reason, detail);
}

enum AssociatedTokenInstruction {
  Create = 0,
  CreateIdempotent = 1,
}

/**
 * Associated token account program: creates the canonical token account of
 * an (owner, mint) pair.
 */
export class AssociatedTokenProgramStandIn implements Program {
  readonly programId = ASSOCIATED_TOKEN_PROGRAM_ID;
  readonly name = "associated-token";

  process(ctx: InvokeContext): void {
    ctx.requireAccounts(6);
    const kind = ctx.data.length === 0 ? AssociatedTokenInstruction.Create : ctx.data[0];
    if (kind !== AssociatedTokenInstruction.Create && kind !== AssociatedTokenInstruction.CreateIdempotent) {
      throw fail("InvalidInstructionData", `${kind}`);
    }

    const payer = ctx.account(0);
    const associated = ctx.account(1);
    const owner = ctx.account(2);
    const mint = ctx.account(3);
    if (!ctx.account(5).key.equals(TOKEN_PROGRAM_ID)) throw fail("IncorrectProgramId", "token program");

    const [expected, bump] = PublicKey.findProgramAddressSync(
      [owner.key.toBuffer(), TOKEN_PROGRAM_ID.toBuffer(), mint.key.toBuffer()],
      this.programId
    );
    if (!expected.equals(associated.key)) throw fail("InvalidSeeds", associated.key.toBase58());

    if (associated.isOwnedBy(TOKEN_PROGRAM_ID)) {
      if (kind === AssociatedTokenInstruction.CreateIdempotent && associated.data.length === ACCOUNT_SIZE) {
        const existing = AccountLayout.decode(associated.data);
        if (existing.owner.equals(owner.key) && existing.mint.equals(mint.key)) return;
        throw fail("InvalidOwner", associated.key.toBase58());
      }
      throw fail("AccountAlreadyInUse", associated.key.toBase58());
    }

    createPdaAccount(ctx, {
      account: associated,
      space: ACCOUNT_SIZE,
      owner: TOKEN_PROGRAM_ID,
      seeds: [owner.key.toBuffer(), TOKEN_PROGRAM_ID.toBuffer(), mint.key.toBuffer(), Buffer.from([bump])],
      payer,
    });
    ctx.invoke(createInitializeAccount3Instruction(associated.key, mint.key, owner.key, TOKEN_PROGRAM_ID));
  }
}
