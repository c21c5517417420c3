import { PublicKey, SystemProgram } from "@solana/web3.js";
import type { AccountInfo, InvokeContext, SignerSeeds } from "./invoke.js";

/**
 * Bring a program-derived address into existence through the system
 * program: top up rent from `payer` when one is given, then allocate and
 * assign with the address's own seeds signing.
 */
export function createPdaAccount(
  ctx: InvokeContext,
  params: {
    account: AccountInfo;
    space: number;
    owner: PublicKey;
    seeds: SignerSeeds;
    payer?: AccountInfo;
  }
): void {
  const { account, space, owner, seeds, payer } = params;

  if (payer) {
    const required = ctx.rent.minimumBalance(space);
    if (account.lamports < required) {
      ctx.invoke(
        SystemProgram.transfer({
          fromPubkey: payer.key,
          toPubkey: account.key,
          lamports: required - account.lamports,
        })
      );
    }
  }

  ctx.invoke(SystemProgram.allocate({ accountPubkey: account.key, space }), [seeds]);
  ctx.invoke(SystemProgram.assign({ accountPubkey: account.key, programId: owner }), [seeds]);
}
