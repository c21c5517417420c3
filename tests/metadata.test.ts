import { Key, TokenStandard } from "@metaplex-foundation/mpl-token-metadata";
import { Keypair } from "@solana/web3.js";
import { expect } from "chai";
import { SinglePoolError } from "../src/errors.js";
import {
  METADATA_ACCOUNT_SIZE,
  TokenMetadata,
  decodeMetadata,
  readMetadataAccount,
} from "../src/interfaces/metadata.js";
import { getPoolStatus } from "../src/program/queries.js";
import { SinglePoolProgram } from "../src/program/transactions.js";
import { NativeProgramError } from "../src/runtime/errors.js";
import { Ledger } from "../src/runtime/ledger.js";
import { PoolFixture, createPoolFixture, expectPoolError, expectTransactionError, send } from "./helpers.js";

function readMetadata(ledger: Ledger, fixture: PoolFixture): TokenMetadata {
  const metadata = decodeMetadata(ledger.getAccount(fixture.addresses.metadata)?.data ?? Buffer.alloc(0));
  if (!metadata) expect.fail("metadata account missing");
  return metadata;
}

describe("token metadata", () => {
  it("can be attached after initialization", async () => {
    const fixture = await createPoolFixture({ initialize: false });
    const { ledger, payer, vote, addresses } = fixture;
    await send(fixture, await SinglePoolProgram.initialize(ledger, vote.address, payer.publicKey, true), [payer]);
    expect((await getPoolStatus(ledger, addresses.pool)).metadataAttached).to.be.false;

    await send(fixture, await SinglePoolProgram.createTokenMetadata(addresses.pool, payer.publicKey), [payer]);

    expect((await getPoolStatus(ledger, addresses.pool)).metadataAttached).to.be.true;
    expect(readMetadata(ledger, fixture).symbol).to.equal(`st${vote.address.toBase58().slice(0, 7)}`);
  });

  it("is stored as a mutable fungible-token record with padded strings", async () => {
    const fixture = await createPoolFixture();
    const data = fixture.ledger.getAccount(fixture.addresses.metadata)?.data ?? Buffer.alloc(0);
    expect(data.length).to.equal(METADATA_ACCOUNT_SIZE);

    const record = readMetadataAccount(data);
    if (!record) expect.fail("metadata account missing");
    const name = `Single Pool ${fixture.vote.address.toBase58().slice(0, 15)}`;
    expect(record.key).to.equal(Key.MetadataV1);
    expect(record.tokenStandard).to.equal(TokenStandard.Fungible);
    expect(record.isMutable).to.be.true;
    expect(record.data.sellerFeeBasisPoints).to.equal(0);
    expect(record.data.name).to.equal(name.padEnd(32, "\0"));
    expect(record.data.uri).to.equal("\0".repeat(200));
    expect(readMetadata(fixture.ledger, fixture).name).to.equal(name);
  });

  it("cannot be created twice", async () => {
    const fixture = await createPoolFixture();
    const { payer, addresses } = fixture;
    const transaction = await SinglePoolProgram.createTokenMetadata(addresses.pool, payer.publicKey);

    const error = await expectTransactionError(send(fixture, transaction, [payer]));
    expect(error.failure).to.be.instanceOf(NativeProgramError);
    if (error.failure instanceof NativeProgramError) expect(error.failure.reason).to.equal("AlreadyInitialized");
  });

  it("is updated by the vote account's authorized withdrawer", async () => {
    const fixture = await createPoolFixture();
    const { ledger, payer, vote } = fixture;
    const transaction = await SinglePoolProgram.updateTokenMetadata(
      vote.address,
      vote.authorizedWithdrawer.publicKey,
      "Validator Stake",
      "vSTK",
      "https://example.com/pool.json"
    );
    await send(fixture, transaction, [payer, vote.authorizedWithdrawer]);

    const metadata = readMetadata(ledger, fixture);
    expect(metadata.name).to.equal("Validator Stake");
    expect(metadata.symbol).to.equal("vSTK");
    expect(metadata.uri).to.equal("https://example.com/pool.json");
    expect(metadata.updateAuthority.equals(fixture.addresses.mplAuthority)).to.be.true;
  });

  it("rejects updates from anyone else", async () => {
    const fixture = await createPoolFixture();
    const { ledger, payer, vote } = fixture;
    const before = readMetadata(ledger, fixture);
    const impostor = Keypair.generate();

    const transaction = await SinglePoolProgram.updateTokenMetadata(vote.address, impostor.publicKey, "Fake", "FAKE");
    await expectPoolError(send(fixture, transaction, [payer, impostor]), SinglePoolError.InvalidMetadataSigner);
    expect(readMetadata(ledger, fixture).name).to.equal(before.name);
  });

  it("requires the authorized withdrawer to sign", async () => {
    const fixture = await createPoolFixture();
    const { ledger, payer, vote } = fixture;
    const before = readMetadata(ledger, fixture);
    const withdrawer = vote.authorizedWithdrawer.publicKey;

    const transaction = await SinglePoolProgram.updateTokenMetadata(vote.address, withdrawer, "Unsigned", "UNS");
    for (const instruction of transaction.instructions) {
      instruction.keys = instruction.keys.map((meta) =>
        meta.pubkey.equals(withdrawer) ? { ...meta, isSigner: false } : meta
      );
    }

    await expectPoolError(send(fixture, transaction, [payer]), SinglePoolError.SignatureMissing);
    expect(readMetadata(ledger, fixture).name).to.equal(before.name);
  });

  it("rejects names the metadata program cannot store", async () => {
    const fixture = await createPoolFixture();
    const { payer, vote } = fixture;
    const transaction = await SinglePoolProgram.updateTokenMetadata(
      vote.address,
      vote.authorizedWithdrawer.publicKey,
      "x".repeat(33),
      "LONG"
    );

    const error = await expectTransactionError(send(fixture, transaction, [payer, vote.authorizedWithdrawer]));
    expect(error.failure).to.be.instanceOf(NativeProgramError);
    if (error.failure instanceof NativeProgramError) expect(error.failure.reason).to.equal("NameTooLong");
  });
});
