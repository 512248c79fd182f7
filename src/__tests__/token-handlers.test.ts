import assert from "node:assert/strict";
import test from "node:test";
import { encodeAbiParameters, getAddress, numberToHex, pad, toEventSelector, type Hex } from "viem";

import { createTokenEventRouter, decodeTokenLog, type TokenLog } from "../handlers/token";
import type { LedgerLogger } from "../utils/types";
import {
  CREATOR_A,
  DAY,
  EPOCH,
  INVESTOR_A,
  INVESTOR_B,
  OPERATOR,
  OWNER,
  ZERO,
  createTestLedger,
  silentLogger,
} from "./fixtures";

const TRANSFER_SINGLE = toEventSelector("TransferSingle(address,address,address,uint256,uint256)");
const TRANSFER_BATCH = toEventSelector("TransferBatch(address,address,address,uint256[],uint256[])");
const CHAPTER_PUBLISHED = toEventSelector("ChapterPublished(address,uint256,uint256)");
const CHAPTER_MINTED = toEventSelector("ChapterMinted(address,uint256,uint256)");

function uintTopic(value: bigint): Hex {
  return numberToHex(value, { size: 32 });
}

function publishedLog(creator: Hex, tokenId: bigint, creatorShare: bigint): TokenLog {
  return {
    topics: [CHAPTER_PUBLISHED, pad(creator), uintTopic(tokenId)],
    data: encodeAbiParameters([{ type: "uint256" }], [creatorShare]),
  };
}

function mintedLog(buyer: Hex, tokenId: bigint, amount: bigint): TokenLog {
  return {
    topics: [CHAPTER_MINTED, pad(buyer), uintTopic(tokenId)],
    data: encodeAbiParameters([{ type: "uint256" }], [amount]),
  };
}

function transferSingleLog(from: Hex, to: Hex, id: bigint, value: bigint): TokenLog {
  return {
    topics: [TRANSFER_SINGLE, pad(OPERATOR), pad(from), pad(to)],
    data: encodeAbiParameters([{ type: "uint256" }, { type: "uint256" }], [id, value]),
  };
}

function setup() {
  const fixture = createTestLedger();
  const handle = createTokenEventRouter(fixture.ledger, OPERATOR, silentLogger);
  return { ...fixture, handle };
}

test("decodeTokenLog returns checksummed arguments", () => {
  const decoded = decodeTokenLog(publishedLog(CREATOR_A, 7n, 80n));
  assert.equal(decoded?.eventName, "ChapterPublished");
  assert.deepEqual(decoded?.args, {
    creator: getAddress(CREATOR_A),
    tokenId: 7n,
    creatorShare: 80n,
  });
});

test("ChapterPublished records a publish with the creator share", async () => {
  const { ledger, handle } = setup();

  assert.equal(await handle(publishedLog(CREATOR_A, 7n, 80n)), true);

  assert.deepEqual(ledger.getCreatorStats(CREATOR_A), {
    address: CREATOR_A,
    isCreator: true,
    totalPublished: 1n,
    totalAcquired: 80n,
    tokenIds: [7n],
  });
  assert.deepEqual(ledger.getTokenOwners(7n), [CREATOR_A]);
  assert.equal(ledger.getCreatorMonthlyStats(CREATOR_A, 202403).published, 1n);
});

test("ChapterPublished without a creator share records no owner", async () => {
  const { ledger, handle } = setup();
  await handle(publishedLog(CREATOR_A, 8n, 0n));
  assert.deepEqual(ledger.getTokenOwners(8n), []);
  assert.deepEqual(ledger.getCreatorTokens(CREATOR_A), [8n]);
});

test("ChapterMinted records an acquire for the buyer", async () => {
  const { ledger, handle } = setup();

  await handle(mintedLog(INVESTOR_A, 7n, 3n));
  await handle(mintedLog(INVESTOR_A, 7n, 2n));

  assert.deepEqual(ledger.getInvestorStats(INVESTOR_A), {
    address: INVESTOR_A,
    isInvestor: true,
    totalAcquired: 5n,
    tokenIds: [7n, 7n],
  });
  assert.deepEqual(ledger.getTokenOwners(7n), [INVESTOR_A]);
});

test("logs are filed under the period of their block time", async () => {
  const { ledger, handle } = setup();
  const january = EPOCH + 10n * DAY;
  const february = EPOCH + 40n * DAY;

  await handle({ ...publishedLog(CREATOR_A, 1n, 5n), blockNumber: 100n, blockTimestamp: january });
  await handle({ ...publishedLog(CREATOR_A, 2n, 5n), blockNumber: 200n, blockTimestamp: february });
  await handle({ ...mintedLog(INVESTOR_A, 2n, 4n), blockNumber: 200n, blockTimestamp: february });

  assert.deepEqual(ledger.getCreatorMonthlyStats(CREATOR_A, 202401), {
    address: CREATOR_A,
    period: 202401,
    published: 1n,
    acquired: 5n,
  });
  assert.equal(ledger.getCreatorMonthlyStats(CREATOR_A, 202402).published, 1n);
  assert.equal(ledger.getCreatorMonthlyStats(CREATOR_A, 202403).published, 0n);
  assert.equal(ledger.getInvestorMonthlyStats(INVESTOR_A, 202402).acquired, 4n);

  const result = await ledger.rollupForPeriod(OWNER, 202401);
  assert.equal(result.creators[0].monthlyPublished, 1n);
  assert.equal(result.creators[0].totalPublished, 2n);
  assert.equal(result.investors[0].monthlyAcquired, 0n);
});

test("TransferSingle between holders adds the recipient as owner", async () => {
  const { ledger, handle } = setup();
  await handle(mintedLog(INVESTOR_A, 7n, 3n));

  assert.equal(await handle(transferSingleLog(INVESTOR_A, INVESTOR_B, 7n, 1n)), true);

  assert.deepEqual(ledger.getTokenOwners(7n), [INVESTOR_A, INVESTOR_B]);
  assert.equal(ledger.isInvestor(INVESTOR_B), false);
});

test("TransferSingle mints and burns are left to the chapter events", async () => {
  const { ledger, handle } = setup();

  assert.equal(await handle(transferSingleLog(ZERO, INVESTOR_A, 7n, 1n)), true);
  assert.equal(await handle(transferSingleLog(INVESTOR_A, ZERO, 7n, 1n)), true);

  assert.deepEqual(ledger.getTokenOwners(7n), []);
});

test("TransferBatch adds the recipient for every id", async () => {
  const { ledger, handle } = setup();

  await handle({
    topics: [TRANSFER_BATCH, pad(OPERATOR), pad(INVESTOR_A), pad(INVESTOR_B)],
    data: encodeAbiParameters(
      [{ type: "uint256[]" }, { type: "uint256[]" }],
      [
        [1n, 2n],
        [1n, 4n],
      ]
    ),
  });

  assert.deepEqual(ledger.getTokenOwners(1n), [INVESTOR_B]);
  assert.deepEqual(ledger.getTokenOwners(2n), [INVESTOR_B]);
});

test("logs of other events are skipped with a warning", async () => {
  const warnings: string[] = [];
  const logger: LedgerLogger = { ...silentLogger, warn: (message: unknown) => warnings.push(String(message)) };
  const { ledger } = createTestLedger();
  const handle = createTokenEventRouter(ledger, OPERATOR, logger);

  const handled = await handle({
    topics: [toEventSelector("ApprovalForAll(address,address,bool)"), pad(INVESTOR_A), pad(OPERATOR)],
    data: encodeAbiParameters([{ type: "bool" }], [true]),
    transactionHash: "0xabc",
    logIndex: 4,
  });

  assert.equal(handled, false);
  assert.deepEqual(warnings, ["[Sonic] Skipping unknown log 0xabc:4"]);
});
