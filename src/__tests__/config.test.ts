import assert from "node:assert/strict";
import test from "node:test";

import { getChainName, getLedgerConfig, isChainSupported } from "../../config";
import { DEFAULT_BALANCE_CONCURRENCY, DEFAULT_ROLLUP_TIMEOUT_MS } from "../utils/constants";
import { OPERATOR, OWNER, ZERO } from "./fixtures";

const TOKEN = "0x00000000000000000000000000000000000000f1";

test("getLedgerConfig fills defaults from the chain table", () => {
  const config = getLedgerConfig({ LEDGER_OWNER: OWNER, LEDGER_CHAPTER_TOKEN: TOKEN });

  assert.equal(config.chain.chainId, 146);
  assert.equal(config.chapterToken, TOKEN);
  assert.equal(config.rpcUrl, "https://rpc.soniclabs.com");
  assert.equal(config.platformOperator, OWNER);
  assert.equal(config.rollupTimeoutMs, DEFAULT_ROLLUP_TIMEOUT_MS);
  assert.equal(config.balanceReadConcurrency, DEFAULT_BALANCE_CONCURRENCY);
  assert.equal(config.stateFile, "ledger-state.json");
});

test("getLedgerConfig reads overrides", () => {
  const config = getLedgerConfig({
    LEDGER_OWNER: OWNER,
    LEDGER_CHAPTER_TOKEN: TOKEN.toUpperCase().replace("0X", "0x"),
    LEDGER_PLATFORM_OPERATOR: OPERATOR,
    LEDGER_CHAIN_ID: "57054",
    LEDGER_RPC_URL: "http://localhost:8545",
    LEDGER_ROLLUP_TIMEOUT_MS: "500",
    LEDGER_BALANCE_CONCURRENCY: "2",
    LEDGER_STATE_FILE: "/tmp/ledger.json",
  });

  assert.equal(config.chain.name, "Sonic Blaze");
  assert.equal(config.chapterToken, TOKEN);
  assert.equal(config.rpcUrl, "http://localhost:8545");
  assert.equal(config.platformOperator, OPERATOR);
  assert.equal(config.rollupTimeoutMs, 500);
  assert.equal(config.balanceReadConcurrency, 2);
  assert.equal(config.stateFile, "/tmp/ledger.json");
});

test("getLedgerConfig rejects missing or malformed settings", () => {
  assert.throws(() => getLedgerConfig({}), { message: "LEDGER_OWNER is required" });
  assert.throws(() => getLedgerConfig({ LEDGER_OWNER: OWNER, LEDGER_CHAIN_ID: "1" }), {
    message: "Chain 1 is not supported",
  });
  assert.throws(
    () => getLedgerConfig({ LEDGER_OWNER: OWNER, LEDGER_CHAPTER_TOKEN: TOKEN, LEDGER_ROLLUP_TIMEOUT_MS: "-5" }),
    {
      message: 'LEDGER_ROLLUP_TIMEOUT_MS must be a positive integer, got "-5"',
    }
  );
});

test("getLedgerConfig requires a real chapter token address", () => {
  assert.throws(() => getLedgerConfig({ LEDGER_OWNER: OWNER }), {
    message: "LEDGER_CHAPTER_TOKEN is required: no chapter token is deployed on Sonic",
  });
  assert.throws(() => getLedgerConfig({ LEDGER_OWNER: OWNER, LEDGER_CHAPTER_TOKEN: ZERO }), {
    message: `Invalid chapter token address: ${ZERO}`,
  });
  assert.throws(() => getLedgerConfig({ LEDGER_OWNER: OWNER, LEDGER_CHAPTER_TOKEN: "0x1234" }), {
    message: "Invalid chapter token address: 0x1234",
  });
});

test("chain helpers fall back for unknown chains", () => {
  assert.equal(getChainName(146), "Sonic");
  assert.equal(getChainName(999), "Chain 999");
  assert.equal(isChainSupported(57054), true);
  assert.equal(isChainSupported(999), false);
});
