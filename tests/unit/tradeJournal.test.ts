/**
 * Trade Journal Unit Test
 *
 * Requirement: each request id can be claimed for execution once, and the
 * claim survives reopening the database
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it } from "vitest";
import { TradeJournal } from "../../services/meta-router/src/tradeJournal";
import { makeQuote, REQUEST_ID, TOKEN_X, TOKEN_Y } from "./helpers";

const AT = Date.UTC(2024, 0, 2, 3, 4, 5);

describe("TradeJournal", () => {
  const open: TradeJournal[] = [];
  const journal = (): TradeJournal => {
    const created = new TradeJournal(":memory:");
    open.push(created);
    return created;
  };

  afterEach(() => {
    for (const j of open.splice(0)) j.close();
  });

  it("claims a request once", () => {
    const j = journal();

    expect(j.claim(makeQuote(), AT)).toBe(true);
    expect(j.claim(makeQuote({ sourceId: "source_b" }), AT + 1)).toBe(false);
    expect(j.get(REQUEST_ID)).toEqual({
      request_id: REQUEST_ID,
      source_id: "source_a",
      network: "ethereum",
      token_in: TOKEN_X,
      token_out: TOKEN_Y,
      amount_in: "1000",
      quoted_amount_out: "950",
      status: "pending",
      tx_hash: null,
      actual_amount_out: null,
      failure_code: null,
      failure_reason: null,
      attempts: 0,
      created_at: "2024-01-02T03:04:05.000Z",
      updated_at: "2024-01-02T03:04:05.000Z",
    });
  });

  it("records the outcome of an execution", () => {
    const j = journal();
    j.claim(makeQuote(), AT);

    j.complete(
      { requestId: REQUEST_ID, sourceId: "source_a", confirmed: true, txHash: "0xabc", actualAmountOut: "951", attempts: 2 },
      AT + 60_000
    );

    expect(j.get(REQUEST_ID)).toMatchObject({
      status: "confirmed",
      tx_hash: "0xabc",
      actual_amount_out: "951",
      failure_code: null,
      attempts: 2,
      updated_at: "2024-01-02T03:05:05.000Z",
    });
  });

  it("records failures with their code", () => {
    const j = journal();
    j.claim(makeQuote(), AT);

    j.complete(
      {
        requestId: REQUEST_ID,
        sourceId: "source_a",
        confirmed: false,
        failureCode: "SigningError",
        failureReason: "user rejected the request",
        attempts: 1,
      },
      AT
    );

    expect(j.get(REQUEST_ID)).toMatchObject({
      status: "failed",
      failure_code: "SigningError",
      failure_reason: "user rejected the request",
    });
  });

  it("lists the newest trades first", () => {
    const j = journal();
    j.claim(makeQuote({ requestId: "first" }), AT);
    j.claim(makeQuote({ requestId: "second" }), AT + 2_000);
    j.claim(makeQuote({ requestId: "third" }), AT + 1_000);

    expect(j.history(2).map((t) => t.request_id)).toEqual(["second", "third"]);
    expect(j.history(10)).toHaveLength(3);
  });

  it("returns undefined for an unknown request", () => {
    expect(journal().get("missing")).toBeUndefined();
  });

  it("keeps claims across reopening the file", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "trade-journal-"));
    const dbPath = path.join(dir, "nested", "trades.db");
    try {
      const first = new TradeJournal(dbPath);
      expect(first.claim(makeQuote(), AT)).toBe(true);
      first.close();

      const reopened = new TradeJournal(dbPath);
      expect(reopened.claim(makeQuote(), AT)).toBe(false);
      reopened.close();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
