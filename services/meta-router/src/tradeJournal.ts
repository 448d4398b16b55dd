import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import type { Quote, TradeResult } from "./schemas";

// ============================================================================
// SQLite trade journal
// One row per executed aggregation result, keyed by request id. The primary
// key makes the execution claim durable across restarts.
// ============================================================================

const TradeRecordSchema = z.object({
  request_id: z.string(),
  source_id: z.string(),
  network: z.string(),
  token_in: z.string(),
  token_out: z.string(),
  amount_in: z.string(),
  quoted_amount_out: z.string(),
  status: z.enum(["pending", "confirmed", "failed"]),
  tx_hash: z.string().nullable(),
  actual_amount_out: z.string().nullable(),
  failure_code: z.string().nullable(),
  failure_reason: z.string().nullable(),
  attempts: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type TradeRecord = z.infer<typeof TradeRecordSchema>;

export interface ExecutionJournal {
  /** Records the attempt; false when the request was already claimed. */
  claim(quote: Quote, at: number): boolean;
  complete(result: TradeResult, at: number): void;
  history(limit: number): TradeRecord[];
}

export class TradeJournal implements ExecutionJournal {
  private db: Database.Database;

  /** ":memory:" keeps the journal in process */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      const dir = path.dirname(dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.init();
  }

  private init(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS trades (
        request_id TEXT PRIMARY KEY,
        source_id TEXT NOT NULL,
        network TEXT NOT NULL,
        token_in TEXT NOT NULL,
        token_out TEXT NOT NULL,
        amount_in TEXT NOT NULL,
        quoted_amount_out TEXT NOT NULL,
        status TEXT NOT NULL,
        tx_hash TEXT,
        actual_amount_out TEXT,
        failure_code TEXT,
        failure_reason TEXT,
        attempts INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_trades_created_at ON trades(created_at);
    `);
  }

  claim(quote: Quote, at: number): boolean {
    const ts = new Date(at).toISOString();
    const stmt = this.db.prepare(`
      INSERT OR IGNORE INTO trades (request_id, source_id, network, token_in, token_out, amount_in, quoted_amount_out, status, created_at, updated_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, 'pending', ?, ?)
    `);
    const info = stmt.run(
      quote.requestId,
      quote.sourceId,
      quote.networkId,
      quote.tokenIn,
      quote.tokenOut,
      quote.amountIn,
      quote.amountOut,
      ts,
      ts
    );
    return info.changes === 1;
  }

  complete(result: TradeResult, at: number): void {
    const stmt = this.db.prepare(`
      UPDATE trades
      SET status = ?, tx_hash = ?, actual_amount_out = ?, failure_code = ?, failure_reason = ?, attempts = ?, updated_at = ?
      WHERE request_id = ?
    `);
    stmt.run(
      result.confirmed ? "confirmed" : "failed",
      result.txHash ?? null,
      result.actualAmountOut ?? null,
      result.failureCode ?? null,
      result.failureReason ?? null,
      result.attempts,
      new Date(at).toISOString(),
      result.requestId
    );
  }

  get(requestId: string): TradeRecord | undefined {
    const row = this.db.prepare("SELECT * FROM trades WHERE request_id = ?").get(requestId);
    return row === undefined ? undefined : TradeRecordSchema.parse(row);
  }

  history(limit: number = 50): TradeRecord[] {
    const rows = this.db
      .prepare("SELECT * FROM trades ORDER BY created_at DESC, rowid DESC LIMIT ?")
      .all(limit);
    return z.array(TradeRecordSchema).parse(rows);
  }

  close(): void {
    this.db.close();
  }
}
