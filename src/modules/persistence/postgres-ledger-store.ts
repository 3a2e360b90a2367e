import { readFile } from 'node:fs/promises';
import type pg from 'pg';
import { PersistenceError } from '../../infra/errors.js';
import type { Logger } from '../../infra/logger.js';
import type { HistoryRecord, OpenPosition, TradeAction } from '../../types/index.js';
import { Decimal, decimalOrNull, toPlainString } from '../../utils/decimal.js';
import type { HistoryQuery, LedgerStore, LedgerWriter } from './ledger-store.js';

const SCHEMA_URL = new URL('../../../sql/schema.sql', import.meta.url);

interface Queryable {
  query<R extends pg.QueryResultRow>(text: string, values?: unknown[]): Promise<pg.QueryResult<R>>;
}

function poolQueryable(pool: pg.Pool): Queryable {
  return {
    query: <R extends pg.QueryResultRow>(text: string, values?: unknown[]) =>
      pool.query<R>(text, values),
  };
}

function clientQueryable(client: pg.PoolClient): Queryable {
  return {
    query: <R extends pg.QueryResultRow>(text: string, values?: unknown[]) =>
      client.query<R>(text, values),
  };
}

interface OpenTradeRow extends pg.QueryResultRow {
  token_address: string;
  trade_id_onchain: string;
  avg_entry_price: string;
  amount: string;
  strategy: string | null;
  trader: string;
  last_tx_id: string;
}

interface TradeHistoryRow extends pg.QueryResultRow {
  event_uid: string;
  trade_id_onchain: string;
  token_address: string;
  action: TradeAction;
  price: string;
  amount: string;
  avg_entry_price: string | null;
  avg_exit_price: string | null;
  pnl: string | null;
  strategy: string | null;
  tx_id: string;
  block_number: string;
  event_index: number;
  block_timestamp: string | null;
}

const OPEN_TRADE_COLUMNS =
  'token_address, trade_id_onchain, avg_entry_price, amount, strategy, trader, last_tx_id';

const HISTORY_COLUMNS =
  'event_uid, trade_id_onchain, token_address, action, price, amount, avg_entry_price, ' +
  'avg_exit_price, pnl, strategy, tx_id, block_number, event_index, block_timestamp';

function toPosition(row: OpenTradeRow): OpenPosition {
  return {
    tokenKey: row.token_address,
    tradeIdOnchain: row.trade_id_onchain,
    avgEntryPrice: new Decimal(row.avg_entry_price),
    amount: new Decimal(row.amount),
    strategy: row.strategy,
    trader: row.trader,
    lastTxId: row.last_tx_id,
  };
}

function toHistory(row: TradeHistoryRow): HistoryRecord {
  return {
    eventUid: row.event_uid,
    tradeIdOnchain: row.trade_id_onchain,
    tokenKey: row.token_address,
    action: row.action,
    price: new Decimal(row.price),
    amount: new Decimal(row.amount),
    avgEntryPrice: decimalOrNull(row.avg_entry_price),
    avgExitPrice: decimalOrNull(row.avg_exit_price),
    pnl: decimalOrNull(row.pnl),
    strategy: row.strategy,
    txId: row.tx_id,
    blockNumber: Number(row.block_number),
    eventIndex: row.event_index,
    blockTimestamp: row.block_timestamp === null ? null : Number(row.block_timestamp),
  };
}

function plainOrNull(value: Decimal | null): string | null {
  return value === null ? null : toPlainString(value);
}

async function run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof PersistenceError) throw err;
    const detail = err instanceof Error ? err.message : String(err);
    throw new PersistenceError(`${operation} failed: ${detail}`, err);
  }
}

class PgLedgerWriter implements LedgerWriter {
  protected readonly db: Queryable;
  private readonly lockRows: boolean;

  constructor(db: Queryable, lockRows: boolean) {
    this.db = db;
    this.lockRows = lockRows;
  }

  getPosition(tokenKey: string): Promise<OpenPosition | null> {
    return run('getPosition', async () => {
      const { rows } = await this.db.query<OpenTradeRow>(
        `SELECT ${OPEN_TRADE_COLUMNS} FROM open_trades WHERE token_address = $1${
          this.lockRows ? ' FOR UPDATE' : ''
        }`,
        [tokenKey],
      );
      const row = rows[0];
      return row ? toPosition(row) : null;
    });
  }

  upsertPosition(position: OpenPosition): Promise<void> {
    return run('upsertPosition', async () => {
      await this.db.query(
        `INSERT INTO open_trades (${OPEN_TRADE_COLUMNS}, updated_at)
         VALUES ($1, $2, $3, $4, $5, $6, $7, now())
         ON CONFLICT (token_address) DO UPDATE SET
           trade_id_onchain = EXCLUDED.trade_id_onchain,
           avg_entry_price = EXCLUDED.avg_entry_price,
           amount = EXCLUDED.amount,
           strategy = EXCLUDED.strategy,
           trader = EXCLUDED.trader,
           last_tx_id = EXCLUDED.last_tx_id,
           updated_at = now()`,
        [
          position.tokenKey,
          position.tradeIdOnchain,
          toPlainString(position.avgEntryPrice),
          toPlainString(position.amount),
          position.strategy,
          position.trader,
          position.lastTxId,
        ],
      );
    });
  }

  deletePosition(tokenKey: string): Promise<void> {
    return run('deletePosition', async () => {
      await this.db.query('DELETE FROM open_trades WHERE token_address = $1', [tokenKey]);
    });
  }

  insertHistoryOnce(record: HistoryRecord): Promise<boolean> {
    return run('insertHistoryOnce', async () => {
      const result = await this.db.query(
        `INSERT INTO trade_history (${HISTORY_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14)
         ON CONFLICT (event_uid) DO NOTHING`,
        [
          record.eventUid,
          record.tradeIdOnchain,
          record.tokenKey,
          record.action,
          toPlainString(record.price),
          toPlainString(record.amount),
          plainOrNull(record.avgEntryPrice),
          plainOrNull(record.avgExitPrice),
          plainOrNull(record.pnl),
          record.strategy,
          record.txId,
          record.blockNumber,
          record.eventIndex,
          record.blockTimestamp,
        ],
      );
      return result.rowCount === 1;
    });
  }
}

export class PostgresLedgerStore extends PgLedgerWriter implements LedgerStore {
  private readonly pool: pg.Pool;
  private readonly logger: Logger;

  constructor(pool: pg.Pool, logger: Logger) {
    super(poolQueryable(pool), false);
    this.pool = pool;
    this.logger = logger.child({ module: 'postgres-store' });
  }

  async transaction<T>(fn: (tx: LedgerWriter) => Promise<T>): Promise<T> {
    const client = await run('connect', () => this.pool.connect());
    try {
      await run('BEGIN', () => client.query('BEGIN'));
      const result = await fn(new PgLedgerWriter(clientQueryable(client), true));
      await run('COMMIT', () => client.query('COMMIT'));
      return result;
    } catch (err) {
      await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
        this.logger.error({ err: rollbackErr }, 'Rollback failed');
      });
      throw err;
    } finally {
      client.release();
    }
  }

  listPositions(): Promise<OpenPosition[]> {
    return run('listPositions', async () => {
      const { rows } = await this.db.query<OpenTradeRow>(
        `SELECT ${OPEN_TRADE_COLUMNS} FROM open_trades ORDER BY token_address`,
      );
      return rows.map(toPosition);
    });
  }

  listHistory(query: HistoryQuery): Promise<HistoryRecord[]> {
    return run('listHistory', async () => {
      const { rows } =
        query.token === undefined
          ? await this.db.query<TradeHistoryRow>(
              `SELECT ${HISTORY_COLUMNS} FROM trade_history
               ORDER BY block_number DESC, event_index DESC LIMIT $1`,
              [query.limit],
            )
          : await this.db.query<TradeHistoryRow>(
              `SELECT ${HISTORY_COLUMNS} FROM trade_history WHERE token_address = $1
               ORDER BY block_number DESC, event_index DESC LIMIT $2`,
              [query.token, query.limit],
            );
      return rows.map(toHistory);
    });
  }

  async ping(): Promise<void> {
    await run('ping', () => this.pool.query('SELECT 1'));
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('Postgres pool closed');
  }
}

/** Creates the ledger tables and indexes if they do not exist. */
export async function applySchema(pool: pg.Pool, logger: Logger): Promise<void> {
  const sql = await readFile(SCHEMA_URL, 'utf-8');
  await run('applySchema', () => pool.query(sql));
  logger.info({ schema: SCHEMA_URL.pathname }, 'Ledger schema applied');
}
