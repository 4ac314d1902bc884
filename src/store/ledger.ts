import { and, asc, count, eq, gte, lt, sum, type SQL } from "drizzle-orm";
import type { Database } from "../db";
import { PersistenceError, ValidationError } from "../errors";
import { records } from "../schema";
import type { LedgerRecord, NewRecord, RecordKind } from "../types";

export type RecordFilter = {
  userId: number;
  from?: Date;
  to?: Date;
  kind?: RecordKind;
};

export type KindTotals = Partial<Record<RecordKind, number>>;

// null key: expense rows written without a category
export type CategoryTotals = Map<string | null, number>;

export interface LedgerStore {
  insert(record: NewRecord): Promise<LedgerRecord>;
  sumByKind(filter: RecordFilter): Promise<KindTotals>;
  sumByCategory(filter: RecordFilter): Promise<CategoryTotals>;
  /** Records matching the filter, oldest first. */
  list(filter: RecordFilter): Promise<LedgerRecord[]>;
}

/** Rejects records that break the ledger rules before they reach the store. */
export function assertValidRecord(record: NewRecord) {
  if (!Number.isFinite(record.amount) || record.amount <= 0) {
    throw new ValidationError(
      `amount must be positive, got ${record.amount}`,
      "amount",
    );
  }
  if (record.kind === "expense" && !record.category) {
    throw new ValidationError("expense records need a category", "category");
  }
  if (record.kind === "income" && "category" in record) {
    throw new ValidationError("income records carry no category", "category");
  }
}

/** True when `record` falls inside `filter`, with `to` exclusive. */
export function matchesFilter(record: LedgerRecord, filter: RecordFilter) {
  return (
    record.userId === filter.userId &&
    (!filter.kind || record.kind === filter.kind) &&
    (!filter.from || record.createdAt >= filter.from) &&
    (!filter.to || record.createdAt < filter.to)
  );
}

function where(filter: RecordFilter): SQL | undefined {
  return and(
    eq(records.userId, filter.userId),
    filter.from ? gte(records.createdAt, filter.from) : undefined,
    filter.to ? lt(records.createdAt, filter.to) : undefined,
    filter.kind ? eq(records.kind, filter.kind) : undefined,
  );
}

async function attempt<T>(
  operation: string,
  run: () => Promise<T>,
): Promise<T> {
  try {
    return await run();
  } catch (err) {
    throw new PersistenceError(operation, err);
  }
}

type RecordRow = typeof records.$inferSelect;

function toRecord(row: RecordRow): LedgerRecord {
  return {
    id: row.id,
    userId: row.userId,
    kind: row.kind,
    category: row.category,
    amount: Number(row.amount),
    description: row.description ?? "",
    createdAt: row.createdAt,
  };
}

export class PgLedgerStore implements LedgerStore {
  constructor(private readonly db: Database) {}

  async insert(record: NewRecord) {
    assertValidRecord(record);

    const [row] = await attempt("insert record", () =>
      this.db
        .insert(records)
        .values({
          userId: record.userId,
          kind: record.kind,
          category: record.kind === "expense" ? record.category : null,
          amount: record.amount.toFixed(2),
          description: record.description,
          createdAt: new Date(),
        })
        .returning(),
    );
    return toRecord(row);
  }

  async sumByKind(filter: RecordFilter) {
    const rows = await attempt("sum by kind", () =>
      this.db
        .select({ kind: records.kind, total: sum(records.amount) })
        .from(records)
        .where(where(filter))
        .groupBy(records.kind),
    );

    const totals: KindTotals = {};
    for (const row of rows) totals[row.kind] = Number(row.total ?? 0);
    return totals;
  }

  async sumByCategory(filter: RecordFilter) {
    const rows = await attempt("sum by category", () =>
      this.db
        .select({ category: records.category, total: sum(records.amount) })
        .from(records)
        .where(where({ ...filter, kind: "expense" }))
        .groupBy(records.category),
    );

    const totals: CategoryTotals = new Map();
    for (const row of rows) totals.set(row.category, Number(row.total ?? 0));
    return totals;
  }

  async list(filter: RecordFilter) {
    const rows = await attempt("list records", () =>
      this.db
        .select()
        .from(records)
        .where(where(filter))
        .orderBy(asc(records.createdAt), asc(records.id)),
    );
    return rows.map(toRecord);
  }

  async count() {
    const [row] = await attempt("count records", () =>
      this.db.select({ value: count() }).from(records),
    );
    return row?.value ?? 0;
  }
}
