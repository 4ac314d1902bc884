import type { CategoryTotals, KindTotals, LedgerStore } from "../store/ledger";
import {
  RESERVE_CATEGORY,
  type DateRange,
  type DetailLevel,
  type LedgerRecord,
  type RecordKind,
} from "../types";

export type Statistics = {
  sums: KindTotals;
  /** Expense records only. */
  categoryTotals: CategoryTotals;
  /** Present for detailed queries. */
  records?: LedgerRecord[];
};

export type Summary = {
  income: number;
  expense: number;
  balance: number;
  onHand: number;
  reserve: number;
  /** Every category total except the reserve. */
  categories: CategoryTotals;
};

const KIND_ORDER: Record<RecordKind, number> = { income: 0, expense: 1 };

function compareCategory(a: string | null, b: string | null) {
  const x = a ?? "";
  const y = b ?? "";
  if (x === y) return 0;
  return x < y ? -1 : 1;
}

/**
 * Income before expense, then category (uncategorized first), then creation
 * time.
 */
export function compareDetailed(a: LedgerRecord, b: LedgerRecord) {
  return (
    KIND_ORDER[a.kind] - KIND_ORDER[b.kind] ||
    compareCategory(a.category, b.category) ||
    a.createdAt.getTime() - b.createdAt.getTime() ||
    a.id - b.id
  );
}

export function summarize(stats: Statistics): Summary {
  const income = stats.sums.income ?? 0;
  const expense = stats.sums.expense ?? 0;
  const categories: CategoryTotals = new Map(stats.categoryTotals);
  categories.delete(RESERVE_CATEGORY);

  return {
    income,
    expense,
    balance: income - expense,
    onHand: income - expense,
    reserve: stats.categoryTotals.get(RESERVE_CATEGORY) ?? 0,
    categories,
  };
}

export class StatisticsEngine {
  constructor(private readonly ledger: LedgerStore) {}

  async compute(
    userId: number,
    range: DateRange,
    detail: DetailLevel = "summary",
  ): Promise<Statistics> {
    const filter = { userId, from: range.from, to: range.to };

    const [sums, categoryTotals, records] = await Promise.all([
      this.ledger.sumByKind(filter),
      this.ledger.sumByCategory({ ...filter, kind: "expense" }),
      detail === "detailed" ? this.ledger.list(filter) : undefined,
    ]);

    return {
      sums,
      categoryTotals,
      records: records ? [...records].sort(compareDetailed) : undefined,
    };
  }
}
