import type { CategoryTotals } from "../store/ledger";
import {
  CATEGORY_EMOJI,
  EXPENSE_CATEGORIES,
  RESERVE_CATEGORY,
  isCategory,
  type DetailLevel,
  type LedgerRecord,
} from "../types";
import { fmtDate, fmtMoney } from "../utils";
import { summarize, type Statistics } from "./engine";

export const NO_RECORDS = "За этот период записей нет.";
const UNCATEGORIZED = "Без категории";

export function categoryTitle(category: string | null) {
  if (category === null || category === "") return UNCATEGORIZED;
  return isCategory(category)
    ? `${CATEGORY_EMOJI[category]} ${category}`
    : category;
}

function categoryRank(category: string | null) {
  const index = EXPENSE_CATEGORIES.findIndex((c) => c === category);
  if (index !== -1) return index;
  return category ? EXPENSE_CATEGORIES.length : EXPENSE_CATEGORIES.length + 1;
}

// known categories in menu order, then the rest alphabetically
function orderedCategories(totals: CategoryTotals) {
  return [...totals.entries()].sort(
    ([a], [b]) =>
      categoryRank(a) - categoryRank(b) || (a ?? "").localeCompare(b ?? ""),
  );
}

function recordLine(record: LedgerRecord, timeZone: string) {
  const when = fmtDate(record.createdAt, timeZone);
  const what =
    record.kind === "income"
      ? `➕ ${fmtMoney(record.amount)}`
      : `➖ ${categoryTitle(record.category)} ${fmtMoney(record.amount)}`;
  return record.description
    ? `${when} ${what} — ${record.description}`
    : `${when} ${what}`;
}

export function renderReport(
  stats: Statistics,
  periodLabel: string,
  detail: DetailLevel,
  timeZone: string,
) {
  const summary = summarize(stats);

  const lines = [
    `📊 Статистика: ${periodLabel}`,
    "",
    `Доход: ${fmtMoney(summary.income)}`,
    `Расход: ${fmtMoney(summary.expense)}`,
    detail === "detailed"
      ? `На руках: ${fmtMoney(summary.onHand)}`
      : `Баланс: ${fmtMoney(summary.balance)}`,
  ];

  if (summary.categories.size > 0) {
    lines.push("", "Расходы по категориям:");
    for (const [category, amount] of orderedCategories(summary.categories)) {
      lines.push(`• ${categoryTitle(category)}: ${fmtMoney(amount)}`);
    }
  }

  if (summary.reserve) {
    lines.push("", "НЗ (Запас):");
    lines.push(
      `• ${categoryTitle(RESERVE_CATEGORY)}: ${fmtMoney(summary.reserve)}`,
    );
  }

  if (detail === "detailed") {
    const records = stats.records ?? [];
    lines.push("");
    if (records.length === 0) {
      lines.push(NO_RECORDS);
    } else {
      lines.push("Записи:");
      for (const record of records) lines.push(recordLine(record, timeZone));
    }
  }

  return lines.join("\n");
}
