import { EXPENSE_CATEGORIES, type Category, type DetailLevel } from "./types";

export type ParseFailure =
  | "CancelRequested"
  | "MalformedLine"
  | "InvalidAmount"
  | "EmptyDescription"
  | "UnrecognizedCategory"
  | "InvalidMonthFormat"
  | "UnrecognizedChoice";

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; failure: ParseFailure };

export type PeriodChoice = "currentMonth" | "pickMonth" | "allTime";

export const CANCEL_KEYWORDS = ["отмена", "cancel"];

// numeric(12,2)
const MAX_AMOUNT = 1e10;
const DECIMAL = /^(\d+(\.\d*)?|\.\d+)$/;

export const PERIOD_LABELS: Record<PeriodChoice, string> = {
  currentMonth: "Текущий месяц",
  pickMonth: "Выбрать месяц",
  allTime: "За всё время",
};

export const DETAIL_LABELS: Record<DetailLevel, string> = {
  summary: "Кратко",
  detailed: "Подробно",
};

const ok = <T>(value: T): ParseResult<T> => ({ ok: true, value });
const fail = <T>(failure: ParseFailure): ParseResult<T> => ({
  ok: false,
  failure,
});

export function isCancel(text: string) {
  return CANCEL_KEYWORDS.includes(text.trim().toLowerCase());
}

export function parseAmount(text: string): ParseResult<number> {
  if (isCancel(text)) return fail("CancelRequested");

  const normalized = text.trim().replace(",", ".");
  if (!DECIMAL.test(normalized)) return fail("InvalidAmount");

  const amount = Math.round(Number.parseFloat(normalized) * 100) / 100;
  if (!Number.isFinite(amount) || amount <= 0 || amount >= MAX_AMOUNT) {
    return fail("InvalidAmount");
  }
  return ok(amount);
}

export function parseDescription(text: string): ParseResult<string> {
  if (isCancel(text)) return fail("CancelRequested");

  const description = text.trim();
  return description ? ok(description) : fail("EmptyDescription");
}

/** "amount, description" split on the first comma. */
export function parseEntryLine(
  text: string,
): ParseResult<{ amount: number; description: string }> {
  if (isCancel(text)) return fail("CancelRequested");

  const separator = text.indexOf(",");
  if (separator === -1) return fail("MalformedLine");

  const amount = parseAmount(text.slice(0, separator));
  if (!amount.ok) return fail(amount.failure);

  const description = text.slice(separator + 1).trim();
  if (!description) return fail("EmptyDescription");

  return ok({ amount: amount.value, description });
}

/**
 * Button text such as "🍽️ Еда"; the first category contained in it wins.
 */
export function parseCategory(text: string): ParseResult<Category> {
  if (isCancel(text)) return fail("CancelRequested");

  const trimmed = text.trim();
  const category = EXPENSE_CATEGORIES.find((c) => trimmed.includes(c));
  return category ? ok(category) : fail("UnrecognizedCategory");
}

/**
 * "MM-YY", e.g. "11-25" is November 2025. Two-digit years always land in the
 * 2000s.
 */
export function parseMonth(
  text: string,
): ParseResult<{ year: number; month: number }> {
  if (isCancel(text)) return fail("CancelRequested");

  const fields = text.trim().split("-");
  if (fields.length !== 2) return fail("InvalidMonthFormat");

  const [mm, yy] = fields.map((f) => f.trim());
  if (!/^\d+$/.test(mm) || !/^\d+$/.test(yy)) return fail("InvalidMonthFormat");

  const month = Number(mm);
  const year = 2000 + Number(yy);
  if (month < 1 || month > 12 || year > 9999) return fail("InvalidMonthFormat");

  return ok({ year, month });
}

function parseChoice<T extends string>(
  text: string,
  labels: Record<T, string>,
): ParseResult<T> {
  if (isCancel(text)) return fail("CancelRequested");

  const trimmed = text.trim();
  const keys = Object.keys(labels).filter((k): k is T => k in labels);
  const choice = keys.find((k) => labels[k] === trimmed);
  return choice ? ok(choice) : fail("UnrecognizedChoice");
}

export function parsePeriodChoice(text: string): ParseResult<PeriodChoice> {
  return parseChoice(text, PERIOD_LABELS);
}

export function parseDetailLevel(text: string): ParseResult<DetailLevel> {
  return parseChoice(text, DETAIL_LABELS);
}
