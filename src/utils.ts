import { addMonths, format, startOfMonth } from "date-fns";
import { formatInTimeZone } from "date-fns-tz";
import type { DateRange, Period } from "./types";

export const CURRENCY = "₽";

// telegram rejects messages longer than 4096 characters
export const MESSAGE_LIMIT = 4096;

export function fmtAmount(a: number) {
  return a.toFixed(2);
}

export function fmtMoney(a: number) {
  return `${fmtAmount(a)} ${CURRENCY}`;
}

// format a JS Date into readable string in TZ
export function fmtDate(d: Date, timeZone: string) {
  return formatInTimeZone(d, timeZone, "dd.MM.yyyy HH:mm");
}

/**
 * First day of the month containing `d` up to the first day of the next one,
 * both at local midnight.
 */
export function getMonthRangeForDate(d: Date): Required<DateRange> {
  const from = startOfMonth(d);
  return { from, to: addMonths(from, 1) };
}

export function getMonthRange(
  year: number,
  month: number,
): Required<DateRange> {
  const from = new Date(year, month - 1, 1, 0, 0, 0, 0);
  // years below 100 would otherwise be read as 19xx
  from.setFullYear(year);
  return { from, to: addMonths(from, 1) };
}

export function getRange(period: Period, now: Date = new Date()): DateRange {
  switch (period.type) {
    case "currentMonth":
      return getMonthRangeForDate(now);
    case "allTime":
      return {};
    case "month":
      return getMonthRange(period.year, period.month);
  }
}

export function periodLabel(period: Period, range: DateRange) {
  switch (period.type) {
    case "currentMonth":
      if (!range.from || !range.to) return "Текущий месяц";
      return (
        `Текущий месяц (${format(range.from, "yyyy-MM-dd")} — ` +
        `${format(range.to, "yyyy-MM-dd")})`
      );
    case "allTime":
      return "За всё время";
    case "month": {
      const mm = String(period.month).padStart(2, "0");
      const yy = String(period.year).slice(-2);
      return `Месяц ${mm}-${yy}`;
    }
  }
}

// cuts on code points so a surrogate pair never straddles two chunks
function cutLine(line: string, limit: number) {
  const pieces: string[] = [];
  let piece = "";
  for (const char of line) {
    if (piece.length + char.length > limit) {
      pieces.push(piece);
      piece = "";
    }
    piece += char;
  }
  if (piece) pieces.push(piece);
  return pieces;
}

/** Splits text on line boundaries so that every chunk fits in one message. */
export function splitMessage(text: string, limit = MESSAGE_LIMIT): string[] {
  const chunks: string[] = [];
  // undefined until a line has been taken; "" is a started chunk
  let current: string | undefined;
  const flush = () => {
    // telegram rejects an empty message
    if (current) chunks.push(current);
    current = undefined;
  };

  for (const line of text.split("\n")) {
    if (line.length > limit) {
      flush();
      chunks.push(...cutLine(line, limit));
      continue;
    }
    const candidate = current === undefined ? line : `${current}\n${line}`;
    if (candidate.length > limit) {
      flush();
      current = line;
    } else {
      current = candidate;
    }
  }
  flush();

  return chunks.length > 0 ? chunks : [""];
}
