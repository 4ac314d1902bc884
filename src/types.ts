export const RECORD_KINDS = ["income", "expense"] as const;
export type RecordKind = (typeof RECORD_KINDS)[number];

export const EXPENSE_CATEGORIES = [
  "Еда",
  "Дом",
  "Коммуналка",
  "Досуг",
  "НЗ",
] as const;
export type Category = (typeof EXPENSE_CATEGORIES)[number];

// money set aside, always reported in its own section
export const RESERVE_CATEGORY: Category = "НЗ";

export const CATEGORY_EMOJI: Record<Category, string> = {
  Еда: "🍽️",
  Дом: "🏠",
  Коммуналка: "💡",
  Досуг: "🎉",
  НЗ: "📦",
};

export function isCategory(value: string | null): value is Category {
  return EXPENSE_CATEGORIES.some((c) => c === value);
}

export type LedgerRecord = {
  id: number;
  userId: number;
  kind: RecordKind;
  category: string | null;
  amount: number;
  description: string;
  createdAt: Date;
};

export type EntryDraft =
  | { kind: "income"; amount: number; description: string }
  | {
      kind: "expense";
      category: Category;
      amount: number;
      description: string;
    };

export type NewRecord = EntryDraft & { userId: number };

export type AllowedUser = {
  userId: number;
  username: string | null;
  firstName: string | null;
  createdAt: Date;
};

export type UserIdentity = {
  userId: number;
  username?: string;
  firstName?: string;
};

/** Half-open `[from, to)`; a missing bound is unbounded. */
export type DateRange = {
  from?: Date;
  to?: Date;
};

export type Period =
  | { type: "currentMonth" }
  | { type: "allTime" }
  | { type: "month"; year: number; month: number };

export type DetailLevel = "summary" | "detailed";

export type EntryMode = "steps" | "line";
