import {
  parseAmount,
  parseCategory,
  parseDescription,
  parseDetailLevel,
  parseEntryLine,
  parseMonth,
  parsePeriodChoice,
  type ParseFailure,
} from "../parsing";
import { texts } from "../texts";
import type {
  Category,
  DetailLevel,
  EntryDraft,
  EntryMode,
  Period,
} from "../types";

export type KeyboardKind =
  | "main"
  | "categories"
  | "periods"
  | "detail"
  | "remove";

export type Reply = { text: string; keyboard?: KeyboardKind };

/**
 * Where a user is inside a dialog. Each step keeps only what the following
 * steps still need.
 */
export type DialogState =
  | { step: "idle" }
  | { step: "incomeAmount" }
  | { step: "incomeDescription"; amount: number }
  | { step: "incomeLine" }
  | { step: "expenseCategory" }
  | { step: "expenseAmount"; category: Category }
  | { step: "expenseDescription"; category: Category; amount: number }
  | { step: "expenseLine"; category: Category }
  | { step: "statsPeriod" }
  | { step: "statsMonth" }
  | { step: "statsDetail"; period: Period };

export type ActiveState = Exclude<DialogState, { step: "idle" }>;

export type Dialog = "income" | "expense" | "stats";

export type Effect =
  | { type: "save"; entry: EntryDraft }
  | { type: "report"; period: Period; detail: DetailLevel };

/**
 * Result of one step. `replies` are sent once `effect` has run; a report
 * effect contributes its own replies after them.
 */
export type Transition = {
  next: DialogState;
  replies: Reply[];
  effect?: Effect;
};

export type FlowOptions = {
  entryMode: EntryMode;
  /** Ask for summary or detailed statistics before reporting. */
  statsDetail: boolean;
};

export const IDLE: DialogState = { step: "idle" };

const FAILURE_TEXT: Record<Exclude<ParseFailure, "CancelRequested">, string> = {
  MalformedLine: texts.malformedLine,
  InvalidAmount: texts.invalidAmount,
  EmptyDescription: texts.emptyDescription,
  UnrecognizedCategory: texts.unknownCategory,
  InvalidMonthFormat: texts.invalidMonth,
  UnrecognizedChoice: texts.unknownChoice,
};

function keyboardFor(state: ActiveState): KeyboardKind | undefined {
  switch (state.step) {
    case "expenseCategory":
      return "categories";
    case "statsPeriod":
      return "periods";
    case "statsDetail":
      return "detail";
    default:
      return undefined;
  }
}

const ask = (
  next: ActiveState,
  text: string,
  keyboard?: KeyboardKind,
): Transition => ({
  next,
  replies: [{ text, keyboard }],
});

export function cancel(): Transition {
  return { next: IDLE, replies: [{ text: texts.cancelled, keyboard: "main" }] };
}

// bad input keeps the user on the same step
function reject(state: ActiveState, failure: ParseFailure): Transition {
  if (failure === "CancelRequested") return cancel();
  return ask(state, FAILURE_TEXT[failure], keyboardFor(state));
}

function save(entry: EntryDraft): Transition {
  const text =
    entry.kind === "income"
      ? texts.incomeSaved(entry.amount, entry.description)
      : texts.expenseSaved(entry.category, entry.amount, entry.description);
  return {
    next: IDLE,
    replies: [{ text, keyboard: "main" }],
    effect: { type: "save", entry },
  };
}

function report(period: Period, detail: DetailLevel): Transition {
  return {
    next: IDLE,
    replies: [],
    effect: { type: "report", period, detail },
  };
}

function choosePeriod(period: Period, options: FlowOptions): Transition {
  return options.statsDetail
    ? ask({ step: "statsDetail", period }, texts.statsDetail, "detail")
    : report(period, "summary");
}

export function begin(dialog: Dialog, options: FlowOptions): Transition {
  switch (dialog) {
    case "income":
      return options.entryMode === "line"
        ? ask({ step: "incomeLine" }, texts.incomeLine, "remove")
        : ask({ step: "incomeAmount" }, texts.incomeAmount, "remove");
    case "expense":
      return ask(
        { step: "expenseCategory" },
        texts.expenseCategory,
        "categories",
      );
    case "stats":
      return ask({ step: "statsPeriod" }, texts.statsPeriod, "periods");
  }
}

export function advance(
  state: ActiveState,
  text: string,
  options: FlowOptions,
): Transition {
  switch (state.step) {
    case "incomeAmount": {
      const amount = parseAmount(text);
      if (!amount.ok) return reject(state, amount.failure);
      return ask(
        { step: "incomeDescription", amount: amount.value },
        texts.incomeDescription,
      );
    }

    case "incomeDescription": {
      const description = parseDescription(text);
      if (!description.ok) return reject(state, description.failure);
      return save({
        kind: "income",
        amount: state.amount,
        description: description.value,
      });
    }

    case "incomeLine": {
      const line = parseEntryLine(text);
      if (!line.ok) return reject(state, line.failure);
      return save({ kind: "income", ...line.value });
    }

    case "expenseCategory": {
      const category = parseCategory(text);
      if (!category.ok) return reject(state, category.failure);
      if (options.entryMode === "line") {
        return ask(
          { step: "expenseLine", category: category.value },
          texts.expenseLine(category.value),
          "remove",
        );
      }
      return ask(
        { step: "expenseAmount", category: category.value },
        texts.expenseAmount(category.value),
        "remove",
      );
    }

    case "expenseAmount": {
      const amount = parseAmount(text);
      if (!amount.ok) return reject(state, amount.failure);
      return ask(
        {
          step: "expenseDescription",
          category: state.category,
          amount: amount.value,
        },
        texts.expenseDescription,
      );
    }

    case "expenseDescription": {
      const description = parseDescription(text);
      if (!description.ok) return reject(state, description.failure);
      return save({
        kind: "expense",
        category: state.category,
        amount: state.amount,
        description: description.value,
      });
    }

    case "expenseLine": {
      const line = parseEntryLine(text);
      if (!line.ok) return reject(state, line.failure);
      return save({ kind: "expense", category: state.category, ...line.value });
    }

    case "statsPeriod": {
      const choice = parsePeriodChoice(text);
      if (!choice.ok) return reject(state, choice.failure);
      if (choice.value === "pickMonth") {
        return ask({ step: "statsMonth" }, texts.statsMonth, "remove");
      }
      return choosePeriod({ type: choice.value }, options);
    }

    case "statsMonth": {
      const month = parseMonth(text);
      if (!month.ok) return reject(state, month.failure);
      return choosePeriod({ type: "month", ...month.value }, options);
    }

    case "statsDetail": {
      const detail = parseDetailLevel(text);
      if (!detail.ok) return reject(state, detail.failure);
      return report(state.period, detail.value);
    }
  }
}
