import { Keyboard } from "grammy";
import type { KeyboardKind } from "./handlers/flows";
import { DETAIL_LABELS, PERIOD_LABELS } from "./parsing";
import { categoryButton, MENU } from "./texts";
import { EXPENSE_CATEGORIES } from "./types";

// Main menu keyboard
const mainMenu = new Keyboard()
  .text(MENU.income)
  .text(MENU.expense)
  .row()
  .text(MENU.stats)
  .resized();

const categoryMenu = Keyboard.from(
  EXPENSE_CATEGORIES.map((c) => [categoryButton(c)]),
)
  .resized()
  .oneTime();

const periodMenu = new Keyboard()
  .text(PERIOD_LABELS.currentMonth)
  .text(PERIOD_LABELS.pickMonth)
  .row()
  .text(PERIOD_LABELS.allTime)
  .resized()
  .oneTime();

const detailMenu = new Keyboard()
  .text(DETAIL_LABELS.summary)
  .text(DETAIL_LABELS.detailed)
  .resized()
  .oneTime();

export function replyMarkup(kind: KeyboardKind) {
  switch (kind) {
    case "main":
      return mainMenu;
    case "categories":
      return categoryMenu;
    case "periods":
      return periodMenu;
    case "detail":
      return detailMenu;
    case "remove":
      return { remove_keyboard: true as const };
  }
}
