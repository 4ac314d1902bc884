import { CATEGORY_EMOJI, type Category, type UserIdentity } from "./types";
import { fmtMoney } from "./utils";

export const MENU = {
  income: "➕ Доход",
  expense: "➖ Расход",
  stats: "📊 Статистика",
} as const;

export const categoryButton = (category: Category) =>
  `${CATEGORY_EMOJI[category]} ${category}`;

export const texts = {
  greeting: (firstName?: string) =>
    `Привет${firstName ? `, ${firstName}` : ""}!\n\n` +
    "Я бот для учёта доходов и расходов.\n" +
    "Выбери действие на клавиатуре.",
  help:
    "📚 Команды:\n" +
    "/start — главное меню\n" +
    "/income — добавить доход\n" +
    "/expense — добавить расход\n" +
    "/stats — статистика\n" +
    "/cancel — отменить текущее действие\n" +
    "/myid — показать твой ID\n" +
    "\nНапиши «отмена», чтобы прервать ввод.",
  ownerHelp:
    "\n\n👑 Владельцу:\n" +
    "/grant <id> — выдать доступ\n" +
    "/revoke <id> — отозвать доступ\n" +
    "/users — список доступа",
  chooseAction: "Выбери действие на клавиатуре.",
  unknownCommand: "Неизвестная команда. /help — список команд.",
  cancelled: "Действие отменено.",
  nothingToCancel: "Нет активного действия.",

  incomeAmount: "Введи сумму дохода (например: 1500.50):",
  incomeDescription:
    "За что ты получил этот доход? (например: зарплата, заказ, подработка)",
  incomeLine:
    "Введи доход одной строкой: сумма, описание\n" +
    "Например: 1500.50, зарплата",
  incomeSaved: (amount: number, description: string) =>
    `✅ Доход ${fmtMoney(amount)} сохранён.\nОписание: ${description}`,

  expenseCategory: "Выбери категорию расхода:",
  expenseAmount: (category: Category) =>
    `Категория: ${categoryButton(category)}\nТеперь введи сумму расхода:`,
  expenseLine: (category: Category) =>
    `Категория: ${categoryButton(category)}\n` +
    "Введи расход одной строкой: сумма, комментарий\nНапример: 350, продукты",
  expenseDescription:
    "Напиши комментарий: за что потратил?\n" +
    "Например: продукты, аренда, кино...",
  expenseSaved: (category: Category, amount: number, description: string) =>
    `✅ Расход ${fmtMoney(amount)} сохранён.\n` +
    `Категория: ${categoryButton(category)}\n` +
    `Комментарий: ${description}`,

  invalidAmount: "Некорректная сумма. Введи положительное число:",
  emptyDescription: "Описание не может быть пустым. Напиши пару слов:",
  malformedLine:
    "Нужен формат «сумма, описание» через запятую. " +
    "Например: 1500.50, зарплата",
  unknownCategory: "Пожалуйста, выбери категорию с клавиатуры.",

  statsPeriod: "За какой период показать статистику?",
  statsMonth:
    "Введи месяц в формате ММ-ГГ (последние 2 цифры года), например: 11-25",
  statsDetail: "Как показать статистику?",
  invalidMonth: "Неверный формат. Нужен ММ-ГГ, например: 11-25 (ноябрь 2025).",
  unknownChoice: "Пожалуйста, выбери вариант с клавиатуры.",

  saveFailed:
    "⚠️ Не удалось сохранить запись. Попробуй отправить сообщение ещё раз.",
  statsFailed: "⚠️ Не удалось получить статистику. Попробуй ещё раз.",
  accessCheckFailed: "⚠️ Не удалось проверить доступ. Попробуй позже.",

  myId: (userId: number) => `Твой ID: ${userId}`,
  accessDenied: (userId: number) =>
    "⛔ У тебя нет доступа к этому боту.\n" +
    `Твой ID: ${userId}. Владелец получил запрос на доступ.`,
  accessRequest: (user: UserIdentity) =>
    "🔔 Запрос доступа\n" +
    `ID: ${user.userId}\n` +
    `Имя: ${user.firstName ?? "—"}\n` +
    `Username: ${user.username ? `@${user.username}` : "—"}\n\n` +
    `Выдать доступ: /grant ${user.userId}`,
  ownerOnly: "Эта команда доступна только владельцу.",
  accessControlOff: "Управление доступом выключено: OWNER_ID не задан.",
  grantUsage: "Использование: /grant <id>",
  revokeUsage: "Использование: /revoke <id>",
  ownerAlwaysAllowed: "Владелец всегда имеет доступ.",
  granted: (userId: number) => `✅ Доступ выдан: ${userId}`,
  revoked: (userId: number) => `🚫 Доступ отозван: ${userId}`,
  notOnList: (userId: number) =>
    `Пользователь ${userId} не найден в списке доступа.`,
  emptyAllowList: "Список доступа пуст.",
  allowListTitle: "Список доступа:",
  accessManagementFailed:
    "⚠️ Не удалось изменить список доступа. Попробуй ещё раз.",
};
