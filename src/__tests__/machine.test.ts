import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AccessGate } from "../handlers/access";
import {
  ConversationMachine,
  type Command,
  type MachineOptions,
} from "../handlers/machine";
import { SessionStore } from "../sessions";
import { StatisticsEngine } from "../stats/engine";
import { renderReport } from "../stats/report";
import { MENU, texts } from "../texts";
import type { LedgerRecord, UserIdentity } from "../types";
import {
  MemoryAllowList,
  MemoryLedgerStore,
  RecordingPort,
} from "./utils/fakes";

const ALICE: UserIdentity = {
  userId: 1,
  username: "alice",
  firstName: "Alice",
};
const BOB: UserIdentity = { userId: 2, username: "bob", firstName: "Bob" };
const OWNER: UserIdentity = { userId: 99, firstName: "Owner" };

type SetupOptions = Partial<MachineOptions> & { ownerId?: number };

function entry(
  kind: LedgerRecord["kind"],
  category: string | null,
  amount: number,
  description: string,
  createdAt: Date,
): Omit<LedgerRecord, "id"> {
  return { userId: 1, kind, category, amount, description, createdAt };
}

function setup({ ownerId, ...overrides }: SetupOptions = {}) {
  const now = new Date(2025, 10, 20, 12);
  const ledger = new MemoryLedgerStore(() => now);
  const allowList = new MemoryAllowList();
  const access = new AccessGate(ownerId, allowList);
  const sessions = SessionStore.inMemory();
  const machine = new ConversationMachine({
    sessions,
    ledger,
    stats: new StatisticsEngine(ledger),
    access,
    options: {
      entryMode: "steps",
      statsDetail: true,
      timeZone: "UTC",
      ...overrides,
    },
    now: () => now,
  });
  const port = new RecordingPort();

  const send = (text: string, user: UserIdentity = ALICE) =>
    machine.handleText({ ...user, text }, port);
  const command = (name: Command, args = "", user: UserIdentity = ALICE) => {
    const text = `/${name} ${args}`.trim();
    return machine.handleCommand({ ...user, text }, name, args, port);
  };

  return { now, ledger, allowList, access, sessions, port, send, command };
}

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("entering records", () => {
  it("saves an income step by step", async () => {
    const { ledger, sessions, port, send, command, now } = setup();

    await command("income");
    expect(port.last).toEqual({ text: texts.incomeAmount, keyboard: "remove" });

    await send("1500,50");
    expect(port.last).toEqual({ text: texts.incomeDescription });

    await send("зарплата");
    expect(port.last).toEqual({
      text: "✅ Доход 1500.50 ₽ сохранён.\nОписание: зарплата",
      keyboard: "main",
    });
    expect(ledger.records).toEqual([
      {
        id: 1,
        userId: 1,
        kind: "income",
        category: null,
        amount: 1500.5,
        description: "зарплата",
        createdAt: now,
      },
    ]);
    expect(await sessions.get(1)).toEqual({ step: "idle" });
  });

  it("saves an expense entered as one line from the menu", async () => {
    const { ledger, port, send } = setup({ entryMode: "line" });

    await send(MENU.expense);
    expect(port.last).toEqual({
      text: texts.expenseCategory,
      keyboard: "categories",
    });

    await send("🏠 Дом");
    expect(port.last).toEqual({
      text: texts.expenseLine("Дом"),
      keyboard: "remove",
    });

    await send("12000, аренда");
    expect(port.last).toEqual({
      text:
        "✅ Расход 12000.00 ₽ сохранён.\n" +
        "Категория: 🏠 Дом\n" +
        "Комментарий: аренда",
      keyboard: "main",
    });
    expect(ledger.records).toHaveLength(1);
    expect(ledger.records[0]).toMatchObject({
      kind: "expense",
      category: "Дом",
      amount: 12000,
    });
  });

  it("asks again after bad input", async () => {
    const { ledger, sessions, port, send, command } = setup();

    await command("income");
    await send("abc");

    expect(port.last).toEqual({ text: texts.invalidAmount });
    expect(await sessions.get(1)).toEqual({ step: "incomeAmount" });
    expect(ledger.records).toEqual([]);
  });

  it("keeps nothing after a cancel", async () => {
    const { ledger, sessions, port, send, command } = setup();

    await command("income");
    await send("100");
    await send("Отмена");

    expect(port.last).toEqual({ text: texts.cancelled, keyboard: "main" });
    expect(await sessions.get(1)).toEqual({ step: "idle" });
    expect(ledger.records).toEqual([]);
  });

  it("cancels with the command too", async () => {
    const { sessions, port, command } = setup();

    await command("expense");
    await command("cancel");

    expect(port.last).toEqual({ text: texts.cancelled, keyboard: "main" });
    expect(await sessions.get(1)).toEqual({ step: "idle" });
  });

  it("tells an idle user there is nothing to cancel", async () => {
    const { port, command } = setup();

    await command("cancel");

    expect(port.replies).toEqual([
      { text: texts.nothingToCancel, keyboard: "main" },
    ]);
  });

  it("stays on the step when the write fails", async () => {
    const { ledger, sessions, port, send, command } = setup();

    await command("income");
    await send("100");
    ledger.failing = true;
    await send("премия");

    expect(port.last).toEqual({ text: texts.saveFailed });
    expect(await sessions.get(1)).toEqual({
      step: "incomeDescription",
      amount: 100,
    });

    ledger.failing = false;
    await send("премия");

    expect(port.last).toEqual({
      text: "✅ Доход 100.00 ₽ сохранён.\nОписание: премия",
      keyboard: "main",
    });
    expect(ledger.records).toHaveLength(1);
  });

  it("lets a menu button replace the current dialog", async () => {
    const { sessions, port, send, command } = setup();

    await command("income");
    await send("100");
    await send(MENU.stats);

    expect(port.last).toEqual({ text: texts.statsPeriod, keyboard: "periods" });
    expect(await sessions.get(1)).toEqual({ step: "statsPeriod" });
  });
});

describe("other messages", () => {
  it("points an idle user at the menu", async () => {
    const { port, send } = setup();

    await send("привет");

    expect(port.replies).toEqual([
      { text: texts.chooseAction, keyboard: "main" },
    ]);
  });

  it("rejects unknown commands", async () => {
    const { port, send } = setup();

    await send("/foo");

    expect(port.replies).toEqual([{ text: texts.unknownCommand }]);
  });

  it("greets on start and drops the dialog", async () => {
    const { sessions, port, command } = setup();

    await command("stats");
    await command("start");

    expect(port.last).toEqual({
      text:
        "Привет, Alice!\n\n" +
        "Я бот для учёта доходов и расходов.\n" +
        "Выбери действие на клавиатуре.",
      keyboard: "main",
    });
    expect(await sessions.get(1)).toEqual({ step: "idle" });
  });

  it("shows owner commands in help only to the owner", async () => {
    const { port, command, allowList } = setup({ ownerId: OWNER.userId });
    await allowList.upsert(ALICE);

    await command("help", "", OWNER);
    await command("help");

    expect(port.replies).toEqual([
      { text: texts.help + texts.ownerHelp },
      { text: texts.help },
    ]);
  });
});

describe("statistics", () => {
  it("reports the current month", async () => {
    const { ledger, port, send, command } = setup({ statsDetail: false });
    const day = (month: number, date: number) => new Date(2025, month, date);
    ledger.seed(entry("income", null, 1000, "зарплата", day(10, 5)));
    ledger.seed(entry("expense", "Еда", 200, "продукты", day(10, 6)));
    ledger.seed(entry("expense", "Досуг", 300, "кино", day(9, 30)));

    await command("stats");
    await send("Текущий месяц");

    expect(port.last).toEqual({
      text: [
        "📊 Статистика: Текущий месяц (2025-11-01 — 2025-12-01)",
        "",
        "Доход: 1000.00 ₽",
        "Расход: 200.00 ₽",
        "Баланс: 800.00 ₽",
        "",
        "Расходы по категориям:",
        "• 🍽️ Еда: 200.00 ₽",
      ].join("\n"),
      keyboard: "main",
    });
  });

  it("reports a picked month in detail", async () => {
    const { ledger, sessions, port, send, command } = setup();
    const utc = (day: number, hour: number, minute: number) =>
      new Date(Date.UTC(2025, 10, day, hour, minute));
    ledger.seed(entry("expense", "Еда", 200, "продукты", utc(12, 18, 40)));
    ledger.seed(entry("income", null, 1000, "зарплата", utc(10, 9, 15)));

    await command("stats");
    await send("Выбрать месяц");
    expect(port.last).toEqual({ text: texts.statsMonth, keyboard: "remove" });

    await send("11-25");
    expect(port.last).toEqual({ text: texts.statsDetail, keyboard: "detail" });

    await send("Подробно");
    expect(port.last).toEqual({
      text: [
        "📊 Статистика: Месяц 11-25",
        "",
        "Доход: 1000.00 ₽",
        "Расход: 200.00 ₽",
        "На руках: 800.00 ₽",
        "",
        "Расходы по категориям:",
        "• 🍽️ Еда: 200.00 ₽",
        "",
        "Записи:",
        "10.11.2025 09:15 ➕ 1000.00 ₽ — зарплата",
        "12.11.2025 18:40 ➖ 🍽️ Еда 200.00 ₽ — продукты",
      ].join("\n"),
      keyboard: "main",
    });
    expect(await sessions.get(1)).toEqual({ step: "idle" });
  });

  it("keeps the step when the query fails", async () => {
    const { ledger, sessions, port, send, command } = setup({
      statsDetail: false,
    });

    await command("stats");
    ledger.failing = true;
    await send("За всё время");

    expect(port.last).toEqual({ text: texts.statsFailed });
    expect(await sessions.get(1)).toEqual({ step: "statsPeriod" });
  });

  it("splits a report that does not fit in one message", async () => {
    const { ledger, port, send, command } = setup();
    for (let i = 0; i < 120; i++) {
      ledger.seed({
        userId: 1,
        kind: "income",
        category: null,
        amount: 1,
        description: "подработка ".repeat(4).trim(),
        createdAt: new Date(Date.UTC(2025, 10, 1, 12) + i * 60_000),
      });
    }

    await command("stats");
    await send("За всё время");
    port.clear();
    await send("Подробно");

    expect(port.replies.length).toBeGreaterThan(1);
    expect(port.replies.every((r) => r.text.length <= 4096)).toBe(true);
    expect(port.replies.map((r) => r.keyboard)).toEqual([
      ...port.replies.slice(1).map(() => undefined),
      "main",
    ]);
    const stats = await new StatisticsEngine(ledger).compute(1, {}, "detailed");
    const report = renderReport(stats, "За всё время", "detailed", "UTC");
    expect(port.replies.map((r) => r.text).join("\n")).toBe(report);
  });
});

describe("access control", () => {
  it("turns away an unknown user and asks the owner", async () => {
    const { access, sessions, port, send } = setup({ ownerId: OWNER.userId });

    await send(MENU.income, BOB);
    await access.settled();

    expect(port.replies).toEqual([{ text: texts.accessDenied(2) }]);
    expect(port.notifications).toEqual([
      {
        chatId: 99,
        text:
          "🔔 Запрос доступа\nID: 2\nИмя: Bob\nUsername: @bob\n\n" +
          "Выдать доступ: /grant 2",
      },
    ]);
    expect(await sessions.get(2)).toEqual({ step: "idle" });
  });

  it("still answers when the owner cannot be reached", async () => {
    const { access, port, send } = setup({ ownerId: OWNER.userId });
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    port.failNotify = true;

    await send("привет", BOB);
    await access.settled();

    expect(port.replies).toEqual([{ text: texts.accessDenied(2) }]);
    expect(port.notifications).toEqual([]);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it("lets the owner grant, list and revoke access", async () => {
    const { access, allowList, port, send, command } = setup({
      ownerId: OWNER.userId,
    });

    await send("привет", BOB);
    await access.settled();

    await command("grant", "2", OWNER);
    expect(port.last).toEqual({ text: texts.granted(2) });
    expect(allowList.users.get(2)).toMatchObject({
      userId: 2,
      username: "bob",
      firstName: "Bob",
    });

    await send(MENU.income, BOB);
    expect(port.last).toEqual({ text: texts.incomeAmount, keyboard: "remove" });

    await command("users", "", OWNER);
    expect(port.last).toEqual({ text: "Список доступа:\n• 2 @bob (Bob)" });

    await command("revoke", "2", OWNER);
    expect(port.last).toEqual({ text: texts.revoked(2) });

    await command("revoke", "2", OWNER);
    expect(port.last).toEqual({ text: texts.notOnList(2) });

    await command("users", "", OWNER);
    expect(port.last).toEqual({ text: texts.emptyAllowList });
  });

  it("grants by id alone when there was no request", async () => {
    const { allowList, command } = setup({ ownerId: OWNER.userId });

    await command("grant", " 7 ", OWNER);

    expect(allowList.users.get(7)).toMatchObject({
      userId: 7,
      username: null,
      firstName: null,
    });
  });

  it("checks the owner command arguments", async () => {
    const { port, command } = setup({ ownerId: OWNER.userId });

    await command("grant", "", OWNER);
    await command("revoke", "bob", OWNER);
    await command("grant", "99", OWNER);

    expect(port.replies).toEqual([
      { text: texts.grantUsage },
      { text: texts.revokeUsage },
      { text: texts.ownerAlwaysAllowed },
    ]);
  });

  it("keeps owner commands from allowed users", async () => {
    const { allowList, port, command } = setup({ ownerId: OWNER.userId });
    await allowList.upsert(ALICE);

    await command("grant", "5");

    expect(port.replies).toEqual([{ text: texts.ownerOnly }]);
    expect(allowList.users.has(5)).toBe(false);
  });

  it("reports a failed allow-list change", async () => {
    const { allowList, port, command } = setup({ ownerId: OWNER.userId });
    allowList.failing = true;

    await command("grant", "5", OWNER);

    expect(port.replies).toEqual([{ text: texts.accessManagementFailed }]);
  });

  it("reports a failed access check", async () => {
    const { allowList, port, send } = setup({ ownerId: OWNER.userId });
    allowList.failing = true;

    await send("привет", BOB);

    expect(port.replies).toEqual([{ text: texts.accessCheckFailed }]);
    expect(port.notifications).toEqual([]);
  });

  it("answers myid without access", async () => {
    const { access, port, command } = setup({ ownerId: OWNER.userId });

    await command("myid", "", BOB);
    await access.settled();

    expect(port.replies).toEqual([{ text: "Твой ID: 2" }]);
    expect(port.notifications).toEqual([]);
  });

  it("lets everyone in when no owner is set", async () => {
    const { port, send, command } = setup();

    await send(MENU.income, BOB);
    expect(port.last).toEqual({ text: texts.incomeAmount, keyboard: "remove" });

    await command("users");
    expect(port.last).toEqual({ text: texts.accessControlOff });
  });
});
