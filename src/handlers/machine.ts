import { AuthorizationError, PersistenceError } from "../errors";
import { isCancel } from "../parsing";
import type { SessionStore } from "../sessions";
import type { StatisticsEngine } from "../stats/engine";
import { renderReport } from "../stats/report";
import type { LedgerStore } from "../store/ledger";
import { MENU, texts } from "../texts";
import type { UserIdentity } from "../types";
import { getRange, periodLabel, splitMessage } from "../utils";
import type { AccessGate } from "./access";
import {
  advance,
  begin,
  cancel,
  type Dialog,
  type Effect,
  type FlowOptions,
  type KeyboardKind,
  type Reply,
  type Transition,
} from "./flows";

/** What the machine needs from the chat transport. */
export interface ChatPort {
  reply(text: string, keyboard?: KeyboardKind): Promise<void>;
  notify(chatId: number, text: string): Promise<void>;
}

export type IncomingMessage = UserIdentity & { text: string };

export const COMMANDS = [
  "start",
  "help",
  "income",
  "expense",
  "stats",
  "cancel",
  "myid",
  "grant",
  "revoke",
  "users",
] as const;
export type Command = (typeof COMMANDS)[number];

export type MachineOptions = FlowOptions & { timeZone: string };

export type MachineDeps = {
  sessions: SessionStore;
  ledger: LedgerStore;
  stats: StatisticsEngine;
  access: AccessGate;
  options: MachineOptions;
  now?: () => Date;
};

function menuDialog(text: string): Dialog | undefined {
  const dialogs: Dialog[] = ["income", "expense", "stats"];
  return dialogs.find((d) => MENU[d] === text);
}

function parseUserId(args: string) {
  const value = args.trim();
  return /^\d+$/.test(value) ? Number(value) : undefined;
}

export class ConversationMachine {
  constructor(private readonly deps: MachineDeps) {}

  async handleCommand(
    msg: IncomingMessage,
    command: Command,
    args: string,
    port: ChatPort,
  ) {
    // lets a rejected user find out what to send the owner
    if (command === "myid") return port.reply(texts.myId(msg.userId));

    if (!(await this.authorize(msg, port))) return;

    switch (command) {
      case "start":
        await this.deps.sessions.clear(msg.userId);
        return port.reply(texts.greeting(msg.firstName), "main");
      case "help": {
        const isOwner = this.deps.access.isOwner(msg.userId);
        const extra = isOwner ? texts.ownerHelp : "";
        return port.reply(texts.help + extra);
      }
      case "income":
      case "expense":
      case "stats":
        return this.apply(msg, begin(command, this.deps.options), port);
      case "cancel":
        return this.cancel(msg, port);
      case "grant":
      case "revoke":
      case "users":
        return this.manageAccess(msg, command, args, port);
    }
  }

  async handleText(msg: IncomingMessage, port: ChatPort) {
    if (!(await this.authorize(msg, port))) return;

    const text = msg.text.trim();
    const dialog = menuDialog(text);
    // a new dialog replaces whatever was in progress
    if (dialog) return this.apply(msg, begin(dialog, this.deps.options), port);
    if (isCancel(text)) return this.cancel(msg, port);
    if (text.startsWith("/")) return port.reply(texts.unknownCommand);

    const state = await this.deps.sessions.get(msg.userId);
    if (state.step === "idle") return port.reply(texts.chooseAction, "main");

    return this.apply(msg, advance(state, msg.text, this.deps.options), port);
  }

  private async cancel(msg: IncomingMessage, port: ChatPort) {
    const state = await this.deps.sessions.get(msg.userId);
    if (state.step === "idle") return port.reply(texts.nothingToCancel, "main");
    return this.apply(msg, cancel(), port);
  }

  private async authorize(msg: IncomingMessage, port: ChatPort) {
    const { access } = this.deps;
    try {
      await access.ensureAllowed(msg.userId);
      return true;
    } catch (err) {
      if (err instanceof AuthorizationError) {
        console.log(
          `rejected user ${msg.userId} (${msg.username ?? "no username"})`,
        );
        const { userId, username, firstName } = msg;
        access.requestAccess({ userId, username, firstName }, port);
        await port.reply(texts.accessDenied(msg.userId));
        return false;
      }
      if (err instanceof PersistenceError) {
        console.error(`access check for user ${msg.userId} failed:`, err);
        await port.reply(texts.accessCheckFailed);
        return false;
      }
      throw err;
    }
  }

  // runs the effect first so a failed write leaves the user on the same step
  private async apply(
    msg: IncomingMessage,
    transition: Transition,
    port: ChatPort,
  ) {
    const { effect } = transition;
    let extra: Reply[] = [];

    if (effect) {
      try {
        extra = await this.run(msg.userId, effect);
      } catch (err) {
        if (!(err instanceof PersistenceError)) throw err;
        console.error(`${effect.type} for user ${msg.userId} failed:`, err);
        return port.reply(
          effect.type === "save" ? texts.saveFailed : texts.statsFailed,
        );
      }
    }

    await this.deps.sessions.set(msg.userId, transition.next);
    for (const reply of [...transition.replies, ...extra]) {
      await port.reply(reply.text, reply.keyboard);
    }
  }

  private async run(userId: number, effect: Effect): Promise<Reply[]> {
    switch (effect.type) {
      case "save": {
        const record = await this.deps.ledger.insert({
          ...effect.entry,
          userId,
        });
        console.log(
          `record ${record.id} saved: ` +
            `user=${userId} ${record.kind} ${record.amount}`,
        );
        return [];
      }
      case "report": {
        const now = this.deps.now?.() ?? new Date();
        const range = getRange(effect.period, now);
        const stats = await this.deps.stats.compute(
          userId,
          range,
          effect.detail,
        );
        const text = renderReport(
          stats,
          periodLabel(effect.period, range),
          effect.detail,
          this.deps.options.timeZone,
        );
        const chunks = splitMessage(text);
        return chunks.map((chunk, i): Reply => ({
          text: chunk,
          keyboard: i === chunks.length - 1 ? "main" : undefined,
        }));
      }
    }
  }

  private async manageAccess(
    msg: IncomingMessage,
    command: "grant" | "revoke" | "users",
    args: string,
    port: ChatPort,
  ) {
    const { access } = this.deps;
    if (!access.enabled) return port.reply(texts.accessControlOff);

    try {
      access.assertOwner(msg.userId);
      if (command === "users") {
        const users = await access.list();
        if (users.length === 0) return port.reply(texts.emptyAllowList);
        const lines = users.map((u) => {
          const username = u.username ? ` @${u.username}` : "";
          const name = u.firstName ? ` (${u.firstName})` : "";
          return `• ${u.userId}${username}${name}`;
        });
        return port.reply([texts.allowListTitle, ...lines].join("\n"));
      }

      const userId = parseUserId(args);
      if (userId === undefined) {
        return port.reply(
          command === "grant" ? texts.grantUsage : texts.revokeUsage,
        );
      }
      if (access.isOwner(userId)) return port.reply(texts.ownerAlwaysAllowed);

      if (command === "grant") {
        await access.grant(userId);
        console.log(`access granted to ${userId}`);
        return port.reply(texts.granted(userId));
      }

      const removed = await access.revoke(userId);
      if (removed) console.log(`access revoked from ${userId}`);
      return port.reply(
        removed ? texts.revoked(userId) : texts.notOnList(userId),
      );
    } catch (err) {
      if (err instanceof AuthorizationError) return port.reply(texts.ownerOnly);
      if (!(err instanceof PersistenceError)) throw err;
      console.error(`${command} by owner failed:`, err);
      return port.reply(texts.accessManagementFailed);
    }
  }
}
