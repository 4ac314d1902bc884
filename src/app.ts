import { Bot, type Context } from "grammy";
import {
  COMMANDS,
  type ChatPort,
  type ConversationMachine,
  type IncomingMessage,
} from "./handlers/machine";
import { replyMarkup } from "./keyboards";

// shown in the Telegram command menu; owner commands stay out of it
export const COMMAND_MENU = [
  { command: "start", description: "Главное меню" },
  { command: "income", description: "Добавить доход" },
  { command: "expense", description: "Добавить расход" },
  { command: "stats", description: "Статистика" },
  { command: "cancel", description: "Отменить действие" },
  { command: "myid", description: "Показать мой ID" },
  { command: "help", description: "Помощь" },
];

function chatPort(ctx: Context): ChatPort {
  return {
    async reply(text, keyboard) {
      await ctx.reply(
        text,
        keyboard ? { reply_markup: replyMarkup(keyboard) } : undefined,
      );
    },
    async notify(chatId, text) {
      await ctx.api.sendMessage(chatId, text);
    },
  };
}

function incoming(ctx: Context): IncomingMessage | undefined {
  const from = ctx.from;
  if (!from) return undefined;
  return {
    userId: from.id,
    username: from.username,
    firstName: from.first_name,
    text: ctx.message?.text ?? "",
  };
}

export function createBot(token: string, machine: ConversationMachine) {
  const bot = new Bot(token);

  // only private chats; the ledger is keyed by the sender
  const chats = bot.chatType("private");

  for (const command of COMMANDS) {
    chats.command(command, async (ctx) => {
      const msg = incoming(ctx);
      if (!msg) return;
      await machine.handleCommand(msg, command, ctx.match, chatPort(ctx));
    });
  }

  chats.on("message:text", async (ctx) => {
    const msg = incoming(ctx);
    if (!msg) return;
    await machine.handleText(msg, chatPort(ctx));
  });

  bot.catch((err) => {
    console.error(
      `Bot Error while handling update ${err.ctx.update.update_id}:`,
      err.error,
    );
  });

  return bot;
}
