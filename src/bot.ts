import "dotenv/config";
import express from "express";
import { Bot, GrammyError } from "grammy";
import { COMMAND_MENU, createBot } from "./app";
import { loadConfig, type Config } from "./config";
import { createDb, ensureSchema } from "./db";
import { AccessGate } from "./handlers/access";
import { ConversationMachine } from "./handlers/machine";
import { SessionStore } from "./sessions";
import { StatisticsEngine } from "./stats/engine";
import { PgAllowListStore } from "./store/allowList";
import { PgLedgerStore } from "./store/ledger";

// safe webhook setter: check current webhook first and respect retry-after
async function ensureWebhookSet(bot: Bot, fullUrl: string) {
  try {
    const info = await bot.api.getWebhookInfo();
    if (info.url === fullUrl) {
      console.log("Webhook already set and matches:", fullUrl);
      return;
    }

    console.log("Current webhook differs. Setting webhook to:", fullUrl);
    await bot.api.setWebhook(fullUrl);
    console.log("Webhook set successfully.");
  } catch (err) {
    const retryAfter =
      err instanceof GrammyError ? err.parameters.retry_after : undefined;
    if (!retryAfter) {
      console.error("Failed to check/set webhook:", err);
      return;
    }

    console.warn(
      `setWebhook rate-limited. retry_after=${retryAfter}s, retrying once.`,
    );
    await new Promise((res) => setTimeout(res, retryAfter * 1000));
    try {
      await bot.api.setWebhook(fullUrl);
      console.log("Webhook set successfully after waiting.");
    } catch (err2) {
      console.error("Failed to set webhook after waiting:", err2);
    }
  }
}

function serveWebhook(
  bot: Bot,
  webhook: NonNullable<Config["webhook"]>,
  onClose: () => Promise<void>,
) {
  const webhookPath = `/webhook/${webhook.secret}`;
  const fullUrl = `${webhook.url.replace(/\/$/, "")}${webhookPath}`;

  const app = express();
  app.use(express.json());

  // Telegram will POST updates here
  app.post(webhookPath, async (req, res) => {
    try {
      await bot.handleUpdate(req.body);
    } catch (err) {
      console.error("Webhook handler error:", err);
      console.error(
        "Webhook payload (preview):",
        JSON.stringify(req.body).slice(0, 2000),
      );
    }
    // always 200 so Telegram does not redeliver the same update
    res.sendStatus(200);
  });

  // a simple healthcheck
  app.get("/", (_req, res) => {
    res.send("OK");
  });

  const server = app.listen(webhook.port, () => {
    console.log(
      `Server listening on port ${webhook.port}, will ensure webhook ${fullUrl}`,
    );
    void ensureWebhookSet(bot, fullUrl);
  });

  async function gracefulShutdown() {
    console.log("Shutting down gracefully...");
    try {
      // remove webhook so Telegram stops sending to this instance
      await bot.api.deleteWebhook();
    } catch (err) {
      console.warn("deleteWebhook failed:", err);
    }
    server.close(() => {
      console.log("HTTP server closed.");
      onClose().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("cleanup failed:", err);
          process.exit(1);
        },
      );
    });
  }

  const onSignal = () => {
    void gracefulShutdown();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

async function main() {
  const config = loadConfig();
  // month boundaries use the local calendar, keep it in the display zone
  process.env.TZ = config.timeZone;

  const { db, pool } = createDb(config);
  await ensureSchema(db);

  const ledger = new PgLedgerStore(db);
  const access = new AccessGate(config.ownerId, new PgAllowListStore(db));
  const machine = new ConversationMachine({
    sessions: SessionStore.inMemory(config.sessionTtlMinutes),
    ledger,
    stats: new StatisticsEngine(ledger),
    access,
    options: {
      entryMode: config.entryMode,
      statsDetail: config.statsDetail,
      timeZone: config.timeZone,
    },
  });

  const bot = createBot(config.botToken, machine);
  await bot.init();
  await bot.api.setMyCommands(COMMAND_MENU);

  console.log(
    `@${bot.botInfo.username}: entry=${config.entryMode} ` +
      `detail=${config.statsDetail} ` +
      `access=${access.enabled ? "owner+allow-list" : "open"}`,
  );

  const cleanup = async () => {
    await access.settled();
    await pool.end();
  };

  if (config.webhook) {
    serveWebhook(bot, config.webhook, cleanup);
    return;
  }

  const stop = () => {
    bot.stop().catch((err: unknown) => console.error("bot.stop failed:", err));
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);

  // resolves after bot.stop()
  await bot.start({ onStart: () => console.log("Long polling started.") });
  await cleanup();
  console.log("Bot stopped.");
}

main().catch((err) => {
  console.error("fatal error starting bot:", err);
  process.exit(1);
});
