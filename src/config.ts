import { z } from "zod";
import { ConfigurationError } from "./errors";

// unset and empty variables are treated alike
const blankAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const flag = (fallback: "true" | "false") =>
  z
    .preprocess(
      blankAsUndefined,
      z.enum(["true", "false"]).default(fallback),
    )
    .transform((v) => v === "true");

const EnvSchema = z.object({
  BOT_TOKEN: z
    .string({ required_error: "BOT_TOKEN is missing" })
    .min(1, "BOT_TOKEN is missing"),
  DATABASE_URL: z
    .string({ required_error: "DATABASE_URL is missing" })
    .min(1, "DATABASE_URL is missing"),
  DATABASE_SSL: flag("true"),
  OWNER_ID: z.preprocess(
    blankAsUndefined,
    z
      .string()
      .regex(/^\d+$/, "OWNER_ID must be a numeric user id")
      .transform(Number)
      .optional(),
  ),
  ENTRY_MODE: z.preprocess(
    blankAsUndefined,
    z.enum(["steps", "line"]).default("steps"),
  ),
  STATS_DETAIL: flag("true"),
  TZ: z.preprocess(blankAsUndefined, z.string().default("Europe/Moscow")),
  SESSION_TTL_MINUTES: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(60),
  ),
  WEBHOOK_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  WEBHOOK_SECRET: z.preprocess(
    blankAsUndefined,
    z.string().default("ledger-bot-secret"),
  ),
  PORT: z.preprocess(
    blankAsUndefined,
    z.coerce.number().int().positive().default(3000),
  ),
});

export type Config = {
  botToken: string;
  databaseUrl: string;
  databaseSsl: boolean;
  /** When set, only the owner and the allow-list may use the bot. */
  ownerId?: number;
  entryMode: "steps" | "line";
  statsDetail: boolean;
  timeZone: string;
  sessionTtlMinutes: number;
  webhook?: { url: string; secret: string; port: number };
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    botToken: e.BOT_TOKEN,
    databaseUrl: e.DATABASE_URL,
    databaseSsl: e.DATABASE_SSL,
    ownerId: e.OWNER_ID,
    entryMode: e.ENTRY_MODE,
    statsDetail: e.STATS_DETAIL,
    timeZone: e.TZ,
    sessionTtlMinutes: e.SESSION_TTL_MINUTES,
    webhook: e.WEBHOOK_URL
      ? { url: e.WEBHOOK_URL, secret: e.WEBHOOK_SECRET, port: e.PORT }
      : undefined,
  };
}
