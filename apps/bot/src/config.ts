import { normalizeDatabricksHost } from "./lib/databricks-client.js";

export const DEFAULT_OPERATOR_TIMEZONE = "Asia/Kolkata";

export class ConfigError extends Error {
  readonly keys: string[];

  constructor(keys: string[]) {
    super(`Missing or invalid configuration: ${keys.join(", ")}`);
    this.name = "ConfigError";
    this.keys = keys;
  }
}

export type BotConfig = {
  telegram: {
    botToken: string;
    chatId: number;
  };
  databricks: {
    host: string;
    token: string;
    timeoutMs: number;
  };
  operator: {
    email: string;
    timezone: string;
  };
  scanOnStartup: boolean;
  http: {
    port: number;
    host: string;
  };
  logLevel: string;
};

function trimToNull(value: string | undefined) {
  if (!value) {
    return null;
  }

  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function parsePositiveInt(value: string | undefined, fallback: number) {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return fallback;
  }

  return parsed;
}

function parseEnabled(value: string | undefined, fallback: boolean) {
  if (value === undefined) {
    return fallback;
  }

  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
}

export function isValidTimeZone(timezone: string) {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: timezone }).format(new Date());
    return true;
  } catch {
    return false;
  }
}

function isValidHost(host: string) {
  try {
    new URL(normalizeDatabricksHost(host));
    return true;
  } catch {
    return false;
  }
}

function parseChatId(value: string | null) {
  if (!value || !/^-?\d+$/.test(value)) {
    return null;
  }

  const parsed = Number(value);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

export function getBotConfigFromEnv(env: NodeJS.ProcessEnv = process.env): BotConfig {
  const invalid: string[] = [];

  const requireValue = (key: string) => {
    const value = trimToNull(env[key]);
    if (!value) {
      invalid.push(key);
      return "";
    }

    return value;
  };

  const botToken = requireValue("BOT_TOKEN");
  const rawChatId = requireValue("CHAT_ID");
  const host = requireValue("DATABRICKS_SERVER");
  const token = requireValue("DATABRICKS_TOKEN");
  const email = requireValue("EMAIL");

  const chatId = parseChatId(rawChatId);
  if (rawChatId && chatId === null) {
    invalid.push("CHAT_ID");
  }

  if (host && !isValidHost(host)) {
    invalid.push("DATABRICKS_SERVER");
  }

  const timezone = trimToNull(env.OPERATOR_TIMEZONE) ?? DEFAULT_OPERATOR_TIMEZONE;
  if (!isValidTimeZone(timezone)) {
    invalid.push("OPERATOR_TIMEZONE");
  }

  if (invalid.length > 0 || chatId === null) {
    throw new ConfigError(invalid);
  }

  return {
    telegram: {
      botToken,
      chatId
    },
    databricks: {
      host,
      token,
      timeoutMs: parsePositiveInt(env.DATABRICKS_TIMEOUT_MS, 30_000)
    },
    operator: {
      email,
      timezone
    },
    scanOnStartup: parseEnabled(env.NOTIFICATION_SCAN_ON_STARTUP, true),
    http: {
      port: parsePositiveInt(env.PORT, 4000),
      host: trimToNull(env.HOST) ?? "0.0.0.0"
    },
    logLevel: trimToNull(env.LOG_LEVEL) ?? "info"
  };
}
