import type { FastifyBaseLogger } from "fastify";
import { Bot, GrammyError, HttpError, InlineKeyboard } from "grammy";
import { encodeActionPayload } from "./action-payload.js";
import type { ActionHandler, ChatAction, ChatTransport, CommandHandler, FatalErrorHandler } from "./chat-transport.js";
import { remoteFailure, remoteOk, type RemoteResult } from "./remote-job-client.js";

export type TelegramTransportConfig = {
  botToken: string;
  chatId: number;
};

const COMMAND_PATTERN = /^\/([a-z0-9_]+)(?:@\S+)?(?:\s|$)/i;

export function toInlineKeyboard(actions: ChatAction[]) {
  const keyboard = new InlineKeyboard();
  for (const action of actions) {
    keyboard.text(action.label, encodeActionPayload(action.payload));
  }

  return keyboard;
}

export function parseCommandName(text: string | undefined) {
  const match = text?.match(COMMAND_PATTERN);
  return match?.[1] ? match[1].toLowerCase() : null;
}

function describeTelegramError(error: unknown) {
  if (error instanceof GrammyError) {
    return error.description;
  }

  if (error instanceof HttpError) {
    return `network error: ${error.message}`;
  }

  return error instanceof Error ? error.message : "Telegram call failed";
}

async function callTelegram(call: () => Promise<unknown>): Promise<RemoteResult<void>> {
  try {
    await call();
    return remoteOk(undefined);
  } catch (error) {
    return remoteFailure(describeTelegramError(error), {
      status: error instanceof GrammyError ? error.error_code : null
    });
  }
}

export function createTelegramTransport(
  config: TelegramTransportConfig,
  logger: FastifyBaseLogger,
  bot = new Bot(config.botToken)
): ChatTransport {
  const commandHandlers = new Map<string, CommandHandler>();
  let actionHandler: ActionHandler | null = null;
  let fatalErrorHandler: FatalErrorHandler | null = null;
  let polling: Promise<void> | null = null;
  let stopping = false;

  bot.use(async (ctx, next) => {
    if (ctx.chat?.id !== config.chatId) {
      logger.warn({ chatId: ctx.chat?.id ?? null, updateId: ctx.update.update_id }, "ignoring update from unknown chat");
      return;
    }

    await next();
  });

  bot.on("message:text", async (ctx) => {
    const name = parseCommandName(ctx.message.text);
    const handler = name ? commandHandlers.get(name) : undefined;
    if (!handler) {
      return;
    }

    await handler();
  });

  bot.on("callback_query:data", async (ctx) => {
    if (!actionHandler) {
      logger.warn({ callbackQueryId: ctx.callbackQuery.id }, "callback received before action handler was registered");
      return;
    }

    await actionHandler({
      interactionId: ctx.callbackQuery.id,
      data: ctx.callbackQuery.data
    });
  });

  bot.catch((error) => {
    logger.error({ err: error.error, updateId: error.ctx.update.update_id }, "telegram update handling failed");
  });

  return {
    sendMessage(text, options = {}) {
      const actions = options.actions ?? [];

      return callTelegram(() =>
        bot.api.sendMessage(config.chatId, text, {
          reply_markup: actions.length > 0 ? toInlineKeyboard(actions) : undefined,
          parse_mode: options.format === "html" ? "HTML" : undefined
        })
      );
    },

    answerInteraction(interactionId, text) {
      return callTelegram(() => bot.api.answerCallbackQuery(interactionId, { text }));
    },

    onCommand(name, handler) {
      commandHandlers.set(name.toLowerCase(), handler);
    },

    onAction(handler) {
      actionHandler = handler;
    },

    onFatalError(handler) {
      fatalErrorHandler = handler;
    },

    async start() {
      if (polling) {
        return;
      }

      // getMe: a rejected token fails startup here instead of inside the polling loop
      await bot.init();

      stopping = false;
      polling = bot
        .start({
          onStart: (botInfo) => {
            logger.info({ username: botInfo.username, chatId: config.chatId }, "telegram polling started");
          }
        })
        .catch((error: unknown) => {
          if (stopping) {
            logger.warn({ err: error }, "telegram polling ended with an error during shutdown");
            return;
          }

          // grammY gives up on 401 and 409 (token revoked, another instance polling)
          logger.fatal({ err: error, description: describeTelegramError(error) }, "telegram polling stopped");
          fatalErrorHandler?.(error);
        });
    },

    async stop() {
      if (!polling) {
        return;
      }

      stopping = true;
      await bot.stop();
      await polling;
      polling = null;
    }
  };
}
