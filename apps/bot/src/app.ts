import Fastify, { type FastifyServerOptions } from "fastify";
import type { BotConfig } from "./config.js";
import { createActionDispatcher } from "./lib/action-dispatcher.js";
import { notifyOperator, type BotContext } from "./lib/bot-context.js";
import type { ChatTransport } from "./lib/chat-transport.js";
import { COMMAND_NAMES, createCommandRouter } from "./lib/command-router.js";
import { createDatabricksClient } from "./lib/databricks-client.js";
import { runFailureScan } from "./lib/failure-scan.js";
import { remoteErrorText } from "./lib/messages.js";
import { createNotificationScheduler, type TimerApi } from "./lib/notification-scheduler.js";
import type { RemoteJobClient } from "./lib/remote-job-client.js";
import { createSerialTaskQueue } from "./lib/serial-task-queue.js";
import { createTelegramTransport } from "./lib/telegram-transport.js";
import { healthRoutes } from "./routes/health.js";
import { v1Routes } from "./routes/v1.js";

export type BuildAppOptions = {
  config: BotConfig;
  logger?: FastifyServerOptions["logger"];
  jobs?: RemoteJobClient;
  chat?: ChatTransport;
  now?: () => Date;
  timer?: TimerApi;
  // the process supervisor's hook: the bot can no longer hear the operator
  onFatal?: (error: unknown) => void;
};

export async function buildApp(options: BuildAppOptions) {
  const { config } = options;
  const app = Fastify({ logger: options.logger ?? { level: config.logLevel } });

  app.setErrorHandler((error, _request, reply) => {
    if (error.validation) {
      reply.status(400).send({
        error: {
          code: "VALIDATION_ERROR",
          message: "Invalid request payload"
        }
      });
      return;
    }

    app.log.error({ err: error }, "unhandled error");
    reply.status(500).send({
      error: {
        code: "INTERNAL_ERROR",
        message: "Unexpected server error"
      }
    });
  });

  const context: BotContext = {
    jobs: options.jobs ?? createDatabricksClient(config.databricks),
    chat: options.chat ?? createTelegramTransport(config.telegram, app.log),
    logger: app.log,
    operator: config.operator,
    now: options.now ?? (() => new Date())
  };

  const queue = createSerialTaskQueue(app.log, async (_label, error) => {
    await notifyOperator(context, remoteErrorText("Error", error instanceof Error ? error.message : "Unexpected error"), {
      format: "html"
    });
  });

  const router = createCommandRouter(context);
  const dispatcher = createActionDispatcher(context);
  const scheduler = createNotificationScheduler({
    logger: app.log,
    queue,
    scan: () => runFailureScan(context),
    timezone: config.operator.timezone,
    scanOnStartup: config.scanOnStartup,
    now: context.now,
    timer: options.timer
  });

  for (const command of COMMAND_NAMES) {
    context.chat.onCommand(command, () => queue.enqueue(`command:${command}`, () => router.handle(command)));
  }

  context.chat.onAction((invocation) =>
    queue.enqueue("action", async () => {
      await dispatcher.dispatch(invocation);
    })
  );

  context.chat.onFatalError((error) => {
    app.log.fatal({ err: error }, "chat transport failed; the bot cannot receive commands");
    options.onFatal?.(error);
  });

  app.addHook("onReady", async () => {
    scheduler.start();
    await context.chat.start();
  });

  app.addHook("onClose", async () => {
    scheduler.stop();
    await context.chat.stop();
    await queue.drain();
  });

  await app.register(healthRoutes);
  await app.register(v1Routes, { scheduler, queue });

  return app;
}
