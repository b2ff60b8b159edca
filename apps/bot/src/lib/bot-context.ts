import type { FastifyBaseLogger } from "fastify";
import type { ChatTransport, SendMessageOptions } from "./chat-transport.js";
import type { RemoteJobClient } from "./remote-job-client.js";

export type OperatorSettings = {
  email: string;
  timezone: string;
};

// Collaborators shared by the router, the dispatcher and the failure scan.
export type BotContext = {
  jobs: RemoteJobClient;
  chat: ChatTransport;
  logger: FastifyBaseLogger;
  operator: OperatorSettings;
  now: () => Date;
};

export async function notifyOperator(context: BotContext, text: string, options?: SendMessageOptions) {
  const result = await context.chat.sendMessage(text, options);
  if (!result.ok) {
    context.logger.error({ error: result.error }, "failed to deliver chat message");
  }

  return result.ok;
}
