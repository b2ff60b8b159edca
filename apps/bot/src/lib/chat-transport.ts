import type { ActionPayload } from "./action-payload.js";
import type { RemoteResult } from "./remote-job-client.js";

export type ChatAction = {
  label: string;
  payload: ActionPayload;
};

export type MessageFormat = "plain" | "html";

export type SendMessageOptions = {
  // rendered as a single row of inline buttons
  actions?: ChatAction[];
  format?: MessageFormat;
};

export type ActionInvocation = {
  interactionId: string;
  data: string | undefined;
};

export type CommandHandler = () => Promise<void>;
export type ActionHandler = (invocation: ActionInvocation) => Promise<void>;
// Called when the transport can no longer receive updates.
export type FatalErrorHandler = (error: unknown) => void;

export interface ChatTransport {
  sendMessage(text: string, options?: SendMessageOptions): Promise<RemoteResult<void>>;
  answerInteraction(interactionId: string, text: string): Promise<RemoteResult<void>>;
  onCommand(name: string, handler: CommandHandler): void;
  onAction(handler: ActionHandler): void;
  onFatalError(handler: FatalErrorHandler): void;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function escapeHtml(value: string) {
  return value.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}
