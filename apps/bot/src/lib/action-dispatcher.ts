import { decodeActionPayload, type ActionPayload } from "./action-payload.js";
import { notifyOperator, type BotContext } from "./bot-context.js";
import { escapeHtml, type ActionInvocation } from "./chat-transport.js";
import {
  ACTION_ACK_TEXT,
  ACTION_ERROR_ACK,
  classificationCard,
  remoteErrorText,
  repairButtonLabel,
  repairStarted
} from "./messages.js";
import { getOwnedJob, type JobId, type RunId } from "./remote-job-client.js";
import { classifyRuns } from "./run-classifier.js";
import { startOfLocalDay } from "./zoned-time.js";

export type DispatchOutcome = "completed" | "remote-error" | "no-schedule" | "malformed";

export function createActionDispatcher(context: BotContext) {
  const { jobs, logger, operator } = context;

  const acknowledge = async (interactionId: string, text: string) => {
    const result = await context.chat.answerInteraction(interactionId, text);
    if (!result.ok) {
      logger.warn({ interactionId, error: result.error }, "could not acknowledge interaction");
    }
  };

  const checkStatus = async (jobId: JobId): Promise<DispatchOutcome> => {
    const now = context.now();

    const job = await getOwnedJob(jobs, jobId, operator.email);
    if (!job.ok) {
      await notifyOperator(context, remoteErrorText("Error", job.error.message), { format: "html" });
      return "remote-error";
    }

    const runs = await jobs.listRuns(jobId, { startTimeFrom: startOfLocalDay(now, operator.timezone) });
    if (!runs.ok) {
      await notifyOperator(context, remoteErrorText("Error", runs.error.message), { format: "html" });
      return "remote-error";
    }

    const classification = classifyRuns(runs.value, now, operator.timezone);
    const text = classificationCard(job.value, classification, now, operator.timezone);

    if (classification.kind === "failed") {
      await notifyOperator(context, text, {
        format: "html",
        actions: [{ label: repairButtonLabel(), payload: { action: "repair", runId: classification.run.runId } }]
      });
    } else {
      await notifyOperator(context, text, { format: "html" });
    }

    return "completed";
  };

  const repair = async (runId: RunId): Promise<DispatchOutcome> => {
    const result = await jobs.repairRun(runId);
    if (!result.ok) {
      logger.warn({ runId, error: result.error }, "repair run rejected");
      await notifyOperator(context, remoteErrorText("Repair failed", result.error.message), { format: "html" });
      return "remote-error";
    }

    logger.info({ runId, repairId: result.value.repairId }, "repair started");
    await notifyOperator(context, repairStarted(runId, result.value.repairId), { format: "html" });
    return "completed";
  };

  const toggleSchedule = async (jobId: JobId, pause: boolean): Promise<DispatchOutcome> => {
    const job = await getOwnedJob(jobs, jobId, operator.email);
    if (!job.ok) {
      await notifyOperator(context, remoteErrorText("Could not toggle schedule", job.error.message), { format: "html" });
      return "remote-error";
    }

    if (!job.value.schedule) {
      await notifyOperator(context, `Job <code>${jobId}</code> has no schedule.`, { format: "html" });
      return "no-schedule";
    }

    const updated = await jobs.setSchedulePause(job.value, pause);
    if (!updated.ok) {
      await notifyOperator(context, remoteErrorText("Could not toggle schedule", updated.error.message), {
        format: "html"
      });
      return "remote-error";
    }

    const verb = pause ? "paused" : "resumed";
    logger.info({ jobId, pauseStatus: pause ? "PAUSED" : "UNPAUSED" }, "job schedule updated");
    await notifyOperator(context, `✅ Schedule for <code>${escapeHtml(job.value.name)}</code> has been ${verb}.`, {
      format: "html"
    });
    return "completed";
  };

  const perform = (payload: ActionPayload): Promise<DispatchOutcome> => {
    switch (payload.action) {
      case "check_status":
        return checkStatus(payload.jobId);
      case "repair":
        return repair(payload.runId);
      case "pause":
        return toggleSchedule(payload.jobId, true);
      case "resume":
        return toggleSchedule(payload.jobId, false);
    }
  };

  const dispatch = async (invocation: ActionInvocation): Promise<DispatchOutcome> => {
    const decoded = decodeActionPayload(invocation.data);
    if (!decoded.ok) {
      logger.warn({ interactionId: invocation.interactionId, data: invocation.data, reason: decoded.reason }, "malformed action payload");
      await acknowledge(invocation.interactionId, ACTION_ERROR_ACK);
      return "malformed";
    }

    await acknowledge(invocation.interactionId, ACTION_ACK_TEXT[decoded.payload.action]);
    logger.info({ payload: decoded.payload }, "dispatching action");

    return perform(decoded.payload);
  };

  return { dispatch };
}

export type ActionDispatcher = ReturnType<typeof createActionDispatcher>;
