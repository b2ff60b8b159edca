import { notifyOperator, type BotContext } from "./bot-context.js";
import type { ChatAction } from "./chat-transport.js";
import { runFailureScan } from "./failure-scan.js";
import { HELP_TEXT, jobCard, jobListSummary, NO_JOBS_TEXT, remoteErrorText } from "./messages.js";
import { listOwnedJobs, type Job } from "./remote-job-client.js";

export const COMMAND_NAMES = ["help", "jobs", "failed", "pause"] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.some((name) => name === value);
}

export function statusAction(job: Job): ChatAction {
  return { label: "📊 Check Status", payload: { action: "check_status", jobId: job.jobId } };
}

// A job without a schedule falls through to "resume"; tapping it reports the missing schedule.
export function scheduleAction(job: Job): ChatAction {
  if (job.schedule && job.schedule.pauseStatus !== "PAUSED") {
    return { label: "⏸ Pause", payload: { action: "pause", jobId: job.jobId } };
  }

  return { label: "▶️ Resume", payload: { action: "resume", jobId: job.jobId } };
}

export function createCommandRouter(context: BotContext) {
  const sendJobList = async (purpose: "status" | "schedule", actionFor: (job: Job) => ChatAction) => {
    const jobs = await listOwnedJobs(context.jobs, context.operator.email);
    if (!jobs.ok) {
      context.logger.error({ error: jobs.error, purpose }, "could not list jobs");
      await notifyOperator(context, remoteErrorText("Could not list jobs", jobs.error.message), { format: "html" });
      return;
    }

    if (jobs.value.length === 0) {
      await notifyOperator(context, NO_JOBS_TEXT);
      return;
    }

    await notifyOperator(context, jobListSummary(jobs.value.length, purpose));
    for (const job of jobs.value) {
      await notifyOperator(context, jobCard(job), { format: "html", actions: [actionFor(job)] });
    }
  };

  const handle = async (command: CommandName) => {
    context.logger.info({ command }, "handling command");

    switch (command) {
      case "help":
        await notifyOperator(context, HELP_TEXT);
        return;
      case "jobs":
        await sendJobList("status", statusAction);
        return;
      case "pause":
        await sendJobList("schedule", scheduleAction);
        return;
      case "failed":
        await runFailureScan(context);
        return;
    }
  };

  return { handle };
}

export type CommandRouter = ReturnType<typeof createCommandRouter>;
