import { escapeHtml } from "./chat-transport.js";
import type { Job, Run } from "./remote-job-client.js";
import { describeRunWindow, type RunClassification } from "./run-classifier.js";

export const HELP_TEXT = [
  "Available commands:",
  "/jobs – list all jobs",
  "/failed – list failed runs today",
  "/pause – pause / resume job schedules",
  "/help – this help"
].join("\n");

export const NO_JOBS_TEXT = "No jobs found for your account.";
export const NO_FAILURES_TEXT = "🎉 No failures today!";
export const ACTION_ERROR_ACK = "❌ Error processing request";

export const ACTION_ACK_TEXT = {
  check_status: "🔍 Checking…",
  repair: "🔧 Repairing…",
  pause: "⏸ Pausing…",
  resume: "▶️ Resuming…"
} as const;

const REPAIR_LABEL_NAME_LENGTH = 25;

export function jobCard(job: Job) {
  return `${escapeHtml(job.name)}\nJob ID: <code>${job.jobId}</code>`;
}

export function jobListSummary(count: number, purpose: "status" | "schedule") {
  return purpose === "status"
    ? `📋 Found ${count} job(s). Tap to check today's run:`
    : `📋 Found ${count} job(s). Tap to pause / resume schedule:`;
}

export function failureSummary(count: number) {
  return `❌ Found ${count} failure(s) today:`;
}

export function failedRunCard(jobName: string, run: Run, now: Date, timezone: string) {
  return `🔴 <b>${escapeHtml(jobName)}</b>\n<code>${run.runId}</code>\n⏰ ${describeRunWindow(run, now, timezone)}`;
}

export function repairButtonLabel(jobName?: string) {
  return jobName ? `🔧 Repair ${jobName.slice(0, REPAIR_LABEL_NAME_LENGTH)}` : "🔧 Repair";
}

export function classificationCard(job: Job, classification: RunClassification, now: Date, timezone: string) {
  const name = escapeHtml(job.name);

  if (classification.kind === "no-runs-today") {
    return `📅 <b>${name}</b>\nNo runs today.`;
  }

  const { run } = classification;
  const window = describeRunWindow(run, now, timezone);
  const runLine = `Run <code>${run.runId}</code>`;

  switch (classification.kind) {
    case "success":
      return `✅ <b>${name}</b>\nSUCCESS\n⏰ ${window}\n${runLine}`;
    case "failed":
      return `❌ <b>${name}</b>\nFAILED\n⏰ ${window}\n${runLine}${run.stateMessage ? `\n${escapeHtml(run.stateMessage)}` : ""}`;
    case "running": {
      const label = run.endTime === null ? "RUNNING" : escapeHtml(run.resultState ?? run.lifeCycleState ?? "UNKNOWN");
      return `🔄 <b>${name}</b>\n${label}\n⏰ ${window}\n${runLine}`;
    }
  }
}

export function repairStarted(runId: number, repairId: number) {
  return `✅ Repair started!\nOriginal: <code>${runId}</code>\nRepair run: <code>${repairId}</code>`;
}

export function remoteErrorText(prefix: string, message: string) {
  return `❌ ${escapeHtml(prefix)}: ${escapeHtml(message)}`;
}
