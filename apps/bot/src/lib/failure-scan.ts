import { notifyOperator, type BotContext } from "./bot-context.js";
import { failedRunCard, failureSummary, NO_FAILURES_TEXT, remoteErrorText, repairButtonLabel } from "./messages.js";
import { listOwnedJobs, type Job, type Run } from "./remote-job-client.js";
import { isSameLocalDate, startOfLocalDay } from "./zoned-time.js";

export type FailedRun = {
  job: Job;
  run: Run;
};

export type FailureScanResult = {
  outcome: "failures" | "clean" | "error";
  failures: number;
  jobsScanned: number;
  jobErrors: number;
  error: string | null;
};

export function isFailedToday(run: Run, now: Date, timezone: string) {
  return run.resultState === "FAILED" && run.endTime !== null && isSameLocalDate(run.endTime, now, timezone);
}

// A run that ended today may have started yesterday, so listing starts at the previous local midnight.
export function failureLookbackStart(now: Date, timezone: string) {
  return startOfLocalDay(new Date(startOfLocalDay(now, timezone) - 1), timezone);
}

/**
 * Lists the operator's runs that failed today and posts one summary plus one
 * message per failure, each carrying a repair action.
 */
export async function runFailureScan(context: BotContext): Promise<FailureScanResult> {
  const { jobs, logger, operator } = context;
  const now = context.now();

  const ownedJobs = await listOwnedJobs(jobs, operator.email);
  if (!ownedJobs.ok) {
    logger.error({ error: ownedJobs.error }, "failure scan could not list jobs");
    await notifyOperator(context, remoteErrorText("Failure scan failed", ownedJobs.error.message), { format: "html" });
    return { outcome: "error", failures: 0, jobsScanned: 0, jobErrors: 0, error: ownedJobs.error.message };
  }

  const startTimeFrom = failureLookbackStart(now, operator.timezone);
  const failed: FailedRun[] = [];
  let jobErrors = 0;

  for (const job of ownedJobs.value) {
    const runs = await jobs.listRuns(job.jobId, { startTimeFrom });
    if (!runs.ok) {
      jobErrors += 1;
      logger.warn({ jobId: job.jobId, error: runs.error }, "failure scan could not list runs");
      await notifyOperator(context, remoteErrorText(`Could not list runs for ${job.name}`, runs.error.message), {
        format: "html"
      });
      continue;
    }

    for (const run of runs.value) {
      if (isFailedToday(run, now, operator.timezone)) {
        failed.push({ job, run });
      }
    }
  }

  logger.info({ jobsScanned: ownedJobs.value.length, failures: failed.length, jobErrors }, "failure scan finished");

  if (failed.length === 0) {
    await notifyOperator(context, NO_FAILURES_TEXT);
    return { outcome: "clean", failures: 0, jobsScanned: ownedJobs.value.length, jobErrors, error: null };
  }

  await notifyOperator(context, failureSummary(failed.length));

  for (const { job, run } of failed) {
    await notifyOperator(context, failedRunCard(job.name, run, now, operator.timezone), {
      format: "html",
      actions: [{ label: repairButtonLabel(job.name), payload: { action: "repair", runId: run.runId } }]
    });
  }

  return { outcome: "failures", failures: failed.length, jobsScanned: ownedJobs.value.length, jobErrors, error: null };
}
