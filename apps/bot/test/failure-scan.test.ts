import assert from "node:assert/strict";
import { test } from "node:test";
import { failureLookbackStart, isFailedToday, runFailureScan } from "../src/lib/failure-scan.js";
import { NO_FAILURES_TEXT } from "../src/lib/messages.js";
import { createTestContext, ist, makeJob, makeRun, OTHER_EMAIL, TIMEZONE } from "./helpers.js";

const NOW = ist("2026-03-10T12:00:00");

test("failure scan: counts runs that ended in failure today in the operator's zone", () => {
  const now = new Date(NOW);
  const failedOvernight = makeRun({
    runId: 1,
    jobId: 1,
    startTime: ist("2026-03-09T23:50:00"),
    endTime: ist("2026-03-10T00:10:00"),
    resultState: "FAILED"
  });
  const failedYesterday = makeRun({
    runId: 2,
    jobId: 1,
    startTime: ist("2026-03-09T22:00:00"),
    endTime: ist("2026-03-09T23:00:00"),
    resultState: "FAILED"
  });
  const stillRunning = makeRun({ runId: 3, jobId: 1, startTime: ist("2026-03-10T11:00:00"), resultState: "FAILED" });

  assert.equal(isFailedToday(failedOvernight, now, TIMEZONE), true);
  assert.equal(isFailedToday(failedYesterday, now, TIMEZONE), false);
  assert.equal(isFailedToday(stillRunning, now, TIMEZONE), false);
});

test("failure scan: posts a summary and one repair card per failure of the operator's jobs", async () => {
  const { context, jobs, chat } = createTestContext(NOW);
  jobs.jobs = [
    makeJob({ jobId: 101, name: "Nightly ETL" }),
    makeJob({ jobId: 102, name: "Someone else's job", creatorUserName: OTHER_EMAIL }),
    makeJob({ jobId: 103, name: "Hourly sync" })
  ];
  jobs.runs.set(101, [
    makeRun({
      runId: 501,
      jobId: 101,
      startTime: ist("2026-03-10T09:00:00"),
      endTime: ist("2026-03-10T09:20:00"),
      lifeCycleState: "TERMINATED",
      resultState: "FAILED"
    })
  ]);
  jobs.runs.set(102, [
    makeRun({
      runId: 502,
      jobId: 102,
      startTime: ist("2026-03-10T09:00:00"),
      endTime: ist("2026-03-10T09:05:00"),
      resultState: "FAILED"
    })
  ]);
  jobs.runs.set(103, [
    makeRun({
      runId: 503,
      jobId: 103,
      startTime: ist("2026-03-10T10:00:00"),
      endTime: ist("2026-03-10T10:02:00"),
      resultState: "SUCCESS"
    })
  ]);

  const result = await runFailureScan(context);

  assert.deepEqual(result, { outcome: "failures", failures: 1, jobsScanned: 2, jobErrors: 0, error: null });
  assert.deepEqual(jobs.calls, ["listJobs", "listRuns:101", "listRuns:103"]);
  assert.deepEqual(chat.sent, [
    { text: "❌ Found 1 failure(s) today:", options: {} },
    {
      text: "🔴 <b>Nightly ETL</b>\n<code>501</code>\n⏰ 09:00 – 09:20",
      options: {
        format: "html",
        actions: [{ label: "🔧 Repair Nightly ETL", payload: { action: "repair", runId: 501 } }]
      }
    }
  ]);
});

test("failure scan: truncates long job names on the repair button", async () => {
  const { context, jobs, chat } = createTestContext(NOW);
  jobs.jobs = [makeJob({ jobId: 101, name: "Customer lifetime value rollup" })];
  jobs.runs.set(101, [
    makeRun({
      runId: 501,
      jobId: 101,
      startTime: ist("2026-03-10T09:00:00"),
      endTime: ist("2026-03-10T09:20:00"),
      resultState: "FAILED"
    })
  ]);

  await runFailureScan(context);

  assert.equal(chat.sent[1]?.options.actions?.[0]?.label, "🔧 Repair Customer lifetime value r");
});

test("failure scan: reports a clean day", async () => {
  const { context, jobs, chat } = createTestContext(NOW);
  jobs.jobs = [makeJob({ jobId: 101, name: "Nightly ETL" })];

  const result = await runFailureScan(context);

  assert.equal(result.outcome, "clean");
  assert.deepEqual(chat.texts(), [NO_FAILURES_TEXT]);
});

test("failure scan: reports a job listing failure and stops", async () => {
  const { context, jobs, chat } = createTestContext(NOW);
  jobs.failures.listJobs = "Invalid access token";

  const result = await runFailureScan(context);

  assert.deepEqual(result, { outcome: "error", failures: 0, jobsScanned: 0, jobErrors: 0, error: "Invalid access token" });
  assert.deepEqual(chat.sent, [{ text: "❌ Failure scan failed: Invalid access token", options: { format: "html" } }]);
});

test("failure scan: keeps scanning after one job's runs cannot be listed", async () => {
  const { context, jobs, chat } = createTestContext(NOW);
  jobs.jobs = [makeJob({ jobId: 101, name: "Nightly ETL" }), makeJob({ jobId: 103, name: "Hourly sync" })];
  jobs.failingRunLists.set(101, "Internal error");

  const result = await runFailureScan(context);

  assert.equal(result.jobErrors, 1);
  assert.equal(result.outcome, "clean");
  assert.deepEqual(jobs.calls, ["listJobs", "listRuns:101", "listRuns:103"]);
  assert.deepEqual(chat.texts(), ["❌ Could not list runs for Nightly ETL: Internal error", NO_FAILURES_TEXT]);
});

test("failure scan: lists runs from the previous local midnight and still catches overnight failures", async () => {
  const { context, jobs, chat } = createTestContext(NOW);
  jobs.jobs = [makeJob({ jobId: 101, name: "Nightly ETL" })];
  jobs.runs.set(101, [
    makeRun({
      runId: 498,
      jobId: 101,
      startTime: ist("2026-03-08T23:00:00"),
      endTime: ist("2026-03-08T23:30:00"),
      resultState: "FAILED"
    }),
    makeRun({
      runId: 499,
      jobId: 101,
      startTime: ist("2026-03-09T23:50:00"),
      endTime: ist("2026-03-10T00:10:00"),
      resultState: "FAILED"
    })
  ]);

  const result = await runFailureScan(context);

  assert.equal(failureLookbackStart(new Date(NOW), TIMEZONE), ist("2026-03-09T00:00:00"));
  assert.deepEqual(jobs.listRunsOptions, [{ startTimeFrom: ist("2026-03-09T00:00:00") }]);
  assert.equal(result.failures, 1);
  assert.equal(chat.sent[1]?.text, "🔴 <b>Nightly ETL</b>\n<code>499</code>\n⏰ 23:50 – 00:10");
});
