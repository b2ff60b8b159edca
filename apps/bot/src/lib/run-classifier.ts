import type { Run } from "./remote-job-client.js";
import { formatElapsed, formatLocalTime, isSameLocalDate } from "./zoned-time.js";

export type RunClassification =
  | { kind: "no-runs-today" }
  | { kind: "success"; run: Run }
  | { kind: "failed"; run: Run }
  | { kind: "running"; run: Run };

export function selectLatestRunToday(runs: Run[], now: Date, timezone: string): Run | null {
  let latest: Run | null = null;

  for (const run of runs) {
    if (!isSameLocalDate(run.startTime, now, timezone)) {
      continue;
    }

    // strict comparison keeps the first run of the listing on equal start times
    if (!latest || run.startTime > latest.startTime) {
      latest = run;
    }
  }

  return latest;
}

export function classifyRuns(runs: Run[], now: Date, timezone: string): RunClassification {
  const run = selectLatestRunToday(runs, now, timezone);
  if (!run) {
    return { kind: "no-runs-today" };
  }

  if (run.endTime !== null && run.resultState === "SUCCESS") {
    return { kind: "success", run };
  }

  if (run.endTime !== null && run.resultState === "FAILED") {
    return { kind: "failed", run };
  }

  return { kind: "running", run };
}

/** `HH:mm – HH:mm` for finished runs, elapsed time up to `now` otherwise. */
export function describeRunWindow(run: Run, now: Date, timezone: string) {
  const start = formatLocalTime(run.startTime, timezone);

  if (run.endTime !== null) {
    return `${start} – ${formatLocalTime(run.endTime, timezone)}`;
  }

  return `Started ${start} (still running, ${formatElapsed(run.startTime, now.getTime())})`;
}
