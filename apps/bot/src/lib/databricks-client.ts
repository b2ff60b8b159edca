import {
  remoteFailure,
  remoteOk,
  type Job,
  type JobId,
  type JobSchedule,
  type ListRunsOptions,
  type RemoteJobClient,
  type RemoteResult,
  type RepairRunResult,
  type Run,
  type RunId
} from "./remote-job-client.js";

const JOBS_PAGE_LIMIT = 100;
const RUNS_PAGE_LIMIT = 25;
const MAX_PAGES = 200;

export type DatabricksClientConfig = {
  host: string;
  token: string;
  timeoutMs: number;
};

type RequestOptions = {
  query?: Record<string, string | number | boolean | undefined>;
  body?: Record<string, unknown>;
};

type Page<T> = {
  items: T[];
  nextPageToken: string | null;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(value: unknown) {
  return typeof value === "string" && value.trim() ? value : null;
}

function readId(value: unknown): number | null {
  if (typeof value === "number" && Number.isSafeInteger(value) && value > 0) {
    return value;
  }

  if (typeof value === "string" && /^\d+$/.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) && parsed > 0 ? parsed : null;
  }

  return null;
}

function readTimestamp(value: unknown) {
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : null;
}

export function normalizeDatabricksHost(host: string) {
  const trimmed = host.trim().replace(/\/+$/, "");
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function toSchedule(raw: unknown): JobSchedule | null {
  if (!isRecord(raw)) {
    return null;
  }

  return {
    quartzCronExpression: readString(raw.quartz_cron_expression) ?? "",
    timezoneId: readString(raw.timezone_id) ?? "UTC",
    pauseStatus: raw.pause_status === "PAUSED" ? "PAUSED" : "UNPAUSED"
  };
}

export function toJob(raw: unknown): Job | null {
  if (!isRecord(raw)) {
    return null;
  }

  const jobId = readId(raw.job_id);
  if (jobId === null) {
    return null;
  }

  const settings = isRecord(raw.settings) ? raw.settings : {};

  return {
    jobId,
    name: readString(settings.name) ?? `Untitled job ${jobId}`,
    creatorUserName: readString(raw.creator_user_name),
    schedule: toSchedule(settings.schedule)
  };
}

export function toRun(raw: unknown): Run | null {
  if (!isRecord(raw)) {
    return null;
  }

  const runId = readId(raw.run_id);
  const jobId = readId(raw.job_id);
  const startTime = readTimestamp(raw.start_time);
  if (runId === null || jobId === null || startTime === null) {
    return null;
  }

  const state = isRecord(raw.state) ? raw.state : {};

  return {
    runId,
    jobId,
    startTime,
    endTime: readTimestamp(raw.end_time),
    lifeCycleState: readString(state.life_cycle_state),
    resultState: readString(state.result_state),
    stateMessage: readString(state.state_message)
  };
}

function toPage<T>(raw: unknown, key: string, mapItem: (item: unknown) => T | null): Page<T> | null {
  if (!isRecord(raw)) {
    return null;
  }

  const list = raw[key];
  const items = Array.isArray(list)
    ? list.map(mapItem).filter((item): item is T => item !== null)
    : [];

  const hasMore = raw.has_more !== false;
  const nextPageToken = hasMore ? readString(raw.next_page_token) : null;

  return { items, nextPageToken };
}

function describeFetchError(error: unknown, timeoutMs: number) {
  if (error instanceof Error && error.name === "AbortError") {
    return `request timed out after ${timeoutMs}ms`;
  }

  return error instanceof Error ? error.message : "request failed";
}

export function createDatabricksClient(
  config: DatabricksClientConfig,
  fetchImpl: typeof fetch = fetch
): RemoteJobClient {
  const baseUrl = normalizeDatabricksHost(config.host);

  const request = async <T>(
    method: "GET" | "POST",
    path: string,
    options: RequestOptions,
    parse: (raw: unknown) => T | null
  ): Promise<RemoteResult<T>> => {
    const abortController = new AbortController();
    const timeout = setTimeout(() => abortController.abort(), config.timeoutMs);

    try {
      const url = new URL(`${baseUrl}${path}`);
      for (const [key, value] of Object.entries(options.query ?? {})) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }

      const response = await fetchImpl(url, {
        method,
        headers: {
          authorization: `Bearer ${config.token}`,
          ...(options.body ? { "content-type": "application/json" } : {})
        },
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: abortController.signal
      });

      const text = await response.text();
      let payload: unknown = null;
      if (text) {
        try {
          payload = JSON.parse(text);
        } catch {
          payload = null;
        }
      }

      if (!response.ok) {
        const errorBody = isRecord(payload) ? payload : {};
        return remoteFailure(readString(errorBody.message) ?? `HTTP ${response.status}`, {
          status: response.status,
          errorCode: readString(errorBody.error_code)
        });
      }

      const parsed = parse(payload ?? {});
      if (parsed === null) {
        return remoteFailure(`Unexpected response from ${path}`, { status: response.status });
      }

      return remoteOk(parsed);
    } catch (error) {
      return remoteFailure(describeFetchError(error, config.timeoutMs));
    } finally {
      clearTimeout(timeout);
    }
  };

  const collectPages = async <T>(
    path: string,
    query: RequestOptions["query"],
    key: string,
    mapItem: (item: unknown) => T | null
  ): Promise<RemoteResult<T[]>> => {
    const collected: T[] = [];
    let pageToken: string | undefined;

    for (let page = 0; page < MAX_PAGES; page += 1) {
      const result = await request("GET", path, { query: { ...query, page_token: pageToken } }, (raw) =>
        toPage(raw, key, mapItem)
      );

      if (!result.ok) {
        return result;
      }

      collected.push(...result.value.items);
      if (!result.value.nextPageToken) {
        break;
      }

      pageToken = result.value.nextPageToken;
    }

    return remoteOk(collected);
  };

  return {
    listJobs() {
      return collectPages("/api/2.1/jobs/list", { limit: JOBS_PAGE_LIMIT }, "jobs", toJob);
    },

    listRuns(jobId: JobId, options: ListRunsOptions = {}) {
      return collectPages(
        "/api/2.1/jobs/runs/list",
        {
          job_id: jobId,
          expand_tasks: false,
          limit: RUNS_PAGE_LIMIT,
          start_time_from: options.startTimeFrom
        },
        "runs",
        toRun
      );
    },

    getJob(jobId: JobId) {
      return request("GET", "/api/2.1/jobs/get", { query: { job_id: jobId } }, toJob);
    },

    repairRun(runId: RunId) {
      return request(
        "POST",
        "/api/2.1/jobs/runs/repair",
        { body: { run_id: runId, rerun_all_failed_tasks: true } },
        (raw): RepairRunResult | null => {
          const repairId = isRecord(raw) ? readId(raw.repair_id) : null;
          return repairId === null ? null : { repairId };
        }
      );
    },

    setSchedulePause(job: Job, paused: boolean) {
      if (!job.schedule) {
        return Promise.resolve(remoteFailure<void>(`Job ${job.jobId} has no schedule`));
      }

      return request(
        "POST",
        "/api/2.1/jobs/update",
        {
          body: {
            job_id: job.jobId,
            new_settings: {
              schedule: {
                quartz_cron_expression: job.schedule.quartzCronExpression,
                timezone_id: job.schedule.timezoneId,
                pause_status: paused ? "PAUSED" : "UNPAUSED"
              }
            }
          }
        },
        () => undefined
      );
    }
  };
}
