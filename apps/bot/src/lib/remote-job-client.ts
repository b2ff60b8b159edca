export type JobId = number;
export type RunId = number;

export type SchedulePauseStatus = "PAUSED" | "UNPAUSED";

export type JobSchedule = {
  quartzCronExpression: string;
  timezoneId: string;
  pauseStatus: SchedulePauseStatus;
};

export type Job = {
  jobId: JobId;
  name: string;
  creatorUserName: string | null;
  schedule: JobSchedule | null;
};

export type RunResultState = "SUCCESS" | "FAILED" | (string & {});

export type Run = {
  runId: RunId;
  jobId: JobId;
  startTime: number;
  // null while the run is still in progress
  endTime: number | null;
  lifeCycleState: string | null;
  resultState: RunResultState | null;
  stateMessage: string | null;
};

export type RepairRunResult = {
  repairId: number;
};

export type RemoteCallError = {
  message: string;
  status: number | null;
  errorCode: string | null;
};

export type RemoteResult<T> = { ok: true; value: T } | { ok: false; error: RemoteCallError };

export type ListRunsOptions = {
  startTimeFrom?: number;
};

export interface RemoteJobClient {
  listJobs(): Promise<RemoteResult<Job[]>>;
  listRuns(jobId: JobId, options?: ListRunsOptions): Promise<RemoteResult<Run[]>>;
  getJob(jobId: JobId): Promise<RemoteResult<Job>>;
  repairRun(runId: RunId): Promise<RemoteResult<RepairRunResult>>;
  setSchedulePause(job: Job, paused: boolean): Promise<RemoteResult<void>>;
}

export function remoteOk<T>(value: T): RemoteResult<T> {
  return { ok: true, value };
}

export function remoteFailure<T>(
  message: string,
  details: { status?: number | null; errorCode?: string | null } = {}
): RemoteResult<T> {
  return {
    ok: false,
    error: {
      message,
      status: details.status ?? null,
      errorCode: details.errorCode ?? null
    }
  };
}

export function isOwnedBy(job: Job, operatorEmail: string) {
  return job.creatorUserName === operatorEmail;
}

export async function listOwnedJobs(client: RemoteJobClient, operatorEmail: string): Promise<RemoteResult<Job[]>> {
  const result = await client.listJobs();
  if (!result.ok) {
    return result;
  }

  return remoteOk(result.value.filter((job) => isOwnedBy(job, operatorEmail)));
}

export async function getOwnedJob(
  client: RemoteJobClient,
  jobId: JobId,
  operatorEmail: string
): Promise<RemoteResult<Job>> {
  const result = await client.getJob(jobId);
  if (!result.ok) {
    return result;
  }

  if (!isOwnedBy(result.value, operatorEmail)) {
    return remoteFailure(`Job ${jobId} not found for your account`, { status: 404, errorCode: "RESOURCE_DOES_NOT_EXIST" });
  }

  return result;
}
