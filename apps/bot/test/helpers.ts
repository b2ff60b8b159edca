import Fastify, { type FastifyBaseLogger } from "fastify";
import type { BotContext } from "../src/lib/bot-context.js";
import type {
  ActionHandler,
  ChatTransport,
  CommandHandler,
  FatalErrorHandler,
  SendMessageOptions
} from "../src/lib/chat-transport.js";
import type { BotConfig } from "../src/config.js";
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
} from "../src/lib/remote-job-client.js";

export const OPERATOR_EMAIL = "operator@example.com";
export const OTHER_EMAIL = "someone-else@example.com";
export const TIMEZONE = "Asia/Kolkata";

/** Epoch ms for a wall-clock time in India Standard Time (UTC+05:30). */
export function ist(localDateTime: string) {
  return Date.parse(`${localDateTime}+05:30`);
}

export function createSilentLogger(): FastifyBaseLogger {
  return Fastify({ logger: false }).log;
}

export function makeSchedule(pauseStatus: JobSchedule["pauseStatus"] = "UNPAUSED"): JobSchedule {
  return {
    quartzCronExpression: "0 0 6 * * ?",
    timezoneId: TIMEZONE,
    pauseStatus
  };
}

export function makeJob(overrides: Partial<Job> & { jobId: JobId; name: string }): Job {
  return {
    creatorUserName: OPERATOR_EMAIL,
    schedule: makeSchedule(),
    ...overrides
  };
}

export function makeRun(overrides: Partial<Run> & { runId: RunId; jobId: JobId; startTime: number }): Run {
  return {
    endTime: null,
    lifeCycleState: "RUNNING",
    resultState: null,
    stateMessage: null,
    ...overrides
  };
}

export function testConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    telegram: { botToken: "test-bot-token", chatId: 1001 },
    databricks: { host: "https://dbc.example.test", token: "test-token", timeoutMs: 1_000 },
    operator: { email: OPERATOR_EMAIL, timezone: TIMEZONE },
    scanOnStartup: false,
    http: { port: 0, host: "127.0.0.1" },
    logLevel: "silent",
    ...overrides
  };
}

type RemoteOperation = "listJobs" | "listRuns" | "getJob" | "repairRun" | "setSchedulePause";

export class FakeRemoteJobClient implements RemoteJobClient {
  jobs: Job[] = [];
  runs = new Map<JobId, Run[]>();
  calls: string[] = [];
  listRunsOptions: ListRunsOptions[] = [];
  pauseUpdates: Array<{ jobId: JobId; paused: boolean }> = [];
  failures: Partial<Record<RemoteOperation, string>> = {};
  failingRunLists = new Map<JobId, string>();
  rejectedRepairs = new Map<RunId, string>();
  throwOn: Partial<Record<RemoteOperation, Error>> = {};
  nextRepairId = 9001;

  private guard(operation: RemoteOperation) {
    const error = this.throwOn[operation];
    if (error) {
      throw error;
    }
  }

  async listJobs(): Promise<RemoteResult<Job[]>> {
    this.calls.push("listJobs");
    this.guard("listJobs");
    if (this.failures.listJobs) {
      return remoteFailure(this.failures.listJobs, { status: 401 });
    }

    return remoteOk(this.jobs.map((job) => ({ ...job })));
  }

  async listRuns(jobId: JobId, options: ListRunsOptions = {}): Promise<RemoteResult<Run[]>> {
    this.calls.push(`listRuns:${jobId}`);
    this.listRunsOptions.push(options);
    this.guard("listRuns");

    const failure = this.failingRunLists.get(jobId) ?? this.failures.listRuns;
    if (failure) {
      return remoteFailure(failure, { status: 500 });
    }

    const runs = this.runs.get(jobId) ?? [];
    const startTimeFrom = options.startTimeFrom;
    return remoteOk(startTimeFrom === undefined ? [...runs] : runs.filter((run) => run.startTime >= startTimeFrom));
  }

  async getJob(jobId: JobId): Promise<RemoteResult<Job>> {
    this.calls.push(`getJob:${jobId}`);
    this.guard("getJob");
    if (this.failures.getJob) {
      return remoteFailure(this.failures.getJob, { status: 500 });
    }

    const job = this.jobs.find((candidate) => candidate.jobId === jobId);
    if (!job) {
      return remoteFailure(`Job ${jobId} does not exist.`, { status: 400, errorCode: "INVALID_PARAMETER_VALUE" });
    }

    return remoteOk({ ...job });
  }

  async repairRun(runId: RunId): Promise<RemoteResult<RepairRunResult>> {
    this.calls.push(`repairRun:${runId}`);
    this.guard("repairRun");

    const rejection = this.rejectedRepairs.get(runId);
    if (rejection) {
      return remoteFailure(rejection, { status: 400, errorCode: "INVALID_STATE" });
    }

    const repairId = this.nextRepairId;
    this.nextRepairId += 1;
    return remoteOk({ repairId });
  }

  async setSchedulePause(job: Job, paused: boolean): Promise<RemoteResult<void>> {
    this.calls.push(`setSchedulePause:${job.jobId}`);
    this.guard("setSchedulePause");
    if (this.failures.setSchedulePause) {
      return remoteFailure(this.failures.setSchedulePause, { status: 403 });
    }

    this.pauseUpdates.push({ jobId: job.jobId, paused });
    this.jobs = this.jobs.map((candidate): Job =>
      candidate.jobId === job.jobId && candidate.schedule
        ? { ...candidate, schedule: { ...candidate.schedule, pauseStatus: paused ? "PAUSED" : "UNPAUSED" } }
        : candidate
    );

    return remoteOk(undefined);
  }
}

export type SentMessage = {
  text: string;
  options: SendMessageOptions;
};

export class FakeChatTransport implements ChatTransport {
  sent: SentMessage[] = [];
  answers: Array<{ interactionId: string; text: string }> = [];
  commands = new Map<string, CommandHandler>();
  actionHandler: ActionHandler | null = null;
  fatalErrorHandler: FatalErrorHandler | null = null;
  failAnswersWith: string | null = null;
  started = false;
  stopped = false;

  async sendMessage(text: string, options: SendMessageOptions = {}): Promise<RemoteResult<void>> {
    this.sent.push({ text, options });
    return remoteOk(undefined);
  }

  async answerInteraction(interactionId: string, text: string): Promise<RemoteResult<void>> {
    this.answers.push({ interactionId, text });
    if (this.failAnswersWith) {
      return remoteFailure(this.failAnswersWith, { status: 400 });
    }

    return remoteOk(undefined);
  }

  onCommand(name: string, handler: CommandHandler) {
    this.commands.set(name, handler);
  }

  onAction(handler: ActionHandler) {
    this.actionHandler = handler;
  }

  onFatalError(handler: FatalErrorHandler) {
    this.fatalErrorHandler = handler;
  }

  async start() {
    this.started = true;
  }

  async stop() {
    this.stopped = true;
  }

  async runCommand(name: string) {
    const handler = this.commands.get(name);
    if (!handler) {
      throw new Error(`no handler registered for /${name}`);
    }

    await handler();
  }

  async tap(data: string | undefined, interactionId = "callback-1") {
    if (!this.actionHandler) {
      throw new Error("no action handler registered");
    }

    await this.actionHandler({ interactionId, data });
  }

  texts() {
    return this.sent.map((message) => message.text);
  }
}

export function createTestContext(nowMs: number) {
  const jobs = new FakeRemoteJobClient();
  const chat = new FakeChatTransport();
  const context: BotContext = {
    jobs,
    chat,
    logger: createSilentLogger(),
    operator: { email: OPERATOR_EMAIL, timezone: TIMEZONE },
    now: () => new Date(nowMs)
  };

  return { context, jobs, chat };
}
