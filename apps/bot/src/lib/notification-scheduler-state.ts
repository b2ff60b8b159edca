export type SchedulerTickReason = "startup" | "scheduled";
export type SchedulerTickOutcome = "failures" | "clean" | "error" | "skipped-late";

export type SchedulerTickEvent = {
  at: string;
  reason: SchedulerTickReason;
  slot: string | null;
  outcome: SchedulerTickOutcome;
  durationMs: number;
  failures: number;
  error: string | null;
};

export type SchedulerRuntimeState = {
  timezone: string;
  times: string[];
  scanOnStartup: boolean;
  startedAt: string | null;
  stoppedAt: string | null;
  runningTick: boolean;
  nextFireAt: string | null;
  nextSlot: string | null;
  lastTickAt: string | null;
  lastTickReason: SchedulerTickReason | null;
  lastTickOutcome: SchedulerTickOutcome | null;
  lastTickDurationMs: number | null;
  lastTickError: string | null;
  skippedTicks: number;
  totalTicks: number;
  successfulTicks: number;
  failedTicks: number;
  totalFailuresReported: number;
  recentTicks: SchedulerTickEvent[];
};

const MAX_RECENT_TICKS = 20;

export function createSchedulerRuntimeState(config: { timezone: string; times: string[]; scanOnStartup: boolean }) {
  const runtimeState: SchedulerRuntimeState = {
    timezone: config.timezone,
    times: [...config.times],
    scanOnStartup: config.scanOnStartup,
    startedAt: null,
    stoppedAt: null,
    runningTick: false,
    nextFireAt: null,
    nextSlot: null,
    lastTickAt: null,
    lastTickReason: null,
    lastTickOutcome: null,
    lastTickDurationMs: null,
    lastTickError: null,
    skippedTicks: 0,
    totalTicks: 0,
    successfulTicks: 0,
    failedTicks: 0,
    totalFailuresReported: 0,
    recentTicks: []
  };

  const pushTick = (event: SchedulerTickEvent) => {
    runtimeState.recentTicks.unshift(event);
    if (runtimeState.recentTicks.length > MAX_RECENT_TICKS) {
      runtimeState.recentTicks.length = MAX_RECENT_TICKS;
    }
  };

  const recordLast = (event: SchedulerTickEvent) => {
    runtimeState.lastTickAt = event.at;
    runtimeState.lastTickReason = event.reason;
    runtimeState.lastTickOutcome = event.outcome;
    runtimeState.lastTickDurationMs = event.durationMs;
    runtimeState.lastTickError = event.error;
    pushTick(event);
    return event;
  };

  const markTickEnd = (event: SchedulerTickEvent) => {
    runtimeState.runningTick = false;
    runtimeState.totalTicks += 1;

    if (event.outcome === "error") {
      runtimeState.failedTicks += 1;
    } else {
      runtimeState.successfulTicks += 1;
    }

    runtimeState.totalFailuresReported += event.failures;
    return recordLast(event);
  };

  return {
    markStarted() {
      runtimeState.startedAt = new Date().toISOString();
      runtimeState.stoppedAt = null;
    },

    markStopped() {
      runtimeState.stoppedAt = new Date().toISOString();
      runtimeState.runningTick = false;
      runtimeState.nextFireAt = null;
      runtimeState.nextSlot = null;
    },

    markArmed(nextFireAt: Date, slot: string) {
      runtimeState.nextFireAt = nextFireAt.toISOString();
      runtimeState.nextSlot = slot;
    },

    markTickStart() {
      runtimeState.runningTick = true;
    },

    markTickSkippedLate(reason: SchedulerTickReason, slot: string) {
      runtimeState.skippedTicks += 1;

      return recordLast({
        at: new Date().toISOString(),
        reason,
        slot,
        outcome: "skipped-late",
        durationMs: 0,
        failures: 0,
        error: null
      });
    },

    markTickFinished(params: {
      reason: SchedulerTickReason;
      slot: string | null;
      startedAt: Date;
      finishedAt?: Date;
      outcome: "failures" | "clean" | "error";
      failures: number;
      error: string | null;
    }) {
      const finishedAt = params.finishedAt ?? new Date();

      return markTickEnd({
        at: finishedAt.toISOString(),
        reason: params.reason,
        slot: params.slot,
        outcome: params.outcome,
        durationMs: finishedAt.getTime() - params.startedAt.getTime(),
        failures: params.failures,
        error: params.error
      });
    },

    markTickError(params: { reason: SchedulerTickReason; slot: string | null; startedAt: Date; finishedAt?: Date; error: string }) {
      const finishedAt = params.finishedAt ?? new Date();

      return markTickEnd({
        at: finishedAt.toISOString(),
        reason: params.reason,
        slot: params.slot,
        outcome: "error",
        durationMs: finishedAt.getTime() - params.startedAt.getTime(),
        failures: 0,
        error: params.error
      });
    },

    snapshot(): SchedulerRuntimeState {
      return {
        ...runtimeState,
        times: [...runtimeState.times],
        recentTicks: runtimeState.recentTicks.map((tick) => ({ ...tick }))
      };
    }
  };
}

export type SchedulerRuntimeStateStore = ReturnType<typeof createSchedulerRuntimeState>;
