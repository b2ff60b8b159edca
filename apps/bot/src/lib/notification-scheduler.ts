import type { FastifyBaseLogger } from "fastify";
import type { FailureScanResult } from "./failure-scan.js";
import { createSchedulerRuntimeState, type SchedulerTickReason } from "./notification-scheduler-state.js";
import type { SerialTaskQueue } from "./serial-task-queue.js";
import {
  addDaysToLocalDate,
  getLocalDateTimeParts,
  parseWallClockTime,
  resolveLocalDateTimeToUtc,
  type LocalDate
} from "./zoned-time.js";

export const NOTIFICATION_TIMES = [
  "07:45",
  "08:30",
  "09:30",
  "11:00",
  "12:00",
  "13:00",
  "15:00",
  "18:00",
  "20:00",
  "23:30"
] as const;

// A timer that fires later than this (suspended host, blocked loop) counts as a missed slot.
export const MAX_TICK_LATENESS_MS = 5 * 60_000;

export type NotificationSlot = {
  at: Date;
  key: string;
};

export type TimerApi = {
  schedule: (callback: () => void, delayMs: number) => () => void;
};

export const systemTimer: TimerApi = {
  schedule(callback, delayMs) {
    const timer = setTimeout(callback, delayMs);
    timer.unref?.();
    return () => clearTimeout(timer);
  }
};

export type NotificationSchedulerOptions = {
  logger: FastifyBaseLogger;
  queue: SerialTaskQueue;
  scan: () => Promise<FailureScanResult>;
  timezone: string;
  scanOnStartup: boolean;
  times?: readonly string[];
  now?: () => Date;
  timer?: TimerApi;
};

function toDateKey(date: LocalDate) {
  return `${date.year}-${String(date.month).padStart(2, "0")}-${String(date.day).padStart(2, "0")}`;
}

/** Earliest configured slot strictly after `from`, in the operator's time zone. */
export function computeNextSlot(times: readonly string[], from: Date, timezone: string): NotificationSlot | null {
  const local = getLocalDateTimeParts(from, timezone);
  let candidateDate: LocalDate = { year: local.year, month: local.month, day: local.day };

  for (let dayOffset = 0; dayOffset < 3; dayOffset += 1) {
    const candidates: NotificationSlot[] = [];

    for (const time of times) {
      const clock = parseWallClockTime(time);
      if (!clock) {
        continue;
      }

      const at = resolveLocalDateTimeToUtc({ ...candidateDate, ...clock }, timezone);
      if (at && at.getTime() > from.getTime()) {
        candidates.push({ at, key: `${toDateKey(candidateDate)} ${time}` });
      }
    }

    candidates.sort((a, b) => a.at.getTime() - b.at.getTime());
    if (candidates[0]) {
      return candidates[0];
    }

    candidateDate = addDaysToLocalDate(candidateDate, 1);
  }

  return null;
}

export function createNotificationScheduler(options: NotificationSchedulerOptions) {
  const { logger, queue, timezone } = options;
  const times = [...(options.times ?? NOTIFICATION_TIMES)];
  const now = options.now ?? (() => new Date());
  const timer = options.timer ?? systemTimer;
  const state = createSchedulerRuntimeState({ timezone, times, scanOnStartup: options.scanOnStartup });

  let running = false;
  let cancelTimer: (() => void) | null = null;
  let lastSlotAtMs = 0;

  const runTick = (reason: SchedulerTickReason, slot: string | null) =>
    queue.enqueue(`failure-scan:${reason}`, async () => {
      const startedAt = new Date();
      state.markTickStart();

      try {
        const result = await options.scan();
        state.markTickFinished({
          reason,
          slot,
          startedAt,
          outcome: result.outcome,
          failures: result.failures,
          error: result.error
        });
      } catch (error) {
        state.markTickError({
          reason,
          slot,
          startedAt,
          error: error instanceof Error ? error.message : "Unknown scan error"
        });
        throw error;
      }
    });

  const fire = async (slot: NotificationSlot) => {
    lastSlotAtMs = slot.at.getTime();
    const latenessMs = now().getTime() - lastSlotAtMs;
    arm();

    if (latenessMs > MAX_TICK_LATENESS_MS) {
      logger.warn({ slot: slot.key, latenessMs }, "skipping missed notification slot");
      state.markTickSkippedLate("scheduled", slot.key);
      return;
    }

    logger.info({ slot: slot.key }, "scheduled failure scan firing");
    await runTick("scheduled", slot.key);
  };

  function arm() {
    if (!running) {
      return;
    }

    // never earlier than the last fired slot, so a slot fires at most once
    const from = new Date(Math.max(now().getTime(), lastSlotAtMs));
    const slot = computeNextSlot(times, from, timezone);
    if (!slot) {
      logger.error({ times, timezone }, "no upcoming notification slot could be computed");
      return;
    }

    state.markArmed(slot.at, slot.key);
    const delayMs = Math.max(0, slot.at.getTime() - now().getTime());
    cancelTimer = timer.schedule(() => {
      cancelTimer = null;
      void fire(slot);
    }, delayMs);
  }

  const start = () => {
    if (running) {
      return;
    }

    running = true;
    state.markStarted();
    logger.info({ timezone, times, scanOnStartup: options.scanOnStartup }, "notification scheduler starting");

    if (options.scanOnStartup) {
      void runTick("startup", null);
    }

    arm();
  };

  const stop = () => {
    running = false;
    cancelTimer?.();
    cancelTimer = null;
    state.markStopped();
  };

  return {
    start,
    stop,
    runTick,
    snapshot: () => state.snapshot()
  };
}

export type NotificationScheduler = ReturnType<typeof createNotificationScheduler>;
