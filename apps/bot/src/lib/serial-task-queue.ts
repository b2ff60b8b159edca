import type { FastifyBaseLogger } from "fastify";

export type TaskFailureReporter = (label: string, error: unknown) => Promise<void>;

export type SerialTaskQueue = {
  enqueue: (label: string, task: () => Promise<void>) => Promise<void>;
  drain: () => Promise<void>;
  pending: () => number;
};

/**
 * Single logical worker. Tasks run one at a time in arrival order; a task that
 * throws is logged and reported, and the next task still runs.
 */
export function createSerialTaskQueue(logger: FastifyBaseLogger, reportFailure?: TaskFailureReporter): SerialTaskQueue {
  let tail: Promise<void> = Promise.resolve();
  let pendingCount = 0;

  const runIsolated = async (label: string, task: () => Promise<void>) => {
    const startedAt = Date.now();

    try {
      await task();
      logger.debug({ task: label, durationMs: Date.now() - startedAt }, "task finished");
    } catch (error) {
      logger.error({ err: error, task: label }, "task failed");

      if (!reportFailure) {
        return;
      }

      try {
        await reportFailure(label, error);
      } catch (reportError) {
        logger.error({ err: reportError, task: label }, "failed to report task failure");
      }
    } finally {
      pendingCount -= 1;
    }
  };

  return {
    enqueue(label, task) {
      pendingCount += 1;
      const run = tail.then(() => runIsolated(label, task));
      tail = run;
      return run;
    },

    drain() {
      return tail;
    },

    pending() {
      return pendingCount;
    }
  };
}
