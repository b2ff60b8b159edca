import type { FastifyInstance } from "fastify";
import type { NotificationScheduler } from "../lib/notification-scheduler.js";
import type { SerialTaskQueue } from "../lib/serial-task-queue.js";

export type V1RouteOptions = {
  scheduler: NotificationScheduler;
  queue: SerialTaskQueue;
};

export async function v1Routes(app: FastifyInstance, options: V1RouteOptions) {
  app.get("/v1/scheduler/diagnostics", async () => ({
    data: {
      ...options.scheduler.snapshot(),
      pendingTasks: options.queue.pending()
    }
  }));
}
