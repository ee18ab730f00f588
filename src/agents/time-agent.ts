/**
 * Time Agent Executor
 *
 * Answers every request with the current local time. The clock is
 * injectable so replies are deterministic under test.
 */

import type {
  AgentExecutor,
  RequestContext,
  ExecutionEventBus,
} from "@a2a-js/sdk/server";
import type { Logger } from "../types.js";
import {
  extractText,
  task,
  taskStatus,
  artifact,
  textPart,
} from "../transport/a2a-helpers.js";

export interface TimeExecutorParams {
  logger: Logger;
  /** Clock. Default: `() => new Date()`. */
  now?: () => Date;
}

/** "HH:MM", 24-hour, zero-padded. */
export function formatClock(date: Date): string {
  const hh = String(date.getHours()).padStart(2, "0");
  const mm = String(date.getMinutes()).padStart(2, "0");
  return `${hh}:${mm}`;
}

export function createTimeExecutor(params: TimeExecutorParams): AgentExecutor {
  const { logger, now = () => new Date() } = params;

  return {
    async execute(ctx: RequestContext, eventBus: ExecutionEventBus): Promise<void> {
      const { userMessage, taskId, contextId } = ctx;
      logger.info(`[switchboard:time_agent] Received: ${extractText(userMessage).slice(0, 100)}`);

      const reply = `The current time is ${formatClock(now())}.`;
      eventBus.publish(
        task(taskId, contextId, taskStatus("completed"), [
          artifact("time", [textPart(reply)]),
        ]),
      );
      eventBus.finished();
    },

    async cancelTask(taskId: string, eventBus: ExecutionEventBus): Promise<void> {
      eventBus.publish(task(taskId, taskId, taskStatus("canceled")));
      eventBus.finished();
    },
  };
}
