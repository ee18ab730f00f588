/**
 * Greeting Agent Executor
 *
 * Replies to small talk with a friendly greeting that quotes the
 * caller's message.
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

export interface GreetingExecutorParams {
  logger: Logger;
}

export function greetingFor(text: string): string {
  const said = text.trim();
  return said.length > 0
    ? `Hello there! You said "${said}". Nice to hear from you, how can I help today?`
    : "Hello there! How can I help today?";
}

export function createGreetingExecutor(params: GreetingExecutorParams): AgentExecutor {
  const { logger } = params;

  return {
    async execute(ctx: RequestContext, eventBus: ExecutionEventBus): Promise<void> {
      const { userMessage, taskId, contextId } = ctx;
      const text = extractText(userMessage);
      logger.info(`[switchboard:greeting_agent] Received: ${text.slice(0, 100)}`);

      eventBus.publish(
        task(taskId, contextId, taskStatus("completed"), [
          artifact("greeting", [textPart(greetingFor(text))]),
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
