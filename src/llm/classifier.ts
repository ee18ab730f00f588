/**
 * LLM Classifier — one-shot completion through pi-ai.
 *
 * Availability is decided once, at construction: an unknown model or a
 * missing API key yields `null` and the matcher skips LLM classification.
 * Each call returns a Result; provider errors, empty replies, thrown
 * exceptions and calls that outlive `timeoutMs` are all failures for the
 * matcher to fall through on.
 */

import {
  complete,
  getEnvApiKey,
  getModels,
  getProviders,
  type Model,
  type TextContent,
} from "@mariozechner/pi-ai";
import type { Logger, Result } from "../types.js";
import { ok, err, errorMessage } from "../types.js";
import type { Classifier } from "../routing/matcher.js";

export interface LlmClassifierOptions {
  /** Model string, e.g. "google/gemini-2.5-flash-lite". */
  model: string;
  maxTokens: number;
  temperature: number;
  logger: Logger;
  /** Explicit key. If not set, pi-ai's environment lookup is used. */
  apiKey?: string;
  /** Upper bound on one classification call. Default: 10000. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

/** Settle with `promise`, or reject once `signal` aborts. */
function untilAborted<T>(promise: Promise<T>, signal: AbortSignal, timeoutMs: number): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error(`classification timed out after ${timeoutMs}ms`));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(e);
      },
    );
  });
}

/**
 * Parse a model string and resolve it to a pi-ai Model.
 * Validates provider and model id against pi-ai's catalogue.
 */
export function resolveModel(modelStr: string): Result<Model<string>> {
  const slashIdx = modelStr.indexOf("/");
  if (slashIdx === -1) {
    return err(`Invalid model format "${modelStr}": expected "provider/model-id"`);
  }
  const providerName = modelStr.slice(0, slashIdx);
  const modelId = modelStr.slice(slashIdx + 1);

  const provider = getProviders().find((p) => p === providerName);
  if (!provider) {
    return err(`Unknown provider "${providerName}"`);
  }

  const model = getModels(provider).find((m) => m.id === modelId);
  if (!model) {
    return err(`Unknown model "${modelId}" for provider "${providerName}"`);
  }
  return ok(model);
}

export function createLlmClassifier(opts: LlmClassifierOptions): Classifier | null {
  const { logger, maxTokens, temperature } = opts;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  const resolved = resolveModel(opts.model);
  if (!resolved.ok) {
    logger.warn(`[switchboard:llm] LLM routing disabled: ${resolved.error}`);
    return null;
  }
  const model = resolved.value;

  const apiKey = opts.apiKey ?? getEnvApiKey(model.provider);
  if (!apiKey) {
    logger.info(`[switchboard:llm] No API key for ${model.provider}; using keyword routing only`);
    return null;
  }

  logger.info(`[switchboard:llm] LLM routing via ${opts.model}`);

  return async (prompt: string): Promise<Result<string>> => {
    const signal = AbortSignal.timeout(timeoutMs);
    try {
      const reply = await untilAborted(
        complete(
          model,
          {
            systemPrompt: "You are an intelligent agent orchestrator.",
            messages: [{ role: "user", content: prompt, timestamp: Date.now() }],
          },
          { apiKey, maxTokens, temperature, signal },
        ),
        signal,
        timeoutMs,
      );

      if (reply.stopReason === "error" || reply.stopReason === "aborted") {
        return err(reply.errorMessage ?? `model stopped: ${reply.stopReason}`);
      }

      const text = reply.content
        .filter((c): c is TextContent => c.type === "text")
        .map((c) => c.text)
        .join("")
        .trim();

      return text.length > 0 ? ok(text) : err("empty model reply");
    } catch (e) {
      return err(errorMessage(e));
    }
  };
}
