/**
 * A2A Object Construction Helpers
 *
 * The A2A SDK v0.3 types use `kind` discriminators and require
 * various mandatory fields. These helpers provide concise constructors
 * so agents and the dispatcher don't repeat the boilerplate.
 */

import { randomUUID } from "node:crypto";
import type {
  Message,
  TextPart,
  Artifact,
  Task,
  TaskStatus,
  Part,
} from "@a2a-js/sdk";

/** Create a unique message ID. */
export function newMessageId(): string {
  return randomUUID();
}

/** Create a TextPart. */
export function textPart(text: string): TextPart {
  return { kind: "text", text };
}

/** Create an agent Message from text. */
export function agentMessage(text: string): Message {
  return {
    kind: "message",
    messageId: newMessageId(),
    role: "agent",
    parts: [textPart(text)],
  };
}

/** Create a user Message carrying a single text part. */
export function userMessage(text: string): Message {
  return {
    kind: "message",
    messageId: newMessageId(),
    role: "user",
    parts: [textPart(text)],
  };
}

/** Create an Artifact. */
export function artifact(
  name: string,
  parts: Part[],
  description?: string,
): Artifact {
  return {
    artifactId: randomUUID(),
    name,
    parts,
    ...(description ? { description } : {}),
  };
}

/** Create a TaskStatus. */
export function taskStatus(
  state: Task["status"]["state"],
  messageText?: string,
): TaskStatus {
  return {
    state,
    ...(messageText ? { message: agentMessage(messageText) } : {}),
  };
}

/** Create a Task object. */
export function task(
  id: string,
  contextId: string,
  status: TaskStatus,
  artifacts?: Artifact[],
): Task {
  return {
    kind: "task",
    id,
    contextId,
    status,
    ...(artifacts ? { artifacts } : {}),
  };
}

/** Extract text from all TextParts in a message. */
export function extractText(message: Message): string {
  return (message.parts ?? [])
    .filter((p): p is TextPart => p.kind === "text")
    .map((p) => p.text)
    .join("\n");
}

/** The first text part of the first artifact, or null. */
export function firstArtifactText(t: Task): string | null {
  const first = t.artifacts?.[0];
  const part = (first?.parts ?? []).find((p): p is TextPart => p.kind === "text");
  return part ? part.text : null;
}
