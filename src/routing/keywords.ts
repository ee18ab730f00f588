/**
 * Topic buckets for keyword routing.
 *
 * A query falls into a bucket when one of the bucket's `queryKeywords`
 * appears at the start of a word, so "hour" matches "hours" but "hi" does
 * not match "this". An agent serves the bucket
 * when its description, skill text or tags contain one of the
 * `agentKeywords` anywhere (so "greet" also matches "greeting").
 */

export interface TopicBucket {
  topic: string;
  queryKeywords: readonly string[];
  agentKeywords: readonly string[];
}

export const DEFAULT_TOPIC_BUCKETS: readonly TopicBucket[] = [
  {
    topic: "time",
    queryKeywords: ["time", "clock", "hour", "when", "minute"],
    agentKeywords: ["time", "clock", "current"],
  },
  {
    topic: "greeting",
    queryKeywords: ["hello", "hi", "greet", "how are you", "good morning"],
    agentKeywords: ["greet", "friendly", "conversation", "hello"],
  },
  {
    topic: "research",
    queryKeywords: ["paper", "papers", "arxiv", "research", "scientific", "study"],
    agentKeywords: ["paper", "arxiv", "research", "scientific"],
  },
];

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Case-insensitive match of `word` at a word start in `text`. */
export function containsWord(text: string, word: string): boolean {
  return new RegExp(`\\b${escapeRegExp(word)}`, "i").test(text);
}

/** Buckets the query falls into, in bucket order. */
export function matchTopics(
  query: string,
  buckets: readonly TopicBucket[] = DEFAULT_TOPIC_BUCKETS,
): TopicBucket[] {
  return buckets.filter((b) => b.queryKeywords.some((kw) => containsWord(query, kw)));
}
