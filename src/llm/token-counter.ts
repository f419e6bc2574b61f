// Rough estimate (~3.5 chars per token); used for history and note budgets only
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 3.5);
}

/** Cost of a value as it would be serialized into a prompt. */
export function estimateJsonTokens(value: unknown): number {
  return estimateTokens(JSON.stringify(value) ?? '');
}
