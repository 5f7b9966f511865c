/**
 * Completion client contract.
 *
 * A completion client turns a chat prompt into one completion string. It
 * may reject with an implementation-defined error; callers in this
 * package never catch or retry those errors.
 */

import type { ChatPrompt } from "./prompt.js";

export interface CompletionClient {
  /** Identifier of the model behind this client, for logging. */
  readonly model: string;

  complete(prompt: ChatPrompt): Promise<string>;
}

/**
 * Completion produced no usable text.
 */
export class CompletionError extends Error {
  constructor(
    public readonly model: string,
    message: string
  ) {
    super(message);
    this.name = "CompletionError";
  }
}

/**
 * Complete several prompts one at a time, in order.
 */
export async function completeBatch(
  client: CompletionClient,
  prompts: Iterable<ChatPrompt>
): Promise<string[]> {
  const completions: string[] = [];
  for (const prompt of prompts) {
    completions.push(await client.complete(prompt));
  }
  return completions;
}
