/**
 * Completion client backed by the Anthropic Messages API.
 *
 * System turns of the prompt are joined into the request's `system`
 * parameter; user and assistant turns are sent as `messages` in order.
 * The text blocks of the response are concatenated into the completion.
 *
 * One request per call. Errors from the SDK (network, rate limits, bad
 * requests) propagate unchanged.
 */

import Anthropic from "@anthropic-ai/sdk";
import { z, type ZodIssue } from "zod";

import { ChatRole, type ChatPrompt } from "./prompt.js";
import { CompletionError, type CompletionClient } from "./client.js";

// ---------------------------------------------------------------------------
// Parameters
// ---------------------------------------------------------------------------

export const AnthropicParametersSchema = z
  .object({
    /** Model identifier, e.g. "claude-3-5-sonnet-latest" */
    model: z.string().min(1),
    /** Upper bound on generated tokens */
    maxTokens: z.number().int().positive(),
    temperature: z.number().min(0).max(1).optional(),
    topP: z.number().gt(0).max(1).optional(),
    topK: z.number().int().positive().optional(),
    stopSequences: z.array(z.string().min(1)).optional(),
  })
  .strict();

export type AnthropicParameters = z.infer<typeof AnthropicParametersSchema>;

export class CompletionParametersError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid completion parameters: ${issues.join("; ")}`);
    this.name = "CompletionParametersError";
  }
}

function describeIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

// ---------------------------------------------------------------------------
// Request / response shapes
// ---------------------------------------------------------------------------

export interface AnthropicRequest {
  model: string;
  max_tokens: number;
  system?: string;
  messages: { role: "user" | "assistant"; content: string }[];
  temperature?: number;
  top_p?: number;
  top_k?: number;
  stop_sequences?: string[];
}

/** The part of a Messages API response this client reads. */
export interface AnthropicResponse {
  content: ReadonlyArray<{ type: string; text?: string }>;
}

export type CreateMessage = (request: AnthropicRequest) => Promise<AnthropicResponse>;

/**
 * Build the Messages API request for a prompt.
 */
export function toAnthropicRequest(prompt: ChatPrompt, parameters: AnthropicParameters): AnthropicRequest {
  const system: string[] = [];
  const messages: AnthropicRequest["messages"] = [];

  for (const message of prompt) {
    if (message.role === ChatRole.System) {
      system.push(message.content);
    } else {
      messages.push({ role: message.role === ChatRole.User ? "user" : "assistant", content: message.content });
    }
  }

  const request: AnthropicRequest = {
    model: parameters.model,
    max_tokens: parameters.maxTokens,
    messages,
  };
  if (system.length > 0) request.system = system.join("\n\n");
  if (parameters.temperature !== undefined) request.temperature = parameters.temperature;
  if (parameters.topP !== undefined) request.top_p = parameters.topP;
  if (parameters.topK !== undefined) request.top_k = parameters.topK;
  if (parameters.stopSequences !== undefined) request.stop_sequences = parameters.stopSequences;
  return request;
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export class AnthropicCompletionClient implements CompletionClient {
  public readonly parameters: Readonly<AnthropicParameters>;
  private readonly createMessage: CreateMessage;

  /**
   * @param parameters    - Model and sampling parameters (validated)
   * @param createMessage - Sends one request; defaults to the Anthropic SDK,
   *                        which reads ANTHROPIC_API_KEY from the environment
   * @throws CompletionParametersError if parameters are invalid
   */
  constructor(parameters: AnthropicParameters, createMessage?: CreateMessage) {
    const result = AnthropicParametersSchema.safeParse(parameters);
    if (!result.success) {
      throw new CompletionParametersError(result.error.issues.map(describeIssue));
    }
    this.parameters = Object.freeze(result.data);
    this.createMessage = createMessage ?? defaultCreateMessage();
  }

  get model(): string {
    return this.parameters.model;
  }

  async complete(prompt: ChatPrompt): Promise<string> {
    const response = await this.createMessage(toAnthropicRequest(prompt, this.parameters));

    const texts = response.content.flatMap((block) =>
      block.type === "text" && typeof block.text === "string" ? [block.text] : []
    );
    if (texts.length === 0) {
      throw new CompletionError(this.model, `Completion from ${this.model} contained no text`);
    }
    return texts.join("");
  }
}

/**
 * SDK-backed request function. The SDK client is created on first use so
 * that constructing a client does not require credentials.
 */
function defaultCreateMessage(): CreateMessage {
  let anthropic: Anthropic | null = null;
  return async (request) => {
    anthropic ??= new Anthropic();
    return anthropic.messages.create({
      model: request.model,
      max_tokens: request.max_tokens,
      system: request.system,
      messages: request.messages,
      temperature: request.temperature,
      top_p: request.top_p,
      top_k: request.top_k,
      stop_sequences: request.stop_sequences,
    });
  };
}
