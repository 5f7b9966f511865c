/**
 * Chat prompts and completion clients.
 */

export { ChatRole, ChatPrompt, type ChatMessage } from "./prompt.js";
export { CompletionError, completeBatch, type CompletionClient } from "./client.js";
export {
  AnthropicCompletionClient,
  AnthropicParametersSchema,
  CompletionParametersError,
  toAnthropicRequest,
  type AnthropicParameters,
  type AnthropicRequest,
  type AnthropicResponse,
  type CreateMessage,
} from "./anthropic.js";
