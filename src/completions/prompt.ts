/**
 * Chat prompts: ordered conversation turns sent to a completion client.
 */

export enum ChatRole {
  System = "system",
  User = "user",
  Assistant = "assistant",
}

export interface ChatMessage {
  readonly role: ChatRole;
  readonly content: string;
}

/**
 * Immutable sequence of chat messages. `append` and `concat` return new
 * prompts.
 */
export class ChatPrompt implements Iterable<ChatMessage> {
  public readonly messages: readonly ChatMessage[];

  constructor(messages: Iterable<ChatMessage> = []) {
    this.messages = Object.freeze([...messages].map((m) => Object.freeze({ role: m.role, content: m.content })));
    Object.freeze(this);
  }

  get length(): number {
    return this.messages.length;
  }

  /** Number of characters across all message contents. */
  get characterLength(): number {
    return this.messages.reduce((total, message) => total + message.content.length, 0);
  }

  at(index: number): ChatMessage | undefined {
    return this.messages.at(index);
  }

  slice(start?: number, end?: number): ChatPrompt {
    return new ChatPrompt(this.messages.slice(start, end));
  }

  append(role: ChatRole, content: string): ChatPrompt {
    return new ChatPrompt([...this.messages, { role, content }]);
  }

  concat(other: Iterable<ChatMessage>): ChatPrompt {
    return new ChatPrompt([...this.messages, ...other]);
  }

  equals(other: ChatPrompt): boolean {
    return (
      this.messages.length === other.messages.length &&
      this.messages.every((m, i) => {
        const o = other.messages[i];
        return o !== undefined && o.role === m.role && o.content === m.content;
      })
    );
  }

  /**
   * Human-readable form: each message under an upper-cased role heading,
   * messages separated by a blank line.
   */
  toString(): string {
    return this.messages.map((m) => `${m.role.toUpperCase()}:\n${m.content}`).join("\n\n");
  }

  [Symbol.iterator](): Iterator<ChatMessage> {
    return this.messages[Symbol.iterator]();
  }
}
