/**
 * Conversation
 *
 * Channel to the person logging in.
 */

import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";

/**
 * Conversation interface (for dependency injection).
 */
export interface Conversation {
  /**
   * Show `message` and wait for one line of input.
   *
   * Resolves with an empty string when input ends first.
   */
  prompt(message: string): Promise<string>;
}

/**
 * Conversation over a pair of streams, normally stdin and stdout.
 */
export class StreamConversation implements Conversation {
  private input: Readable;
  private output: Writable;

  constructor(input: Readable, output: Writable) {
    this.input = input;
    this.output = output;
  }

  prompt(message: string): Promise<string> {
    this.output.write(message);
    const rl = createInterface({ input: this.input, terminal: false });

    return new Promise((resolve) => {
      rl.once("line", (line) => {
        rl.close();
        resolve(line);
      });
      rl.once("close", () => resolve(""));
    });
  }
}

/**
 * Mock conversation for testing.
 */
export class MockConversation implements Conversation {
  private prompts: string[] = [];
  private failure?: Error;

  /**
   * Make the next prompt reject.
   */
  failWith(error: Error): this {
    this.failure = error;
    return this;
  }

  /**
   * Get every prompt shown so far.
   */
  getPrompts(): string[] {
    return [...this.prompts];
  }

  async prompt(message: string): Promise<string> {
    this.prompts.push(message);
    if (this.failure) {
      const error = this.failure;
      this.failure = undefined;
      throw error;
    }
    return "";
  }
}

/**
 * Create a conversation over stdin and stdout.
 */
export function createTerminalConversation(): Conversation {
  return new StreamConversation(process.stdin, process.stdout);
}

/**
 * Create mock conversation for testing.
 */
export function createMockConversation(): MockConversation {
  return new MockConversation();
}
