/**
 * Contract between the bridge and the coding engine it wraps.
 *
 * The engine only sees `ToolIO`: it asks questions and reports progress the
 * way it would on a terminal. The bridge only sees `CodingEngine`: it hands
 * over one message per dispatch and reads back the file set for snapshots.
 */

import { EXIT_SENTINEL } from "./input-mailbox.js";

export interface InputContext {
  root: string;
  inChatFiles: string[];
  absReadOnlyFiles?: string[];
  editFormat?: string;
}

export interface AskOptions {
  subject?: string;
}

export interface OutputOptions {
  logOnly?: boolean;
}

/** Capability surface an interactive engine expects from its terminal. */
export interface ToolIO {
  requestInput(context: InputContext): Promise<string>;
  confirm(question: string, options?: AskOptions): boolean;
  promptForText(question: string, defaultValue?: string, options?: AskOptions): string;
  reportOutput(message: string, options?: OutputOptions): void;
  reportError(message: string): void;
  reportWarning(message: string): void;
  reportAssistantMessage(message: string): void;
}

export interface HistoryOptions {
  blockquote?: boolean;
  linebreak?: boolean;
}

export interface CodingEngine {
  /** Directory the engine works in; file paths are relative to it. */
  readonly root: string;
  readonly editFormat: string | undefined;
  inChatRelativeFiles(): string[];
  absReadOnlyFiles(): string[];
  appendChatHistory(text: string, options?: HistoryOptions): void;
  run(message: string): Promise<void>;
}

export interface EngineOptions {
  pretty: boolean;
  /** Overrides the factory's default working directory */
  cwd?: string;
}

export type EngineFactory = (io: ToolIO, options: EngineOptions) => CodingEngine | Promise<CodingEngine>;

/**
 * Shared plumbing for engines: an in-memory chat history and the
 * terminal-style loop that keeps pulling input until the exit sentinel.
 */
export abstract class BaseEngine implements CodingEngine {
  readonly root: string;
  protected readonly io: ToolIO;
  private readonly history: string[] = [];

  constructor(io: ToolIO, root: string) {
    this.io = io;
    this.root = root;
  }

  abstract get editFormat(): string | undefined;
  abstract inChatRelativeFiles(): string[];
  abstract absReadOnlyFiles(): string[];
  abstract run(message: string): Promise<void>;

  get chatHistory(): readonly string[] {
    return this.history;
  }

  appendChatHistory(text: string, options: HistoryOptions = {}): void {
    let entry = options.blockquote
      ? text
          .trim()
          .split("\n")
          .map((line) => `> ${line}`)
          .join("\n")
      : text;
    if (options.linebreak) entry += "\n";
    this.history.push(entry);
  }

  /** Run turns from `requestInput` until "exit" arrives. */
  async runInteractive(): Promise<number> {
    let turns = 0;
    for (;;) {
      const input = await this.io.requestInput({
        root: this.root,
        inChatFiles: this.inChatRelativeFiles(),
        absReadOnlyFiles: this.absReadOnlyFiles(),
        editFormat: this.editFormat,
      });
      if (input.trim() === EXIT_SENTINEL) return turns;
      await this.run(input);
      turns++;
    }
  }
}
