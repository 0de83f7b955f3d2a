/**
 * ApiInputOutput: the terminal an engine believes it is talking to.
 *
 * Every report lands in the ResponseCollector; every question is answered
 * without a human. `requestInput` is the one place that waits, pulling from
 * the single-slot InputMailbox that the dispatch side fills.
 */

import type { AskOptions, CodingEngine, InputContext, OutputOptions, ToolIO } from "./engine.js";
import { InputMailbox } from "./input-mailbox.js";
import {
  ResponseCollector,
  formatFilesSnapshot,
  isFileAddQuestion,
  parseTokenUsage,
  relativeFileName,
} from "./response-collector.js";
import type { ResponseEvent } from "./types.js";

export const MAX_FILES_PER_CHAT = 4;

export class ApiInputOutput implements ToolIO {
  readonly pretty: boolean;
  readonly collector = new ResponseCollector();
  readonly mailbox = new InputMailbox();
  engine: CodingEngine | null = null;

  private currentEditFormat: string | undefined;
  private _filesAddedInCurrentChat = 0;

  constructor(options: { pretty?: boolean } = {}) {
    this.pretty = options.pretty ?? false;
  }

  get filesAddedInCurrentChat(): number {
    return this._filesAddedInCurrentChat;
  }

  get responses(): ResponseEvent[] {
    return this.collector.events;
  }

  /** Start of a dispatch: drop the previous turn's events. */
  beginTurn(): void {
    this.collector.clear();
  }

  reportOutput(message: string, options: OutputOptions = {}): void {
    if (!options.logOnly) {
      const usage = parseTokenUsage(message);
      this.collector.append(usage ? { type: "tool_output", message, ...usage } : { type: "tool_output", message });
      // A usage line ends an engine turn; follow it with the file set
      if (usage) this.appendEngineFilesStatus();
    }
    this.engine?.appendChatHistory(message, { linebreak: true, blockquote: true });
  }

  reportError(message: string): void {
    this.collector.append({ type: "error", message });
    this.engine?.appendChatHistory(message, { linebreak: true, blockquote: true });
  }

  reportWarning(message: string): void {
    this.collector.append({ type: "warning", message });
    this.engine?.appendChatHistory(message, { linebreak: true, blockquote: true });
  }

  reportAssistantMessage(message: string): void {
    this.collector.append({ type: "assistant", message, timestamp: new Date().toISOString() });
    this.engine?.appendChatHistory(message, { linebreak: true });
  }

  /** Interactive prompt: a new chat round, so the file counter starts over. */
  async requestInput(context: InputContext): Promise<string> {
    this._filesAddedInCurrentChat = 0;
    return this.takeInput(context);
  }

  /**
   * Records the file set and waits for the next mailbox value. Dispatched
   * messages come through here, so the file counter spans the session.
   */
  async takeInput(context: InputContext): Promise<string> {
    this.currentEditFormat = context.editFormat;

    const relReadOnly = (context.absReadOnlyFiles ?? []).map((f) => relativeFileName(f, context.root));
    this.collector.append({
      type: "files_status",
      files: formatFilesSnapshot(context.root, context.inChatFiles, relReadOnly, context.editFormat),
    });

    return this.mailbox.take();
  }

  confirm(question: string, options: AskOptions = {}): boolean {
    const answer = this.decide(question);
    this.collector.append({ type: "confirm", question, answer, subject: options.subject });
    if (!answer) {
      this.reportWarning(
        `File limit of ${MAX_FILES_PER_CHAT} files per chat session exceeded. Rejecting additional file.`
      );
    }
    return answer;
  }

  promptForText(question: string, defaultValue = "", options: AskOptions = {}): string {
    this.collector.append({ type: "prompt", question, subject: options.subject });
    return defaultValue;
  }

  private decide(question: string): boolean {
    if (!isFileAddQuestion(question)) return true;
    if (this._filesAddedInCurrentChat >= MAX_FILES_PER_CHAT) return false;
    this._filesAddedInCurrentChat++;
    return true;
  }

  private appendEngineFilesStatus(): void {
    const engine = this.engine;
    if (!engine) return;

    const relReadOnly = engine.absReadOnlyFiles().map((f) => relativeFileName(f, engine.root));
    const editFormat = this.currentEditFormat ?? engine.editFormat;
    this.collector.append({
      type: "files_status",
      files: formatFilesSnapshot(engine.root, engine.inChatRelativeFiles(), relReadOnly, editFormat),
    });
  }
}
