/**
 * BridgeSession: one initialised engine plus the ApiInputOutput it talks to.
 *
 * A dispatch is one turn: clear the collector, put the message in the
 * mailbox, let `takeInput` hand it back out, run the engine, return every
 * event collected on the way. Engine failures become `{ status: "error" }`
 * with the partial responses kept. The file-add counter carries across
 * dispatches; only the interactive loop's `requestInput` resets it.
 *
 * SessionManager holds the active session; `/init` replaces it.
 */

import type { CodingEngine, EngineFactory } from "./engine.js";
import { EXIT_SENTINEL } from "./input-mailbox.js";
import { ApiInputOutput } from "./io-bridge.js";
import { NotInitializedError, errorMessage } from "./errors.js";
import type { DispatchResult, InitResult } from "./types.js";

export class BridgeSession {
  readonly io: ApiInputOutput;
  readonly engine: CodingEngine;
  readonly createdAt = Date.now();
  private _dispatchCount = 0;

  constructor(io: ApiInputOutput, engine: CodingEngine) {
    this.io = io;
    this.engine = engine;
    io.engine = engine;
  }

  get dispatchCount(): number {
    return this._dispatchCount;
  }

  async dispatch(message: string): Promise<DispatchResult> {
    this._dispatchCount++;
    this.io.beginTurn();
    this.io.mailbox.put(message);

    try {
      const input = await this.io.takeInput({
        root: this.engine.root,
        inChatFiles: this.engine.inChatRelativeFiles(),
        absReadOnlyFiles: this.engine.absReadOnlyFiles(),
        editFormat: this.engine.editFormat,
      });
      if (input !== EXIT_SENTINEL) {
        await this.engine.run(input);
      }
      return { status: "success", responses: this.io.responses };
    } catch (err: unknown) {
      const msg = errorMessage(err);
      console.error(`[bridge] dispatch #${this._dispatchCount} failed: ${msg}`);
      return { status: "error", error: msg, responses: this.io.responses };
    }
  }

  /** Wake a pending input wait with the exit sentinel. */
  stop(): void {
    this.io.mailbox.put(EXIT_SENTINEL);
  }
}

export class SessionManager {
  private readonly createEngine: EngineFactory;
  private session: BridgeSession | null = null;

  constructor(createEngine: EngineFactory) {
    this.createEngine = createEngine;
  }

  get active(): BridgeSession | null {
    return this.session;
  }

  async initialize(options: { pretty?: boolean; cwd?: string } = {}): Promise<InitResult> {
    const pretty = options.pretty ?? false;
    const io = new ApiInputOutput({ pretty });
    const engine = await this.createEngine(io, { pretty, cwd: options.cwd });

    if (this.session) {
      console.error(`[bridge] replacing session after ${this.session.dispatchCount} dispatches`);
      this.session.stop();
    }
    this.session = new BridgeSession(io, engine);
    console.error(`[bridge] session initialized (root=${engine.root} pretty=${pretty})`);
    return { status: "initialized", message: "Coding assistant initialized successfully" };
  }

  async dispatch(message: string): Promise<DispatchResult> {
    if (!this.session) throw new NotInitializedError();
    return this.session.dispatch(message);
  }

  stop(): { status: "stopped" } {
    this.session?.stop();
    return { status: "stopped" };
  }
}
