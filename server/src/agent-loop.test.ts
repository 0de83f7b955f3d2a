import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MAX_ITERATIONS, buildSystemPrompt, extractCommand, runConversation, type Dispatch } from "./agent-loop.js";
import { ProtocolError } from "./errors.js";
import type { ChatCompletion } from "./llm-client.js";
import type { DispatchResult } from "./types.js";

const QUIT = '{"type": "aider", "content": "/quit"}';
const okResult: DispatchResult = { status: "success", responses: [] };

function scripted(replies: string[], fallback = '{"type": "aider", "content": "keep going"}') {
  let index = 0;
  return vi.fn<ChatCompletion>(async () => replies[index++] ?? fallback);
}

describe("extractCommand", () => {
  it("reads the JSON object out of surrounding prose", () => {
    const reply = 'Sure, next step:\n{"type": "aider", "content": "/add src/app.ts"}\nThat should do it.';

    expect(extractCommand(reply)).toEqual({ type: "aider", content: "/add src/app.ts" });
  });

  it("accepts a bare JSON reply", () => {
    expect(extractCommand('{"type":"perplexity","content":"docs"}')).toEqual({ type: "perplexity", content: "docs" });
  });

  it("throws ProtocolError for replies without JSON", () => {
    expect(() => extractCommand("I think we are done here.")).toThrow(ProtocolError);
  });

  it("throws ProtocolError for an unknown command type", () => {
    expect(() => extractCommand('{"type": "shell", "content": "ls"}')).toThrow(ProtocolError);
  });
});

describe("buildSystemPrompt", () => {
  it("embeds the goal and the command list", () => {
    const prompt = buildSystemPrompt("Add a README");

    expect(prompt).toContain("<human_goal>\nAdd a README\n</human_goal>");
    expect(prompt).toContain("- /quit: end the session");
  });

  it("describes both command types", () => {
    expect(buildSystemPrompt("x")).toContain('"type": "aider" | "perplexity"');
  });
});

describe("runConversation", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("stops at /quit without dispatching", async () => {
    const complete = scripted([QUIT]);
    const dispatch = vi.fn<Dispatch>(async () => okResult);

    const transcript = await runConversation("Add a README", { complete, dispatch });

    expect(complete).toHaveBeenCalledTimes(1);
    expect(dispatch).not.toHaveBeenCalled();
    expect(transcript.map((t) => t.role)).toEqual(["system", "assistant"]);
    expect(transcript[1].content).toBe(QUIT);
  });

  it("dispatches a padded /quit instead of quitting", async () => {
    const complete = scripted(['{"type": "aider", "content": " /quit "}', QUIT]);
    const dispatch = vi.fn<Dispatch>(async () => okResult);

    await runConversation("x", { complete, dispatch });

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch).toHaveBeenCalledWith(" /quit ");
  });

  it("calls the LLM at most five times", async () => {
    const complete = scripted([]);
    const dispatch = vi.fn<Dispatch>(async () => okResult);

    const transcript = await runConversation("x", { complete, dispatch });

    expect(MAX_ITERATIONS).toBe(5);
    expect(complete).toHaveBeenCalledTimes(5);
    expect(dispatch).toHaveBeenCalledTimes(5);
    expect(dispatch).toHaveBeenCalledWith("keep going");
    expect(transcript).toHaveLength(11);
    expect(transcript[2]).toEqual({ role: "user", content: JSON.stringify(okResult) });
  });

  it("honours a smaller iteration cap", async () => {
    const complete = scripted([]);
    const dispatch = vi.fn<Dispatch>(async () => okResult);

    await runConversation("x", { complete, dispatch, maxIterations: 2 });

    expect(complete).toHaveBeenCalledTimes(2);
  });

  it("skips a malformed reply and carries on", async () => {
    const complete = scripted(["no json here", QUIT]);
    const dispatch = vi.fn<Dispatch>(async () => okResult);

    const transcript = await runConversation("x", { complete, dispatch });

    expect(complete).toHaveBeenCalledTimes(2);
    expect(dispatch).not.toHaveBeenCalled();
    expect(transcript.slice(1)).toEqual([
      { role: "assistant", content: "no json here" },
      { role: "assistant", content: QUIT },
    ]);
  });

  it("feeds perplexity content back as a user turn", async () => {
    const complete = scripted(['{"type": "perplexity", "content": "The API uses v2 tokens."}', QUIT]);
    const dispatch = vi.fn<Dispatch>(async () => okResult);

    const transcript = await runConversation("x", { complete, dispatch });

    expect(dispatch).not.toHaveBeenCalled();
    expect(transcript[2]).toEqual({ role: "user", content: "The API uses v2 tokens." });
  });

  it("serializes structured perplexity content as JSON", async () => {
    const complete = scripted(['{"type": "perplexity", "content": {"query": "zod unions"}}', QUIT]);
    const dispatch = vi.fn<Dispatch>(async () => okResult);

    const transcript = await runConversation("x", { complete, dispatch });

    expect(transcript[2]).toEqual({ role: "user", content: '{"query":"zod unions"}' });
  });

  it("passes the dispatch result back to the LLM", async () => {
    const complete = scripted(['{"type": "aider", "content": "/add README.md"}', QUIT]);
    const result: DispatchResult = {
      status: "success",
      responses: [{ type: "tool_output", message: "Added README.md to the chat" }],
    };
    const dispatch = vi.fn<Dispatch>(async () => result);

    await runConversation("x", { complete, dispatch });

    expect(dispatch).toHaveBeenCalledWith("/add README.md");
    const secondCall = complete.mock.calls[1][0];
    expect(secondCall).toHaveLength(3);
    expect(secondCall[2]).toEqual({ role: "user", content: JSON.stringify(result) });
  });

  it("sends the system prompt first", async () => {
    const complete = scripted([QUIT]);

    await runConversation("Add a README", { complete, dispatch: vi.fn<Dispatch>(async () => okResult) });

    const firstCall = complete.mock.calls[0][0];
    expect(firstCall).toEqual([{ role: "system", content: buildSystemPrompt("Add a README") }]);
  });
});
