/**
 * Agent loop: an LLM plays the human at the coding assistant's keyboard.
 *
 * Each iteration sends the transcript to the LLM, records the raw reply, and
 * acts on the single JSON command it contains. Capped at MAX_ITERATIONS LLM
 * calls; unparsable replies are kept in the transcript and skipped.
 */

import { z } from "zod";
import { ProtocolError } from "./errors.js";
import type { ChatCompletion } from "./llm-client.js";
import type { ConversationTurn, DispatchResult } from "./types.js";

export const MAX_ITERATIONS = 5;
export const QUIT_COMMAND = "/quit";

export type Dispatch = (message: string) => Promise<DispatchResult>;

export interface ConversationDeps {
  complete: ChatCompletion;
  dispatch: Dispatch;
  maxIterations?: number;
}

export function buildSystemPrompt(instruction: string): string {
  return `
You are a developer pairing with an AI coding assistant. Speak to it in the first person ("I want ...").
Every user message you receive is the assistant's structured output, not a human.
Read the previous messages carefully and decide the single next step towards the goal.

<assistant_information>
The assistant is a command-line coding tool exposed through an API. It keeps a map of the
repository with file and symbol names, but it can only edit files that were added to the chat.

Add only the files that need to change; unrelated files distract it.
Discuss a plan before asking for edits.
To create a new file, add it first with /add <file> so the assistant writes to it instead of an existing file.
Send one command per message: "/add <file>" and free text cannot be combined.
</assistant_information>

<assistant_commands>
- free text: talk to the assistant about the project, the files and the edits
- /add <file_name>: add a file to the chat
- /web <website_url>: scrape a page, convert it to markdown and send it as a message
- /commit: commit the current changes
- /quit: end the session
</assistant_commands>

<human_goal>
${instruction}
</human_goal>

Reply with a SINGLE JSON object and nothing else:

{
    "type": "aider" | "perplexity",
    "content": "command or text for the assistant, or a research question"
}

Use "aider" to talk to the coding assistant and "perplexity" to look something up.
`;
}

const CommandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("aider"), content: z.string() }),
  z.object({ type: z.literal("perplexity"), content: z.unknown() }),
]);

export type AgentCommand = z.infer<typeof CommandSchema>;

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** First `{ … }` span of the reply, else the whole reply, as a command. */
export function extractCommand(reply: string): AgentCommand {
  const span = /({.*})/s.exec(reply);
  let parsed = span ? parseJson(span[1]) : { ok: false as const };
  if (!parsed.ok) parsed = parseJson(reply);
  if (!parsed.ok) throw new ProtocolError("Could not extract valid JSON from response");

  const command = CommandSchema.safeParse(parsed.value);
  if (!command.success) {
    throw new ProtocolError(`Unexpected command shape: ${command.error.issues[0]?.message ?? "invalid"}`);
  }
  return command.data;
}

export async function runConversation(instruction: string, deps: ConversationDeps): Promise<ConversationTurn[]> {
  const maxIterations = deps.maxIterations ?? MAX_ITERATIONS;
  const transcript: ConversationTurn[] = [{ role: "system", content: buildSystemPrompt(instruction) }];

  for (let i = 0; i < maxIterations; i++) {
    console.error(`[agent] iteration ${i + 1}/${maxIterations}`);
    const reply = await deps.complete([...transcript]);
    transcript.push({ role: "assistant", content: reply });

    let command: AgentCommand;
    try {
      command = extractCommand(reply);
    } catch (err: unknown) {
      if (!(err instanceof ProtocolError)) throw err;
      console.error(`[agent] skipping turn: ${err.message}`);
      continue;
    }

    if (command.type === "aider") {
      if (command.content === QUIT_COMMAND) {
        console.error("[agent] quit requested");
        return transcript;
      }
      const result = await deps.dispatch(command.content);
      transcript.push({ role: "user", content: JSON.stringify(result) });
    } else {
      const content = command.content;
      transcript.push({ role: "user", content: typeof content === "string" ? content : JSON.stringify(content ?? null) });
    }
  }

  console.error(`[agent] iteration cap of ${maxIterations} reached`);
  return transcript;
}
