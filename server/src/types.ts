export interface FilesSnapshot {
  editable: string[];
  readOnly: string[];
  editFormat?: string;
}

export interface TokenUsage {
  tokensSent: number;
  tokensReceived: number;
  costMessage: number;
  costSession: number;
}

// Events collected during one dispatch, in insertion order
export type ResponseEvent =
  | ({ type: "tool_output"; message: string } & Partial<TokenUsage>)
  | { type: "error"; message: string }
  | { type: "warning"; message: string }
  | { type: "assistant"; message: string; timestamp: string }
  | { type: "confirm"; question: string; answer: boolean; subject?: string }
  | { type: "prompt"; question: string; subject?: string }
  | { type: "files_status"; files: FilesSnapshot };

export type ResponseEventType = ResponseEvent["type"];

export type DispatchResult =
  | { status: "success"; responses: ResponseEvent[] }
  | { status: "error"; error: string; responses: ResponseEvent[] };

export interface InitResult {
  status: "initialized";
  message: string;
}

export interface RepoTask {
  workingDir: string;
  remoteUrl: string;
  branchName: string;
}

export interface PullRequestResult {
  status: "success" | "error";
  message: string;
  pullRequestUrl?: string;
  errorDetail?: string;
}

export type ConversationRole = "system" | "assistant" | "user";

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

export interface InitRequest {
  pretty?: boolean;
}

export interface ChatMessage {
  content: string;
}

export interface InstructionRequest {
  instruction: string;
}
