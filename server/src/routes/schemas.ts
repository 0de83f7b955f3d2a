import { z, ZodError } from "zod";
import { InvalidRequestError } from "../errors.js";
import type { ChatMessage, InitRequest, InstructionRequest } from "../types.js";

export const InitRequestSchema = z.object({
  pretty: z.boolean().optional(),
}) satisfies z.ZodType<InitRequest>;

export const ChatMessageSchema = z.object({
  content: z.string(),
}) satisfies z.ZodType<ChatMessage>;

export const InstructionRequestSchema = z.object({
  instruction: z.string().min(1, "instruction must not be empty"),
}) satisfies z.ZodType<InstructionRequest>;

function formatZodError(err: ZodError): string {
  return err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

/** Parse a JSON body, or throw InvalidRequestError (400). */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new InvalidRequestError(`Invalid request body: ${formatZodError(result.error)}`);
  }
  return result.data;
}
