import { z } from "zod";

export const UNKNOWN_ERROR_CODE = "unknown error";
export const UNKNOWN_ERROR_MESSAGE = "Unknown error";

export type CommandParams = Record<string, unknown>;

export type CommandMessage = {
  id: number;
  method: string;
  params: CommandParams;
};

export type ErrorDescriptor = {
  code: string;
  message: string;
  stacktrace?: string;
};

export type ResponseMessage =
  | { kind: "response"; id: number; ok: true; result: unknown }
  | { kind: "response"; id: number; ok: false; error: ErrorDescriptor };

export type EventMessage = {
  kind: "event";
  method: string;
  params: CommandParams;
};

export type InvalidMessage = { kind: "invalid"; reason: string };

export type IncomingMessage = ResponseMessage | EventMessage | InvalidMessage;

const OptionalText = z.string().optional().catch(undefined);

// Some drivers echo the id back as a numeric string.
const ResponseIdSchema = z.union([
  z.number().int().nonnegative(),
  z.string().regex(/^\d+$/, "Expected an integer id").transform(Number),
]);

/** Any `type` other than "error" is a success. */
export const ResponseMessageSchema = z.object({
  id: ResponseIdSchema,
  type: z.unknown().optional(),
  result: z.unknown().optional(),
  error: OptionalText,
  message: OptionalText,
  stacktrace: OptionalText,
});

export const EventMessageSchema = z.object({
  method: z.string().min(1),
  params: z.record(z.unknown()).nullish(),
});

export function encodeCommand(command: CommandMessage): string {
  return JSON.stringify({ id: command.id, method: command.method, params: command.params });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

/**
 * Classifies one inbound frame. Anything carrying an `id` is a response,
 * anything else with a `method` is an event.
 */
export function parseIncomingMessage(text: string): IncomingMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return {
      kind: "invalid",
      reason: error instanceof Error ? error.message : "Malformed JSON",
    };
  }

  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { kind: "invalid", reason: "Message is not a JSON object" };
  }

  if ("id" in raw && raw.id !== null && raw.id !== undefined) {
    const parsed = ResponseMessageSchema.safeParse(raw);
    if (!parsed.success) {
      return { kind: "invalid", reason: formatIssues(parsed.error) };
    }
    const response = parsed.data;
    if (response.type === "error") {
      const stacktrace = nonEmpty(response.stacktrace);
      return {
        kind: "response",
        id: response.id,
        ok: false,
        error: {
          code: nonEmpty(response.error) ?? UNKNOWN_ERROR_CODE,
          message: nonEmpty(response.message) ?? UNKNOWN_ERROR_MESSAGE,
          ...(stacktrace ? { stacktrace } : {}),
        },
      };
    }
    return {
      kind: "response",
      id: response.id,
      ok: true,
      result: response.result ?? {},
    };
  }

  const parsed = EventMessageSchema.safeParse(raw);
  if (!parsed.success) {
    return { kind: "invalid", reason: formatIssues(parsed.error) };
  }
  return {
    kind: "event",
    method: parsed.data.method,
    params: parsed.data.params ?? {},
  };
}
