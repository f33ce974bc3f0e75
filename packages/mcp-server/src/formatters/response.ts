export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    const body: Record<string, unknown> = { error: result.message, type: result.name };
    return {
      content: [{ type: "text" as const, text: JSON.stringify(body) }],
      isError: true,
    };
  }
  const text = typeof result === "string" ? result : JSON.stringify(result, null, 2);
  return {
    content: [{ type: "text" as const, text }],
  };
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
