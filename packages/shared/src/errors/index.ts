export interface StandardErrorBody {
  message: string;
  code: string;
  details?: unknown;
}

export interface BuildErrorBodyInput {
  message: string;
  code: string;
  details?: unknown;
}

export function buildStandardErrorBody(
  input: BuildErrorBodyInput,
): StandardErrorBody {
  return {
    message: input.message,
    code: input.code,
    ...(input.details !== undefined ? { details: input.details } : {}),
  };
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "Unexpected error";
}
