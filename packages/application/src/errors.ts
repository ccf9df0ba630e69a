import { buildStandardErrorBody, type StandardErrorBody } from "@nlsbridge/shared";

export type AppErrorCode =
  | "BAD_REQUEST"
  | "RESOURCE_NOT_FOUND"
  | "BUNDLE_FORMAT_INVALID"
  | "CONFIGURATION_ERROR"
  | "INTERNAL_ERROR";

export interface AppErrorInput {
  message: string;
  code: AppErrorCode;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly details?: unknown;

  constructor(input: AppErrorInput) {
    super(
      input.message,
      input.cause !== undefined ? { cause: input.cause } : undefined,
    );
    this.name = new.target.name;
    this.code = input.code;
    if (input.details !== undefined) this.details = input.details;
  }
}

export class BadRequestError extends AppError {
  constructor(message = "Invalid request input", details?: unknown) {
    super({
      message,
      code: "BAD_REQUEST",
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export interface MissingResourceDetails {
  bundleName: string;
  locale: string;
}

export class MissingResourceError extends AppError {
  declare readonly details: MissingResourceDetails;

  constructor(details: MissingResourceDetails) {
    super({
      message: `Can't find bundle for base name ${details.bundleName}, locale ${details.locale}`,
      code: "RESOURCE_NOT_FOUND",
      details,
    });
  }
}

export class BundleFormatError extends AppError {
  constructor(
    message = "Bundle content is malformed",
    details?: unknown,
    cause?: unknown,
  ) {
    super({
      message,
      code: "BUNDLE_FORMAT_INVALID",
      ...(details !== undefined ? { details } : {}),
      ...(cause !== undefined ? { cause } : {}),
    });
  }
}

export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: unknown) {
    super({
      message,
      code: "CONFIGURATION_ERROR",
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class InternalError extends AppError {
  constructor(message = "Unexpected error", details?: unknown) {
    super({
      message,
      code: "INTERNAL_ERROR",
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export function toErrorBody(error: unknown): StandardErrorBody {
  if (error instanceof AppError) {
    return buildStandardErrorBody({
      message: error.message,
      code: error.code,
      ...(error.details !== undefined ? { details: error.details } : {}),
    });
  }

  const fallback = new InternalError();
  return buildStandardErrorBody({
    message: fallback.message,
    code: fallback.code,
  });
}
