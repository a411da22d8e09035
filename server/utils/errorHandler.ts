import { ZodError } from "zod";
import { fromZodError } from "zod-validation-error";
import { USER_MESSAGES } from "../config/messages";

export interface AppError extends Error {
  statusCode?: number;
  code?: string | number;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class ExternalServiceError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  service: string;
  code?: string;
  constructor(service: string, message: string, code?: string) {
    super(`${service} error: ${message}`);
    this.name = "ExternalServiceError";
    this.service = service;
    this.code = code;
  }
}

export class RateLimitError extends Error implements AppError {
  statusCode = 429;
  isOperational = true;
  waitSeconds: number;
  constructor(message = "Rate limit exceeded", waitSeconds = 0) {
    super(message);
    this.name = "RateLimitError";
    this.waitSeconds = waitSeconds;
  }
}

/**
 * How the chat platform rejected a call. Drives thread resolution
 * (already-exists / forbidden) and delivery retries (transient / too-large).
 */
export type PlatformErrorKind =
  | "already-exists"
  | "forbidden"
  | "transient"
  | "too-large"
  | "not-found"
  | "other";

export class PlatformError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  kind: PlatformErrorKind;
  code?: string | number;
  constructor(kind: PlatformErrorKind, message: string, code?: string | number) {
    super(message);
    this.name = "PlatformError";
    this.kind = kind;
    this.code = code;
  }
}

/**
 * Terminal delivery failure: retries and the text-only resend are exhausted.
 */
export class DeliveryError extends Error implements AppError {
  statusCode = 502;
  isOperational = true;
  lastError: PlatformError;
  attempts: number;
  constructor(lastError: PlatformError, attempts: number) {
    super(`Delivery failed after ${attempts} attempt(s): ${lastError.message}`);
    this.name = "DeliveryError";
    this.lastError = lastError;
    this.attempts = attempts;
  }
}

export function isPlatformError(error: unknown, kind?: PlatformErrorKind): error is PlatformError {
  return error instanceof PlatformError && (kind === undefined || error.kind === kind);
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return fromZodError(error).message;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return "An unexpected error occurred";
}

export function getErrorStatusCode(error: unknown): number {
  if (error instanceof ZodError) {
    return 400;
  }
  if (error instanceof Error && "statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return 500;
}

/**
 * The part of an express Response the route helpers write to.
 */
export interface JsonResponse {
  status(code: number): JsonResponse;
  json(body: unknown): unknown;
}

export function handleRouteError(
  res: JsonResponse,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  res.status(statusCode).json({ error: message });
}

export interface ClassifiedError {
  type: string;
  userMessage: string;
  errorMessage: string;
  errorCode: string | number | undefined;
  stack: string | undefined;
}

function readErrorCode(err: unknown): string | number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && (typeof err.code === "string" || typeof err.code === "number")) {
    return err.code;
  }
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function readHttpStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null || !("status" in err)) return undefined;
  return typeof err.status === "number" ? err.status : undefined;
}

/**
 * Maps a collaborator or delivery failure onto the notice shown to the user.
 */
export function classifyPipelineError(err: unknown): ClassifiedError {
  const errorMessage = err instanceof Error ? err.message : String(err);
  const errorCode = readErrorCode(err);
  const status = readHttpStatus(err);
  const stack = err instanceof Error ? err.stack : undefined;

  if (err instanceof RateLimitError) {
    return { type: "rate_limited", userMessage: err.message, errorMessage, errorCode, stack };
  }

  if (err instanceof ValidationError) {
    return { type: "invalid_request", userMessage: err.message, errorMessage, errorCode, stack };
  }

  if (err instanceof DeliveryError) {
    return { type: "delivery", userMessage: USER_MESSAGES.deliveryError, errorMessage, errorCode, stack };
  }

  if (errorCode === "insufficient_quota" || errorCode === 429 || status === 429 ||
    errorMessage.includes("exceeded your current quota") ||
    /rate limit/i.test(errorMessage)) {
    return { type: "llm_quota", userMessage: USER_MESSAGES.llmQuota, errorMessage, errorCode, stack };
  }

  if (errorCode === 401 || status === 401 || errorCode === "missing_api_key" || errorMessage.includes("Incorrect API key") ||
    errorMessage.includes("invalid_api_key")) {
    return { type: "llm_auth", userMessage: USER_MESSAGES.llmAuth, errorMessage, errorCode, stack };
  }

  return { type: "internal", userMessage: USER_MESSAGES.processingError, errorMessage, errorCode, stack };
}
