import type { Response } from "express";
import { ZodError, type ZodIssue } from "zod";
import { fromZodError } from "zod-validation-error";

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  isOperational?: boolean;
}

export class ValidationError extends Error implements AppError {
  statusCode = 400;
  code = "validation_error";
  isOperational = true;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends Error implements AppError {
  statusCode = 404;
  code = "not_found";
  isOperational = true;
  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
  }
}

export class AuthorizationError extends Error implements AppError {
  statusCode = 403;
  code = "forbidden";
  isOperational = true;
  constructor(message = "Access denied") {
    super(message);
    this.name = "AuthorizationError";
  }
}

/**
 * Raised when the router is assembled with missing or inconsistent
 * collaborators. Surfaces before any turn runs.
 */
export class ConfigurationError extends Error implements AppError {
  statusCode = 500;
  code = "configuration_error";
  isOperational = false;
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A structured-output call returned something that could not be turned into
 * the requested shape (unparseable JSON, or a value the schema rejects).
 */
export class StructuredOutputError extends Error implements AppError {
  statusCode = 502;
  code = "structured_output_error";
  isOperational = true;
  schemaName: string;
  issues: ZodIssue[];
  constructor(schemaName: string, message: string, options?: { issues?: ZodIssue[]; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "StructuredOutputError";
    this.schemaName = schemaName;
    this.issues = options?.issues ?? [];
  }
}

export class ClassificationFailure extends StructuredOutputError {
  code = "classification_failure";
  constructor(message: string, options?: { issues?: ZodIssue[]; cause?: unknown }) {
    super("UserIntent", message, options);
    this.name = "ClassificationFailure";
  }
}

/**
 * A task handler could not produce a value its response schema accepts
 * within the reasoning loop's step and validation budget.
 */
export class ResponseValidationError extends Error implements AppError {
  statusCode = 422;
  code = "response_validation_error";
  isOperational = true;
  schemaName: string;
  issues: ZodIssue[];
  toolsUsed: string[];
  constructor(
    schemaName: string,
    message: string,
    options?: { issues?: ZodIssue[]; toolsUsed?: string[]; cause?: unknown },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "ResponseValidationError";
    this.schemaName = schemaName;
    this.issues = options?.issues ?? [];
    this.toolsUsed = options?.toolsUsed ?? [];
  }
}

export type TurnFailureContext = {
  sessionId: string;
  actionsTaken: string[];
};

/**
 * Attach the session id and the partial audit trail to an error that aborted
 * a turn. The error keeps its class so callers can still match on it.
 */
export function withTurnContext<E extends Error>(error: E, context: TurnFailureContext): E & TurnFailureContext {
  return Object.assign(error, { sessionId: context.sessionId, actionsTaken: [...context.actionsTaken] });
}

export function getTurnContext(error: unknown): TurnFailureContext | undefined {
  if (!(error instanceof Error)) return undefined;
  if (!("sessionId" in error) || !("actionsTaken" in error)) return undefined;
  const { sessionId, actionsTaken } = error;
  if (typeof sessionId !== "string" || !Array.isArray(actionsTaken)) return undefined;
  return {
    sessionId,
    actionsTaken: actionsTaken.filter((action): action is string => typeof action === "string"),
  };
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

export function handleRouteError(
  res: Response,
  error: unknown,
  context?: string,
): void {
  const statusCode = getErrorStatusCode(error);
  const message = getErrorMessage(error);

  if (statusCode >= 500 && context) {
    console.error(`[${context}] Error:`, error);
  }

  const turnContext = getTurnContext(error);
  if (turnContext) {
    res.status(statusCode).json({ error: message, actionsTaken: turnContext.actionsTaken });
  } else {
    res.status(statusCode).json({ error: message });
  }
}

export function logError(context: string, error: unknown): void {
  const message = getErrorMessage(error);
  const stack = error instanceof Error ? error.stack : undefined;
  console.error(`[${context}] ${message}`, stack ? `\n${stack}` : "");
}
