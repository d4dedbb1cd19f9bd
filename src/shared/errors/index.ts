/**
 * Error Hierarchy
 *
 * Centralized error definitions for the application.
 *
 * - ProtocolError: invalid/expired cursor, unknown job. Recoverable by restarting the job.
 * - TransportError: connection, timeout or non-2xx response. Retried per unit.
 * - ValidationError: bad path or bad arguments. Never retried.
 * - StorageError: local disk failure. Fatal for the unit, never for the pool.
 */
import { AxiosError } from "axios";

export type ErrorContext = Record<string, unknown>;

export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(
    message: string,
    public readonly context?: ErrorContext
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Whether a unit-level retry may succeed.
   */
  get retryable(): boolean {
    return false;
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      context: this.context,
      stack: this.stack
    };
  }
}

// Validation Errors
export class ValidationError extends DomainError {
  readonly code = "VALIDATION_ERROR";
  readonly statusCode = 400;
}

export class ConfigurationError extends DomainError {
  readonly code = "CONFIGURATION_ERROR";
  readonly statusCode = 400;
}

export class AuthenticationError extends DomainError {
  readonly code = "FORBIDDEN";
  readonly statusCode = 403;
}

// Protocol Errors
export type ProtocolErrorCode = "INVALID_CURSOR" | "JOB_NOT_FOUND" | "INVALID_RESPONSE";

export class ProtocolError extends DomainError {
  readonly statusCode: number;

  constructor(
    readonly code: ProtocolErrorCode,
    message: string,
    context?: ErrorContext
  ) {
    super(message, context);
    this.statusCode = code === "JOB_NOT_FOUND" ? 404 : 400;
  }
}

// Infrastructure Errors
export class TransportError extends DomainError {
  readonly code = "TRANSPORT_ERROR";
  readonly statusCode = 502;

  constructor(
    message: string,
    public readonly status?: number,
    context?: ErrorContext
  ) {
    super(message, { ...context, status });
  }

  /**
   * Connection failures, timeouts and server-side errors; never client errors.
   */
  override get retryable(): boolean {
    return this.status === undefined || this.status >= 500 || this.status === 408 || this.status === 429;
  }
}

export class StorageError extends DomainError {
  readonly code = "STORAGE_ERROR";
  readonly statusCode = 500;
}

export class NotFoundError extends DomainError {
  readonly code = "NOT_FOUND";
  readonly statusCode = 404;
}

// System Errors
export class InternalError extends DomainError {
  readonly code = "INTERNAL_ERROR";
  readonly statusCode = 500;
}

const errnoField = (error: unknown, field: "code" | "path"): string | undefined => {
  if (error instanceof Error && field in error) {
    const value: unknown = Reflect.get(error, field);
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
};

const messageOf = (error: unknown): string => (error instanceof Error ? error.message : String(error));

// Error Factory
export class ErrorFactory {
  /**
   * Maps an error response of the site endpoint (`{error, message}` body) to a domain error.
   */
  static fromHttpResponse(status: number, body: unknown, action: string): DomainError {
    const field = (name: "error" | "message"): string | undefined => {
      if (body === null || typeof body !== "object" || !(name in body)) {
        return undefined;
      }
      const value: unknown = Reflect.get(body, name);
      return typeof value === "string" ? value : undefined;
    };
    const remoteCode = field("error");
    const remoteMessage = field("message");

    if (status === 404 && remoteCode === "job_not_found") {
      return new ProtocolError("JOB_NOT_FOUND", remoteMessage ?? "Job not found or expired.", { action });
    }
    if (status === 400 && remoteCode === "invalid_cursor") {
      return new ProtocolError("INVALID_CURSOR", remoteMessage ?? "Invalid cursor.", { action });
    }
    if (status === 403) {
      return new AuthenticationError(remoteMessage ?? "Access key rejected.", { action });
    }

    return new TransportError(`${action} failed with HTTP ${status}${remoteMessage ? `: ${remoteMessage}` : ""}`, status, {
      action,
      remoteCode
    });
  }

  static fromAxiosError(error: AxiosError, action: string): DomainError {
    if (error.response) {
      return ErrorFactory.fromHttpResponse(error.response.status, error.response.data, action);
    }
    return new TransportError(`${action} failed: ${error.message}`, undefined, { action, code: error.code });
  }

  static fromFileSystemError(error: unknown, operation: string): StorageError {
    return new StorageError(`File system error during ${operation}: ${messageOf(error)}`, {
      operation,
      path: errnoField(error, "path"),
      code: errnoField(error, "code")
    });
  }

  static fromUnknown(error: unknown): DomainError {
    if (error instanceof DomainError) {
      return error;
    }
    return new InternalError(messageOf(error), { cause: error });
  }
}

/**
 * Maps any error raised while pulling a site to the CLI exit code.
 */
export enum ExitCode {
  Success = 0,
  BadArguments = 2,
  Network = 3,
  Internal = 4
}

export const exitCodeFor = (error: unknown): ExitCode => {
  if (error instanceof ValidationError || error instanceof ConfigurationError) {
    return ExitCode.BadArguments;
  }
  if (error instanceof TransportError || error instanceof ProtocolError || error instanceof AuthenticationError) {
    return ExitCode.Network;
  }
  return ExitCode.Internal;
};
