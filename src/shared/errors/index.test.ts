import { describe, expect, it } from "vitest";
import {
  AuthenticationError,
  ConfigurationError,
  ErrorFactory,
  ExitCode,
  exitCodeFor,
  InternalError,
  ProtocolError,
  StorageError,
  TransportError,
  ValidationError
} from "./index";

describe("ErrorFactory.fromHttpResponse", () => {
  it("should map an expired job to a protocol error", () => {
    const error = ErrorFactory.fromHttpResponse(
      404,
      { error: "job_not_found", message: "Manifest job not found or expired." },
      "manifest_job_page"
    );

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error.code).toBe("JOB_NOT_FOUND");
    expect(error.statusCode).toBe(404);
    expect(error.message).toBe("Manifest job not found or expired.");
  });

  it("should map a rejected key to an authentication error", () => {
    const error = ErrorFactory.fromHttpResponse(403, { error: "forbidden" }, "db_job_init");

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error.message).toBe("Access key rejected.");
  });

  it("should keep the status of other failures", () => {
    const server = ErrorFactory.fromHttpResponse(500, "oops", "file_fetch");
    const client = ErrorFactory.fromHttpResponse(400, { error: "invalid_request", message: "bad" }, "file_fetch");

    expect(server.message).toBe("file_fetch failed with HTTP 500");
    expect(server.retryable).toBe(true);
    expect(client).toBeInstanceOf(TransportError);
    expect(client.message).toBe("file_fetch failed with HTTP 400: bad");
    expect(client.retryable).toBe(false);
  });
});

describe("TransportError", () => {
  it.each([
    [undefined, true],
    [408, true],
    [429, true],
    [503, true],
    [404, false]
  ])("should treat status %s as retryable: %s", (status, retryable) => {
    expect(new TransportError("failed", status).retryable).toBe(retryable);
  });
});

describe("ErrorFactory.fromFileSystemError", () => {
  it("should keep the errno details", () => {
    const cause = Object.assign(new Error("ENOENT: no such file"), { code: "ENOENT", path: "/x" });

    const error = ErrorFactory.fromFileSystemError(cause, "read /x");

    expect(error).toBeInstanceOf(StorageError);
    expect(error.message).toBe("File system error during read /x: ENOENT: no such file");
    expect(error.context).toEqual({ operation: "read /x", path: "/x", code: "ENOENT" });
  });
});

describe("exitCodeFor", () => {
  it("should map each error family to its exit code", () => {
    expect(exitCodeFor(new ValidationError("bad"))).toBe(ExitCode.BadArguments);
    expect(exitCodeFor(new ConfigurationError("bad"))).toBe(ExitCode.BadArguments);
    expect(exitCodeFor(new TransportError("down", 502))).toBe(ExitCode.Network);
    expect(exitCodeFor(new ProtocolError("INVALID_CURSOR", "bad cursor"))).toBe(ExitCode.Network);
    expect(exitCodeFor(new AuthenticationError("no"))).toBe(ExitCode.Network);
    expect(exitCodeFor(new StorageError("disk"))).toBe(ExitCode.Internal);
    expect(exitCodeFor(ErrorFactory.fromUnknown("boom"))).toBe(ExitCode.Internal);
  });

  it("should wrap unknown values as internal errors", () => {
    const error = ErrorFactory.fromUnknown("boom");

    expect(error).toBeInstanceOf(InternalError);
    expect(error.toJSON()).toMatchObject({ name: "InternalError", code: "INTERNAL_ERROR", message: "boom", statusCode: 500 });
  });
});
