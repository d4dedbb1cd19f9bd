/**
 * Local File Operations
 *
 * Path confinement and stream-to-disk writes shared by the client and the endpoint.
 */
import { log } from "$lib/log";
import { DomainError, ErrorFactory, NotFoundError, TransportError, ValidationError } from "$shared/errors";
import { createWriteStream, promises as fs } from "fs";
import path from "path";
import { Transform, type Readable } from "stream";
import { pipeline } from "stream/promises";

/**
 * Resolves a relative, `/`-separated path under `root`.
 *
 * Arguments:
 * - root: Directory the result must stay inside
 * - relativePath: Path as it appears in a manifest
 *
 * Returns:
 * - The absolute path
 *
 * Throws ValidationError for empty, absolute or escaping paths.
 */
export const resolveInside = (root: string, relativePath: string): string => {
  if (relativePath.length === 0 || relativePath.includes("\0")) {
    throw new ValidationError("Invalid path", { path: relativePath });
  }
  if (relativePath.startsWith("/") || relativePath.startsWith("\\") || path.isAbsolute(relativePath)) {
    throw new ValidationError("Absolute paths are not allowed", { path: relativePath });
  }

  const base = path.resolve(root);
  const resolved = path.resolve(base, ...relativePath.split(/[\\/]+/));
  if (resolved === base || !resolved.startsWith(base + path.sep)) {
    throw new ValidationError("Path escapes the root directory", { path: relativePath });
  }
  return resolved;
};

/**
 * Like resolveInside, but follows symlinks: the target's real path must sit
 * under `realRoot`, which is expected to be resolved with `fs.realpath` already.
 *
 * Throws ValidationError when a link leads out of the root, NotFoundError when
 * the target does not exist.
 */
export const resolveRealInside = async (realRoot: string, relativePath: string): Promise<string> => {
  const resolved = resolveInside(realRoot, relativePath);
  let real: string;
  try {
    real = await fs.realpath(resolved);
  } catch (error) {
    throw new NotFoundError("File not found.", { path: relativePath, cause: error });
  }
  if (!real.startsWith(path.resolve(realRoot) + path.sep)) {
    throw new ValidationError("Path escapes the root directory", { path: relativePath });
  }
  return real;
};

/**
 * Streams `source` into `destination`, creating parent directories.
 * A partially written file is removed on failure.
 *
 * Returns:
 * - Bytes written
 *
 * Throws TransportError when the source fails, StorageError when the disk does.
 */
export const writeStream = async (
  source: Readable,
  destination: string,
  onBytes?: (bytes: number) => void
): Promise<number> => {
  let written = 0;
  let sourceError: unknown;
  source.once("error", (error) => {
    sourceError = error;
  });

  const counter = new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      written += chunk.length;
      onBytes?.(chunk.length);
      callback(null, chunk);
    }
  });

  try {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    await pipeline(source, counter, createWriteStream(destination));
    return written;
  } catch (error) {
    await removeQuietly(destination);
    if (error instanceof DomainError) {
      throw error;
    }
    if (sourceError !== undefined) {
      const message = sourceError instanceof Error ? sourceError.message : String(sourceError);
      throw new TransportError(`Download of ${path.basename(destination)} interrupted: ${message}`, undefined, {
        destination
      });
    }
    throw ErrorFactory.fromFileSystemError(error, `write ${destination}`);
  }
};

/**
 * Removes a file or directory tree; failures are logged, never thrown.
 */
export const removeQuietly = async (target: string): Promise<void> => {
  try {
    await fs.rm(target, { recursive: true, force: true });
  } catch (error) {
    log.warning(`could not remove ${target}`, { error: error instanceof Error ? error.message : String(error) });
  }
};
