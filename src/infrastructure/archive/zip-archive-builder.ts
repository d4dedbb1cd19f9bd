/**
 * ArchiveBuilder writing a zip file with archiver.
 */
import type { ArchiveBuilder } from "$core/orchestrator/archive-builder";
import { removeQuietly } from "$infrastructure/filesystem/local-files";
import { log } from "$lib/log";
import { ErrorFactory } from "$shared/errors";
import archiver from "archiver";
import { createWriteStream, promises as fs } from "fs";
import path from "path";
import { pipeline } from "stream/promises";

export interface ZipArchiveBuilderOptions {
  /** zlib level, 0 (store) to 9. */
  level?: number;
}

export class ZipArchiveBuilder implements ArchiveBuilder {
  constructor(private readonly options: ZipArchiveBuilderOptions = {}) {}

  /**
   * Zips the contents of `sourceDir` (not the directory itself) into `destination`.
   */
  async build(sourceDir: string, destination: string): Promise<number> {
    const archive = archiver("zip", { zlib: { level: this.options.level ?? 6 } });
    archive.on("warning", (warning) => {
      log.warning(`archive: ${warning.message}`);
    });

    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      archive.directory(sourceDir, false);
      await Promise.all([pipeline(archive, createWriteStream(destination)), archive.finalize()]);
      const { size } = await fs.stat(destination);
      log.debug("archive written", { destination, bytes: size });
      return size;
    } catch (error) {
      await removeQuietly(destination);
      throw ErrorFactory.fromFileSystemError(error, `archive ${destination}`);
    }
  }
}
