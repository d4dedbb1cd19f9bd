/**
 * Packs a local directory tree into one archive file.
 */
export interface ArchiveBuilder {
  /**
   * @returns Size of the written archive in bytes.
   */
  build(sourceDir: string, destination: string): Promise<number>;
}
