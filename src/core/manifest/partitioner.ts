/**
 * Manifest Partitioner
 *
 * Splits a flat manifest into transfer units: files above the large-file threshold
 * travel alone, everything else is packed greedily into batches in manifest order.
 */
import { ValidationError } from "$shared/errors";

export interface ManifestEntry {
  /** Relative path with `/` separators. */
  path: string;
  size: number;
  /** Modification time in seconds since the epoch. */
  mtime: number;
}

export interface LargeUnit {
  kind: "large";
  entry: ManifestEntry;
}

export interface BatchUnit {
  kind: "batch";
  entries: ManifestEntry[];
  bytes: number;
}

export type TransferUnit = LargeUnit | BatchUnit;

export interface Partition {
  large: LargeUnit[];
  batches: BatchUnit[];
  totalFiles: number;
  totalBytes: number;
}

export interface PartitionOptions {
  largeThreshold: number;
  batchByteCap: number;
  batchCountCap: number;
}

export const DEFAULT_PARTITION_OPTIONS: PartitionOptions = {
  largeThreshold: 10 * 1024 * 1024,
  batchByteCap: 20 * 1024 * 1024,
  batchCountCap: 2000
};

export const unitFiles = (unit: TransferUnit): ManifestEntry[] => (unit.kind === "large" ? [unit.entry] : unit.entries);

export const unitBytes = (unit: TransferUnit): number => (unit.kind === "large" ? unit.entry.size : unit.bytes);

/**
 * Large files first, then batches, each in manifest order.
 */
export const partitionUnits = (partition: Partition): TransferUnit[] => [...partition.large, ...partition.batches];

export const partitionManifest = (
  entries: readonly ManifestEntry[],
  options: Partial<PartitionOptions> = {}
): Partition => {
  const { largeThreshold, batchByteCap, batchCountCap } = { ...DEFAULT_PARTITION_OPTIONS, ...options };
  if (batchCountCap < 1 || batchByteCap < 1 || largeThreshold < 0) {
    throw new ValidationError("Partition caps must be positive", { largeThreshold, batchByteCap, batchCountCap });
  }

  const large: LargeUnit[] = [];
  const batches: BatchUnit[] = [];
  let current: BatchUnit = { kind: "batch", entries: [], bytes: 0 };
  let totalBytes = 0;

  for (const entry of entries) {
    totalBytes += entry.size;

    if (entry.size > largeThreshold) {
      large.push({ kind: "large", entry });
      continue;
    }

    const overflows =
      current.entries.length + 1 > batchCountCap || current.bytes + entry.size > batchByteCap;
    if (current.entries.length > 0 && overflows) {
      batches.push(current);
      current = { kind: "batch", entries: [], bytes: 0 };
    }

    current.entries.push(entry);
    current.bytes += entry.size;
  }

  if (current.entries.length > 0) {
    batches.push(current);
  }

  return { large, batches, totalFiles: entries.length, totalBytes };
};
