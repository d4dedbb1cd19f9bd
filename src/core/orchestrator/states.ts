import { InternalError } from "$shared/errors";

export type OrchestratorState =
  | "INIT"
  | "DB_EXPORT"
  | "DB_DOWNLOAD"
  | "MANIFEST_INIT"
  | "PARTITION"
  | "RETRIEVE"
  | "PACKAGE"
  | "DONE"
  | "FAILED";

const forward: Record<OrchestratorState, OrchestratorState | null> = {
  INIT: "DB_EXPORT",
  DB_EXPORT: "DB_DOWNLOAD",
  DB_DOWNLOAD: "MANIFEST_INIT",
  MANIFEST_INIT: "PARTITION",
  PARTITION: "RETRIEVE",
  RETRIEVE: "PACKAGE",
  PACKAGE: "DONE",
  DONE: null,
  FAILED: null
};

export const isTerminal = (state: OrchestratorState): boolean => state === "DONE" || state === "FAILED";

/**
 * The run moves strictly forward one step at a time; FAILED is reachable from any
 * state that is not terminal.
 */
export const canTransition = (from: OrchestratorState, to: OrchestratorState): boolean =>
  to === "FAILED" ? !isTerminal(from) : forward[from] === to;

export const assertTransition = (from: OrchestratorState, to: OrchestratorState): void => {
  if (!canTransition(from, to)) {
    throw new InternalError(`Illegal state transition ${from} -> ${to}`, { from, to });
  }
};
