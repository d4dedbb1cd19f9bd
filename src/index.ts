export { PaginationEngine } from "./core/export/pagination-engine";
export type { PaginationEngineOptions } from "./core/export/pagination-engine";
export { decodeCursor, encodeCursor } from "./core/export/cursor";
export type { Cursor } from "./core/export/cursor";
export type { TabularSource } from "./core/export/tabular-source";
export type { KeyValueStore } from "./core/jobs/key-value-store";
export { partitionManifest, partitionUnits } from "./core/manifest/partitioner";
export type { ManifestEntry, TransferUnit } from "./core/manifest/partitioner";
export { Orchestrator } from "./core/orchestrator/orchestrator";
export type { OrchestratorOptions, RunSummary } from "./core/orchestrator/orchestrator";
export { ProgressAggregator } from "./core/retrieval/progress-aggregator";
export type { ProgressSnapshot } from "./core/retrieval/progress-aggregator";
export { RetrievalEngine } from "./core/retrieval/retrieval-engine";
export type { SiteTransport } from "./core/transport/site-transport";
export { ZipArchiveBuilder } from "./infrastructure/archive/zip-archive-builder";
export { createEndpointServer } from "./infrastructure/http/endpoint-server";
export { HttpSiteClient } from "./infrastructure/http/site-client";
export { InMemoryKeyValueStore } from "./infrastructure/kv/in-memory-kv-store";
export { SiteEndpoint } from "./infrastructure/site/site-endpoint";
export { SqliteSource } from "./infrastructure/sqlite/sqlite-source";
export { handleDownload } from "./lib/download";
export * from "./shared/errors";
