import { Flags, type Interfaces } from "@oclif/core";
import { z } from "zod";

// @mark Command Configuration Definitions

/**
 * Configuration options for command-line flags and configuration parsing.
 *
 * Flags carry no defaults: an absent flag must not hide a value from
 * `sitepull.yaml` or the environment. Defaults live in the schema.
 */
export interface ConfigOption {
  /** The name of the configuration option, as used in flags and `sitepull.yaml`. */
  name: string;
  /** Environment variables that can set this option. */
  variants: readonly string[];
  /** The oclif flag definition for this configuration option. */
  flag: Interfaces.FlagInput[string];
  /** Validates and defaults the merged value. */
  schema: () => z.ZodTypeAny;
}

// Helper to ensure each definition conforms to ConfigOption while preserving exact keys
const createDefinitions = <T extends Record<string, ConfigOption>>(defs: T): T => defs;

/**
 * Accepts real booleans and the strings environment variables carry.
 */
const booleanish = () =>
  z.preprocess((value) => {
    if (typeof value !== "string") {
      return value;
    }
    const normalized = value.trim().toLowerCase();
    if (["1", "true", "yes", "on"].includes(normalized)) {
      return true;
    }
    if (["0", "false", "no", "off", ""].includes(normalized)) {
      return false;
    }
    return value;
  }, z.boolean());

const integer = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

export const definitions = createDefinitions({
  /**
   * Flags that are available to all commands.
   */
  flush: {
    name: "flush",
    variants: ["SITEPULL_FLUSH", "FLUSH"],
    flag: Flags.boolean({
      description: "Print progress as separate lines instead of updating one line in place."
    }),
    schema: () => booleanish().default(false)
  },
  timeout: {
    name: "timeout",
    variants: ["SITEPULL_TIMEOUT", "TIMEOUT"],
    flag: Flags.integer({
      description: "Max run time in seconds, 0 for none."
    }),
    schema: () => integer(0, 7 * 24 * 3600).default(0)
  },
  verbose: {
    name: "verbose",
    variants: ["SITEPULL_VERBOSE", "VERBOSE"],
    flag: Flags.boolean({
      char: "v",
      description: "Enable verbose logging."
    }),
    schema: () => booleanish().default(false)
  },
  key: {
    name: "key",
    variants: ["SITEPULL_KEY"],
    flag: Flags.string({
      char: "k",
      description: "Shared access key of the site endpoint."
    }),
    schema: () => z.string().trim().min(1, "An access key is required")
  },

  /**
   * Download specific flags.
   */
  url: {
    name: "url",
    variants: ["SITEPULL_URL"],
    flag: Flags.string({
      char: "u",
      description: "Root URL of the site to pull, e.g. https://example.com/."
    }),
    schema: () => z.string().url("Must be an http(s) URL")
  },
  output: {
    name: "output",
    variants: ["SITEPULL_OUTPUT"],
    flag: Flags.string({
      char: "o",
      description: "Directory that receives the archive."
    }),
    schema: () => z.string().min(1).default("./sitepull-output")
  },
  concurrency: {
    name: "concurrency",
    variants: ["SITEPULL_CONCURRENCY", "CONCURRENCY"],
    flag: Flags.integer({
      char: "c",
      description: "Maximum number of transfers in flight."
    }),
    schema: () => integer(1, 64).default(4)
  },
  retries: {
    name: "retries",
    variants: ["SITEPULL_RETRIES", "RETRIES"],
    flag: Flags.integer({
      description: "Extra attempts for a transfer that fails on the network."
    }),
    schema: () => integer(0, 10).default(2)
  },
  "time-budget": {
    name: "time-budget",
    variants: ["SITEPULL_TIME_BUDGET"],
    flag: Flags.integer({
      description: "Seconds the server may spend on one database export slice."
    }),
    schema: () => integer(1, 25).default(5)
  },

  /**
   * Serve specific flags.
   */
  root: {
    name: "root",
    variants: ["SITEPULL_ROOT"],
    flag: Flags.string({
      char: "r",
      description: "Directory tree to serve."
    }),
    schema: () => z.string().min(1).default(".")
  },
  database: {
    name: "database",
    variants: ["SITEPULL_DATABASE"],
    flag: Flags.string({
      char: "d",
      description: "SQLite database file to export. Omit to serve files only."
    }),
    schema: () => z.string().min(1).optional()
  },
  host: {
    name: "host",
    variants: ["SITEPULL_HOST", "HOST"],
    flag: Flags.string({
      description: "Interface to listen on."
    }),
    schema: () => z.string().min(1).default("127.0.0.1")
  },
  port: {
    name: "port",
    variants: ["SITEPULL_PORT", "PORT"],
    flag: Flags.integer({
      char: "p",
      description: "Port to listen on."
    }),
    schema: () => integer(1, 65_535).default(8080)
  }
});

export type OptionName = keyof typeof definitions;

const globalShape = {
  flush: definitions.flush.schema(),
  timeout: definitions.timeout.schema(),
  verbose: definitions.verbose.schema()
};

/**
 * Validated configuration of each command. Their keys decide which flags and
 * environment variables a command reads.
 */
export const commandSchemas = {
  "*": z.object(globalShape),
  download: z.object({
    ...globalShape,
    url: definitions.url.schema(),
    key: definitions.key.schema(),
    output: definitions.output.schema(),
    concurrency: definitions.concurrency.schema(),
    retries: definitions.retries.schema(),
    "time-budget": definitions["time-budget"].schema()
  }),
  serve: z.object({
    ...globalShape,
    root: definitions.root.schema(),
    database: definitions.database.schema(),
    host: definitions.host.schema(),
    port: definitions.port.schema(),
    key: definitions.key.schema()
  })
};

export type CommandName = Exclude<keyof typeof commandSchemas, "*">;
