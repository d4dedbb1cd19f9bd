import type { Interfaces } from "@oclif/core";
import { ConfigurationError } from "$shared/errors";
import * as fs from "fs/promises";
import path from "path";
import * as yaml from "yaml";
import { z } from "zod";
import { log } from "../log";
import { Config } from "./config";
import { commandSchemas, definitions, type CommandName, type ConfigOption, type OptionName } from "./definitions";

export const CONFIG_FILE = "sitepull.yaml";

export interface LoadCommandConfigOptions {
  /** Defaults to `sitepull.yaml` in the working directory. */
  configPath?: string;
  /** Defaults to `process.env`. */
  env?: NodeJS.ProcessEnv;
}

/**
 * Type Generation
 */

export type ResolvedCommandConfig<TCommand extends CommandName> = z.infer<(typeof commandSchemas)[TCommand]>;

/**
 * Loads, merges, and validates configuration for a command from multiple sources.
 *
 * The configuration is loaded from the following sources, with later sources taking precedence:
 * 1. YAML file (`sitepull.yaml`)
 * 2. Environment variables
 * 3. CLI flags
 *
 * @param schema The command's schema from `commandSchemas`.
 * @param cliFlags The raw CLI flags from oclif's `this.parse()`.
 */
export async function loadCommandConfig<Shape extends z.ZodRawShape>(
  schema: z.ZodObject<Shape>,
  cliFlags: Record<string, unknown>,
  options: LoadCommandConfigOptions = {}
): Promise<Config<z.infer<z.ZodObject<Shape>>>> {
  // 1. Load from YAML file
  const yamlConfig = await readYaml(options.configPath ?? path.join(process.cwd(), CONFIG_FILE));

  // 2. Load from environment variables
  const env = options.env ?? process.env;
  const envConfig: Record<string, unknown> = {};
  for (const option of parseables(Object.keys(schema.shape))) {
    const value = option.variants.map((variant) => env[variant]).find((candidate) => candidate !== undefined && candidate !== "");
    if (value !== undefined) {
      envConfig[option.name] = value;
    }
  }

  // 3. Clean up CLI flags (remove undefined)
  const cleanedFlags: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(cliFlags)) {
    if (value !== undefined) {
      cleanedFlags[key] = value;
    }
  }

  // 4. Merge and validate
  const result = schema.safeParse({ ...yamlConfig, ...envConfig, ...cleanedFlags });
  if (!result.success) {
    log.error("Configuration validation failed:");
    for (const issue of result.error.issues) {
      log.error(`- ${issue.path.join(".")}: ${issue.message}`);
    }
    const summary = result.error.issues.map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${summary}`, { issues: result.error.issues });
  }
  return new Config(result.data);
}

const readYaml = async (file: string): Promise<Record<string, unknown>> => {
  let contents: string;
  try {
    contents = await fs.readFile(file, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return {};
    }
    throw new ConfigurationError(`Could not read ${file}`, { file, cause: error });
  }

  let parsed: unknown;
  try {
    parsed = yaml.parse(contents);
  } catch (error) {
    throw new ConfigurationError(`Could not parse ${file}: ${error instanceof Error ? error.message : String(error)}`, { file });
  }
  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError(`${file} must contain a mapping of option names to values`, { file });
  }
  return Object.fromEntries(Object.entries(parsed));
};

const isOptionName = (name: string): name is OptionName => Object.prototype.hasOwnProperty.call(definitions, name);

/**
 * Factory Functions
 */

const parseables = (names: string[]): ConfigOption[] => names.filter(isOptionName).map((name) => definitions[name]);

export const getCommandParseables = (commandName: CommandName | "*"): ConfigOption[] =>
  parseables(Object.keys(commandSchemas[commandName].shape));

export const createCommandFlags = (commandName: CommandName | "*"): Interfaces.FlagInput => {
  const flags: Interfaces.FlagInput = {};
  for (const option of getCommandParseables(commandName)) {
    flags[option.name] = option.flag;
  }
  return flags;
};
