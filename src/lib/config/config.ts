import yaml from "yaml";

const SECRET_OPTIONS = new Set(["key"]);

export class Config<TConfig extends object> {
  private readonly config: TConfig;

  constructor(config: TConfig) {
    this.config = config;
  }

  get rendered(): TConfig {
    return this.config;
  }

  /**
   * Renders the configuration with secrets masked.
   */
  toYaml() {
    const redacted = Object.fromEntries(
      Object.entries(this.config).map(([name, value]) => [name, SECRET_OPTIONS.has(name) && value !== undefined ? "********" : value])
    );
    return yaml.stringify(redacted);
  }
}
