import { BaseCommand } from "$lib/commands/base-command";
import { commandSchemas } from "$lib/config/definitions";
import { createCommandFlags } from "$lib/config/loader";
import { Args } from "@oclif/core";
import { blue } from "ansis";

export default class ConfigDump extends BaseCommand {
  static override description = "Print the merged configuration of a command, with the access key masked.";
  static override examples = ["<%= config.bin %> <%= command.id %> download", "<%= config.bin %> <%= command.id %> serve --port 9000"];
  static override args = {
    command: Args.string({
      description: "Command whose configuration to show.",
      options: ["download", "serve"],
      default: "download"
    })
  };
  static override flags = {
    ...createCommandFlags("download"),
    ...createCommandFlags("serve")
  };

  async run(): Promise<void> {
    const command = this.args.command === "serve" ? "serve" : "download";
    const config = command === "serve" ? await this.loadConfig(commandSchemas.serve) : await this.loadConfig(commandSchemas.download);
    this.log(blue(`Loaded configuration for ${command}:`));
    this.log(config.toYaml());
  }
}
