import { Args, Command } from "@oclif/core";
import {
  assertConfigFileAbsent,
  DEFAULT_CONFIG_FILE,
  writeDeploymentConfigFile,
} from "@hpvs-deploy/sdk";
import chalk from "chalk";
import { promptDeploymentConfig } from "../../utils/prompts";
import { formatDeploymentError } from "../../utils/format";

export default class ConfigCreate extends Command {
  static description = "Create a deployment configuration file with an interactive wizard";

  static examples = [
    "<%= config.bin %> <%= command.id %>",
    "<%= config.bin %> <%= command.id %> ./my-deploy.yaml",
  ];

  static args = {
    file: Args.string({
      required: false,
      description: `File to write (default: "${DEFAULT_CONFIG_FILE}"); an existing file is never replaced`,
      default: DEFAULT_CONFIG_FILE,
    }),
  };

  async run(): Promise<void> {
    const { args } = await this.parse(ConfigCreate);

    try {
      // Fail before asking anything if the file is already there
      assertConfigFileAbsent(args.file);
      const file = await promptDeploymentConfig(args.file);
      writeDeploymentConfigFile(args.file, file);
    } catch (err) {
      this.error(formatDeploymentError(err), { exit: 1 });
    }

    this.log(`\n${chalk.green("✓")} Wrote configuration to ${chalk.cyan(args.file)}`);
    this.log(chalk.gray(`Run 'hpvs-deploy deploy -f ${args.file}' to deploy with it.`));
  }
}
