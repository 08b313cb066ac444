import { Command, Flags } from "@oclif/core";
import {
  assertConfigFileAbsent,
  DEFAULT_CONFIG_FILE,
  CancelledError,
  ConfigurationError,
  createDeploymentDependencies,
  DeploymentError,
  loadDeploymentConfig,
  runDeployment,
  watchInstanceUntilActive,
  writeDeploymentConfigFile,
  type DeploymentConfig,
  type Logger,
} from "@hpvs-deploy/sdk";
import chalk from "chalk";
import { commonFlags, configFileFlags, platformArg } from "../flags";
import { promptDeploymentConfig } from "../utils/prompts";
import {
  formatDeploymentError,
  formatProvisionedInstance,
  formatState,
  needsUsageHint,
  USAGE_HINT,
} from "../utils/format";

export default class Deploy extends Command {
  static description = "Sign and push the toolkit image, then provision a Hyper Protect instance from it";

  static examples = [
    "<%= config.bin %> <%= command.id %>",
    "<%= config.bin %> <%= command.id %> UBUNTU -f ./my-deploy.yaml",
    "<%= config.bin %> <%= command.id %> alpine --create-config ./my-deploy.yaml",
  ];

  static args = {
    platform: platformArg,
  };

  static flags = {
    ...commonFlags,
    ...configFileFlags,
    local: Flags.boolean({
      char: "l",
      required: false,
      description: "Deploy a locally built image instead of the published one (s390x hosts only)",
      default: false,
    }),
    watch: Flags.boolean({
      required: false,
      description: "Wait for the instance to become active after provisioning",
      default: false,
    }),
  };

  async run() {
    const { args, flags } = await this.parse(Deploy);

    const logger: Logger = {
      info: (msg: string) => this.log(msg),
      warn: (msg: string) => this.warn(msg),
      error: (msg: string) => this.logToStderr(chalk.red(msg)),
      debug: (msg: string) => {
        if (flags.verbose) this.log(chalk.gray(msg));
      },
    };

    const controller = new AbortController();
    const onInterrupt = () => {
      this.log(`\n${chalk.yellow("Interrupted, cancelling deployment...")}`);
      controller.abort();
    };
    process.once("SIGINT", onInterrupt);

    const configPath = flags["create-config"] ?? flags.config ?? DEFAULT_CONFIG_FILE;

    try {
      // 1. Configuration: from the wizard or from a file
      let config: DeploymentConfig;
      try {
        if (flags["create-config"]) {
          assertConfigFileAbsent(configPath);
          const file = await promptDeploymentConfig(configPath);
          writeDeploymentConfigFile(configPath, file);
          this.log(`\n${chalk.green("✓")} Wrote configuration to ${chalk.cyan(configPath)}\n`);
        }

        config = loadDeploymentConfig(configPath, {
          platform: args.platform,
          sourceMode: flags.local ? "local-build" : "remote-registry",
          logger,
        });
      } catch (err) {
        if (err instanceof ConfigurationError) {
          throw err.withContext("config", configPath);
        }
        throw err;
      }

      // 2. Pipeline
      const deps = createDeploymentDependencies(config, { logger, signal: controller.signal });
      const instance = await runDeployment(config, deps);

      this.log(`\n${chalk.green("✓")} Provisioning request accepted\n`);
      for (const line of formatProvisionedInstance(instance)) {
        this.log(line);
      }

      // 3. Optional readiness polling
      if (flags.watch) {
        this.log("");
        let state: string;
        try {
          state = await watchInstanceUntilActive(instance.instanceId, deps.session, logger, {
            signal: controller.signal,
          });
        } catch (err) {
          if (err instanceof DeploymentError) {
            throw err.withContext("watch", instance.instanceId);
          }
          throw err;
        }
        this.log(
          `\n${chalk.green("✓")} Instance ${chalk.cyan(instance.instanceId)} is ${formatState(state)}`,
        );
      }
    } catch (err) {
      if (err instanceof CancelledError) {
        this.error(chalk.yellow(formatDeploymentError(err)), { exit: 1 });
      }
      if (needsUsageHint(err)) {
        this.error(formatDeploymentError(err), { exit: 1, suggestions: [USAGE_HINT] });
      }
      this.error(formatDeploymentError(err), { exit: 1 });
    } finally {
      process.removeListener("SIGINT", onInterrupt);
    }
  }
}
