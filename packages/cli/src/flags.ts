import { DEFAULT_CONFIG_FILE, PLATFORMS } from "@hpvs-deploy/sdk";
import { Args, Flags } from "@oclif/core";

export const commonFlags = {
  verbose: Flags.boolean({
    required: false,
    description: "Enable verbose logging (default: false)",
    default: false,
    env: "HPVS_DEPLOY_DEBUG",
  }),
};

export const platformArg = Args.string({
  required: false,
  description: `Toolkit platform to deploy (${PLATFORMS.join(", ")}; case-insensitive, default: fedora)`,
});

export const configFileFlags = {
  "create-config": Flags.string({
    char: "c",
    required: false,
    description: "Run the configuration wizard and write its answers to FILE",
    exclusive: ["config"],
  }),
  config: Flags.string({
    char: "f",
    required: false,
    description: `Configuration file to use (default: "${DEFAULT_CONFIG_FILE}")`,
    exclusive: ["create-config"],
    env: "HPVS_DEPLOY_CONFIG",
  }),
};
