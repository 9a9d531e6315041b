import { Builtins, Cli } from "clipanion";
import { createRequire } from "node:module";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { ServeCommand } from "./commands/serve.js";
import { StageResetCommand, StageSetCommand, StageShowCommand } from "./commands/stage.js";

const require = createRequire(import.meta.url);
const pkg: { version: string } = require("../../package.json");

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Memory pipeline",
    binaryName: "mempipe",
    binaryVersion: pkg.version,
  });

  cli.register(ServeCommand);

  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  cli.register(StageShowCommand);
  cli.register(StageSetCommand);
  cli.register(StageResetCommand);

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  return cli;
}
