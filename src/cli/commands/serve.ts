import { Command, Option } from "clipanion";
import { startService } from "../../app/lifecycle.js";

export class ServeCommand extends Command {
  static override paths = [["serve"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the memory pipeline HTTP service",
    examples: [
      ["Start with default config", "mempipe serve"],
      ["Start with custom config", "mempipe serve --config ./mempipe.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<number | void> {
    try {
      await startService(this.config);
    } catch (err) {
      this.context.stderr.write(
        `Failed to start: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      return 1;
    }
    // Runs until a signal closes the server.
    await new Promise<never>(() => {});
  }
}
