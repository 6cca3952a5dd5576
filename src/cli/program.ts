import { Command, CommanderError } from "commander";
import { isScopeLedgerError } from "../errors.js";
import { createSubsystemLogger } from "../logging/subsystem.js";
import { theme } from "../terminal/theme.js";
import { registerAdvisorCli } from "./advisor-cli.js";
import { registerEmissionsCli } from "./emissions-cli.js";
import { registerFrameworksCli } from "./frameworks-cli.js";

const log = createSubsystemLogger("cli");

export const VERSION = "0.1.0";

export function buildProgram(): Command {
  const program = new Command()
    .name("scopeledger")
    .description("GHG emissions bookkeeping and ESG framework finder")
    .version(VERSION)
    .option("--config <path>", "Config file (default: ~/.scopeledger/config.json)")
    // Subcommands copy this setting when created, so it must come first.
    .exitOverride();

  registerEmissionsCli(program);
  registerFrameworksCli(program);
  registerAdvisorCli(program);
  return program;
}

/**
 * Run the CLI and return the exit code. Domain errors are printed verbatim.
 */
export async function runCli(argv: string[], program: Command = buildProgram()): Promise<number> {
  try {
    await program.parseAsync(argv, { from: "node" });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      // help and version also exit through here, with code 0
      return err.exitCode;
    }
    if (isScopeLedgerError(err)) {
      console.error(theme.error(err.message));
      return 1;
    }
    log.error(`unexpected failure: ${err instanceof Error ? (err.stack ?? err.message) : String(err)}`);
    console.error(theme.error(err instanceof Error ? err.message : String(err)));
    return 1;
  }
}
