import yargs from "yargs"
import { hideBin } from "yargs/helpers"
import { DetectCommand } from "./cli/cmd/detect"
import { EnsureCommand } from "./cli/cmd/ensure"
import { ListCommand } from "./cli/cmd/list"
import { UI } from "./cli/ui"
import { Log } from "./util/log"

// Initialize file logging immediately
Log.init()

const cli = yargs(hideBin(process.argv))
  .scriptName("toolready")
  .wrap(100)
  .help("help", "Show help")
  .alias("help", "h")
  .version("0.1.0")
  .alias("version", "v")
  .option("verbose", {
    type: "boolean",
    describe: "Enable verbose output (debug logs to stderr + log file)",
    default: false,
  })
  .middleware((opts) => {
    if (opts.verbose) Log.setLevel("debug")
    Log.debug(`Log file: ${Log.logFilePath()}`)
  })
  .usage(UI.logo())
  .command(DetectCommand)
  .command(ListCommand)
  .command(EnsureCommand)
  .demandCommand(1, "Please specify a command. Run --help for usage.")
  .strict()

try {
  await cli.parse()
} catch (err) {
  if (err instanceof Error) {
    Log.error(err.message)
    Log.debug(err.stack || "")
  } else {
    Log.error(String(err))
  }
  Log.file(`[FATAL] ${err instanceof Error ? err.stack || err.message : String(err)}`)
  process.exit(1)
}
