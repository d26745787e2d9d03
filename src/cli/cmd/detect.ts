import type { CommandModule } from "yargs"
import chalk from "chalk"
import { OS } from "../../detect/os"
import { Env } from "../../detect/env"
import { Config } from "../../config/config"
import { UI } from "../ui"
import { Log } from "../../util/log"

interface DetectArgs {
  json: boolean
}

export const DetectCommand: CommandModule<object, DetectArgs> = {
  command: "detect",
  describe: "Show what automatic installation would work with here",
  builder: (yargs) =>
    yargs.option("json", {
      type: "boolean",
      describe: "Output as JSON",
      default: false,
    }),
  handler: async (argv) => {
    Log.stage("Detect:start")
    const config = Config.resolve()
    const os = OS.detect()
    const managers = await OS.packageManagers(os.platform)
    const ci = Env.ciPlatform()
    const disabled = !config.install.autoInstall || Env.isAutoInstallDisabled()

    if (argv.json) {
      const result = {
        os,
        ci,
        autoInstallDisabled: disabled,
        supportedManagers: OS.supportedManagers(os.platform),
        packageManagers: managers,
        env: Env.summary(),
      }
      Log.fileData("detect:json", result)
      console.log(JSON.stringify(result, null, 2))
      return
    }

    UI.header("System Information")
    UI.table([
      ["OS", `${os.name} ${os.version}`.trim()],
      ["Arch", os.arch],
      ["User", os.user],
      ["CI", ci ?? chalk.gray("none detected")],
      ["Auto-install", disabled ? chalk.yellow("disabled") : chalk.green("enabled")],
    ])

    UI.header("Package Managers")
    const supported = OS.supportedManagers(os.platform)
    if (supported.length === 0) {
      console.log(chalk.yellow(`  Automatic installation is not supported on ${os.platform}`))
    } else {
      for (const m of supported) UI.check(managers.includes(m), m)
    }

    if (ci) {
      console.log()
      console.log(chalk.gray("  Privileged installs are skipped in CI."))
    }
    console.log()
  },
}
