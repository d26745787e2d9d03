import chalk from "chalk"

export namespace UI {
  export function logo(): string {
    return chalk.bold.cyan(`
  ╔═══════════════════════════════════════╗
  ║           ⚙ toolready                 ║
  ║   install the tools your tools need   ║
  ╚═══════════════════════════════════════╝
    `)
  }

  export function header(text: string) {
    console.log()
    console.log(chalk.bold.underline(text))
    console.log()
  }

  export function table(rows: [string, string][]) {
    const maxKey = Math.max(...rows.map(([k]) => k.length))
    for (const [key, value] of rows) {
      console.log(`  ${chalk.gray(key.padEnd(maxKey))}  ${value}`)
    }
  }

  export function check(ok: boolean, label: string) {
    console.log(`  ${ok ? chalk.green("✔") : chalk.gray("○")} ${label}`)
  }
}
