import chalk from "chalk";

// Console narration for the CLI run. Warnings go to stderr.

export function step(message: string, emoji = "🔄"): void {
  console.log(chalk.blue.bold(`${emoji} ${message}`));
}

export function success(message: string, emoji = "✅"): void {
  console.log(chalk.green.bold(`${emoji} ${message}`));
}

export function warn(message: string, emoji = "⚠️"): void {
  console.warn(chalk.yellow(`${emoji}  ${message}`));
}

export function detail(message: string): void {
  console.log(chalk.gray(`   ${message}`));
}
