import chalk from "chalk";

function debugEnabled(): boolean {
  return process.env.DEBUG === "1";
}

export const logger = {
  info(message: string): void {
    console.log(message);
  },

  step(message: string): void {
    console.log(chalk.blue(message));
  },

  success(message: string): void {
    console.log(chalk.green(message));
  },

  warn(message: string): void {
    console.warn(chalk.yellow(message));
  },

  error(message: string): void {
    console.error(chalk.red(message));
  },

  debug(message: string): void {
    if (debugEnabled()) console.log(chalk.gray(message));
  },
};
