import chalk from "chalk";

export const theme = {
  heading: (text: string) => chalk.bold.green(text),
  accent: (text: string) => chalk.cyan(text),
  muted: (text: string) => chalk.gray(text),
  success: (text: string) => chalk.green(text),
  warn: (text: string) => chalk.yellow(text),
  error: (text: string) => chalk.red(text),
};
