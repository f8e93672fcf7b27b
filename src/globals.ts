import chalk from "chalk";

const theme = {
  danger: (text: string) => chalk.red(text),
  warn: (text: string) => chalk.yellow(text),
  muted: (text: string) => chalk.gray(text),
};

export const danger = theme.danger;
export const warn = theme.warn;
export const muted = theme.muted;
