import chalk from "chalk";
import { SERVICE_NAME } from "../constants";

const tag = () => chalk.gray(`[${SERVICE_NAME}]`);

export const log = {
  info(message: string): void {
    console.info(`${tag()} ${chalk.blue(message)}`);
  },
  warn(message: string): void {
    console.warn(`${tag()} ${chalk.yellow(message)}`);
  },
  error(message: string): void {
    console.error(`${tag()} ${chalk.red(message)}`);
  },
  debug(message: string): void {
    if (process.env.DEBUG !== "1") return;
    console.debug(`${tag()} ${chalk.gray(message)}`);
  },
};

export const logError = (context: string, err: unknown): void => {
  const message = err instanceof Error ? err.message : String(err);
  log.error(`${context} -> ${message}`);
};
