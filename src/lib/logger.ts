import chalk from "chalk";

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, err?: unknown): void;
  debug(message: string): void;
  child(prefix: string): Logger;
}

export function createLogger(options: { prefix?: string; verbose?: boolean } = {}): Logger {
  const prefix = options.prefix ? chalk.dim(`${options.prefix} `) : "";
  const verbose = options.verbose ?? process.env.DEBUG === "1";

  return {
    info(message) {
      console.log(prefix + message);
    },
    success(message) {
      console.log(prefix + chalk.green(message));
    },
    warn(message) {
      console.warn(prefix + chalk.yellow(message));
    },
    error(message, err) {
      if (err !== undefined && verbose) {
        console.error(prefix + chalk.red(message), err);
        return;
      }
      console.error(prefix + chalk.red(message));
    },
    debug(message) {
      if (verbose) {
        console.log(prefix + chalk.gray(message));
      }
    },
    child(childPrefix) {
      const combined = options.prefix ? `${options.prefix} ${childPrefix}` : childPrefix;
      return createLogger({ prefix: combined, verbose });
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  success() {},
  warn() {},
  error() {},
  debug() {},
  child() {
    return silentLogger;
  },
};
