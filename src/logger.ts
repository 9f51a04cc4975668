import chalk from "chalk";

export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
  debug: (msg: string) => void;
};

/**
 * Console logger used by the CLI. Debug lines only appear with --verbose.
 */
export function createConsoleLogger(verbose = false): Logger {
  return {
    info: (msg) => console.log(chalk.blue(msg)),
    warn: (msg) => console.warn(chalk.yellow(`⚠️  ${msg}`)),
    error: (msg) => console.error(chalk.red(`❌ ${msg}`)),
    debug: (msg) => {
      if (verbose) console.log(chalk.gray(`   ${msg}`));
    }
  };
}

