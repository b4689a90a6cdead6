import chalk from 'chalk';

function stamp(): string {
  return chalk.dim(new Date().toTimeString().slice(0, 8));
}

export const logger = {
  info(msg: string) {
    console.log(stamp(), chalk.blue('ℹ'), msg);
  },

  success(msg: string) {
    console.log(stamp(), chalk.green('✔'), msg);
  },

  warn(msg: string) {
    console.log(stamp(), chalk.yellow('⚠'), msg);
  },

  error(msg: string) {
    console.error(stamp(), chalk.red('✖'), msg);
  },

  debug(msg: string) {
    if (process.env.DEBUG) {
      console.log(stamp(), chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  header(msg: string) {
    console.log();
    console.log(chalk.bold(msg));
    console.log();
  },

  dim(msg: string) {
    console.log(chalk.dim(msg));
  },
};
