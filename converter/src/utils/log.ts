import chalk from "chalk";

let debug_enabled = false;

export let set_debug_logging = (enabled: boolean) => {
  debug_enabled = enabled;
};

export let debug = (tag: string, ...message: Array<unknown>) => {
  if (!debug_enabled) return;
  console.log(chalk.blue(`[${tag}]`), ...message);
};

export let warn = (tag: string, ...message: Array<unknown>) => {
  console.warn(chalk.yellow(`[${tag}]`), ...message);
};
