import chalk from 'chalk';

export const ok = (text: string): string => chalk.green(text);
export const bad = (text: string): string => chalk.red(text);
export const warn = (text: string): string => chalk.yellow(text);
export const heading = (text: string): string => chalk.magenta.bold(`=== ${text} ===`);
export const dim = (text: string): string => chalk.gray(text);

export function seconds(value: number): string {
  return `${value.toFixed(2)}s`;
}

export function plural(count: number, noun: string, pluralNoun = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : pluralNoun}`;
}

/** Green when every item passed, yellow otherwise. */
export function ratio(passed: number, total: number): string {
  const text = `${passed}/${total}`;
  return passed === total && total > 0 ? ok(text) : warn(text);
}
