import process from 'node:process';
import chalk from 'chalk';

let enabled = computeDefaultEnabled();

function computeDefaultEnabled(): boolean {
  if (process.env.NO_COLOR !== undefined) return false;
  // Default to TTY-based color enabling.
  return Boolean(process.stdout.isTTY);
}

export function setEnabled(value: boolean): void {
  enabled = value;
}

function apply(style: (s: string) => string, text: string): string {
  return enabled ? style(text) : text;
}

export const c = {
  dim: (s: string) => apply(chalk.dim, s),
  heading: (s: string) => apply(chalk.green.bold, s),
  step: (s: string) => apply(chalk.yellow, s),
  ok: (s: string) => apply(chalk.green, s),
  warn: (s: string) => apply(chalk.yellow, s),
  error: (s: string) => apply(chalk.red, s),
};
