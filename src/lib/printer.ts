import { c } from './colors.js';

export interface OutputOptions {
  json?: boolean;
}

export function printOutput<T>(data: T, lines: string[], options: OutputOptions = {}): void {
  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  for (const line of lines) {
    console.log(line);
  }
}

export function formatKeyValues(pairs: Array<[string, string]>): string[] {
  if (pairs.length === 0) {
    return [];
  }
  const width = Math.max(...pairs.map(([key]) => key.length));
  return pairs.map(([key, value]) => `${c.dim(padRight(key, width))} : ${value}`);
}

function padRight(text: string, width: number): string {
  if (text.length >= width) {
    return text;
  }
  return text + ' '.repeat(width - text.length);
}
