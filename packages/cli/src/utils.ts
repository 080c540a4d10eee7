/**
 * @file src/utils.ts
 * @description Option parsing helpers shared by the CLI commands.
 */

/** Splits a comma-separated flag value, dropping empty items. */
export const parseList = (value: string): string[] =>
  value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length);

export const pluralize = (count: number, noun: string): string =>
  `${count} ${noun}${count === 1 ? '' : 's'}`;
