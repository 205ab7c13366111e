/**
 * Tagged console logging ("[Tag] message"). Silent under NODE_ENV=test.
 */

const isTest = process.env.NODE_ENV === 'test';

function format(tag: string, message: string): string {
  return `[${tag}] ${message}`;
}

export const log = {
  info(tag: string, message: string, ...rest: unknown[]): void {
    if (!isTest) console.log(format(tag, message), ...rest);
  },
  warn(tag: string, message: string, ...rest: unknown[]): void {
    if (!isTest) console.warn(format(tag, message), ...rest);
  },
  error(tag: string, message: string, ...rest: unknown[]): void {
    if (!isTest) console.error(format(tag, message), ...rest);
  },
};
