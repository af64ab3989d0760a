import type { Logger } from './types';

const PREFIX = '[scoreboard-ocr]';

/** Writes warnings and errors to the console; debug and info are dropped. */
export const consoleLogger: Logger = (level, message) => {
  if (level === 'error') {
    console.error(`${PREFIX} ${message}`);
  } else if (level === 'warn') {
    console.warn(`${PREFIX} ${message}`);
  }
};
