/**
 * `[finitary]`-prefixed console output. Debug lines are written only when the
 * `debug` configuration flag is on.
 */

import { config } from "./config.js";

const TAG = "[finitary]";

function debug(message: string): void {
  if (config.get<boolean>("debug") === true) {
    console.debug(`${TAG} ${message}`);
  }
}

function warn(message: string): void {
  console.warn(`${TAG} ${message}`);
}

function error(message: string): void {
  console.error(`${TAG} ${message}`);
}

export const log = { debug, warn, error } as const;
