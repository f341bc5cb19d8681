import { DEBUG_ASSESSMENT } from "../config/debug";

export const isDev = () => process.env.NODE_ENV !== "production";

const enabled = () => isDev() && DEBUG_ASSESSMENT;

// stdout carries the result record, so every level writes to stderr.
export const dlog = (...args: unknown[]) => {
  if (enabled()) console.error(...args);
};

export const dwarn = (...args: unknown[]) => {
  if (enabled()) console.warn(...args);
};

export const derr = (...args: unknown[]) => {
  if (isDev()) console.error(...args);
};
