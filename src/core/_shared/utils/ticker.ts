/** Starts a repeating callback and returns the function that cancels it. */
export type TickerFactory = (callback: () => void, intervalMs: number) => () => void;

export const nodeTicker: TickerFactory = (callback, intervalMs) => {
  const handle = setInterval(callback, intervalMs);
  return () => clearInterval(handle);
};

// Background work only; never keeps the process alive on its own.
export const unrefTicker: TickerFactory = (callback, intervalMs) => {
  const handle = setInterval(callback, intervalMs);
  handle.unref();
  return () => clearInterval(handle);
};
