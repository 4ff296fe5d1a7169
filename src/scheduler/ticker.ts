export interface Ticker {
  readonly periodMs: number;
  stop(): void;
}

export type TickerFactory = (periodMs: number, onTick: () => void) => Ticker;

/**
 * Periodic ticker on setInterval. The first tick fires one period after creation.
 */
export const intervalTicker: TickerFactory = (periodMs, onTick) => {
  const interval = setInterval(onTick, periodMs);
  return {
    periodMs,
    stop: () => clearInterval(interval),
  };
};
