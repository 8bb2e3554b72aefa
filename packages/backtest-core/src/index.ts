export * from "./types";
export { MIN_BACKTEST_HISTORY, resolveTestWindow, splitSeries } from "./split";
export type { SeriesSplit } from "./split";
export { backtest } from "./backtestRunner";
