import type { DemandPoint, Frequency, TimeSeries } from "./types";

/** Builds a frozen series; points are copied so callers keep their arrays. */
export const createSeries = (
	frequency: Frequency,
	points: readonly DemandPoint[]
): TimeSeries =>
	Object.freeze({
		frequency,
		points: Object.freeze(
			points.map((point) => Object.freeze({ date: point.date, demand: point.demand }))
		),
	});

export const demandValues = (series: TimeSeries): number[] =>
	series.points.map((point) => point.demand);

export const seriesDates = (series: TimeSeries): string[] =>
	series.points.map((point) => point.date);

export const lastDate = (series: TimeSeries): string | null =>
	series.points.length ? series.points[series.points.length - 1].date : null;

/** Read-only view over `[start, end)` of the series. */
export const sliceSeries = (
	series: TimeSeries,
	start: number,
	end?: number
): TimeSeries => createSeries(series.frequency, series.points.slice(start, end));

export const mapDemand = (
	series: TimeSeries,
	transform: (demand: number, index: number) => number
): TimeSeries =>
	createSeries(
		series.frequency,
		series.points.map((point, index) => ({
			date: point.date,
			demand: transform(point.demand, index),
		}))
	);
