import { describe, expect, it } from "vitest";
import { defaultBands, orderBounds, spreadInterval } from "./intervals";

describe("defaultBands", () => {
	it("spreads ±1.96σ and ±1.28σ with σ a tenth of the forecast's spread", () => {
		// population std of [10, 20] is 5, so σ = 0.5
		const bands = defaultBands([10, 20]);
		expect(bands["95"].lower[0]).toBeCloseTo(9.02, 10);
		expect(bands["95"].upper[1]).toBeCloseTo(20.98, 10);
		expect(bands["80"].lower[1]).toBeCloseTo(19.36, 10);
		expect(bands["80"].upper[0]).toBeCloseTo(10.64, 10);
	});

	it("collapses onto a flat forecast", () => {
		expect(spreadInterval([7, 7, 7], 1.96)).toEqual({ lower: [7, 7, 7], upper: [7, 7, 7] });
	});

	it("never reports a negative lower bound", () => {
		expect(spreadInterval([0, 100], 1.96, 1).lower[0]).toBe(0);
	});
});

describe("orderBounds", () => {
	it("clips at zero and wraps the forecast", () => {
		expect(orderBounds([-1, 5], [-3, 6], [0, 4])).toEqual({
			forecast: [0, 5],
			lower: [0, 5],
			upper: [0, 5],
		});
	});
});
