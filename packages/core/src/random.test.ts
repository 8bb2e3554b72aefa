import { describe, expect, it } from "vitest";
import { SeededRandom } from "./random";

describe("SeededRandom", () => {
	it("repeats the same stream for the same seed", () => {
		const a = new SeededRandom(42);
		const b = new SeededRandom(42);
		const streamA = Array.from({ length: 5 }, () => a.next());
		const streamB = Array.from({ length: 5 }, () => b.next());
		expect(streamA).toEqual(streamB);
	});

	it("produces different streams for different seeds", () => {
		const a = new SeededRandom(1);
		const b = new SeededRandom(2);
		expect(a.next()).not.toBe(b.next());
	});

	it("keeps draws inside the unit interval", () => {
		const rng = new SeededRandom(7);
		for (let i = 0; i < 1000; i += 1) {
			const value = rng.next();
			expect(value).toBeGreaterThanOrEqual(0);
			expect(value).toBeLessThan(1);
		}
	});

	it("samples distinct sorted indices", () => {
		const rng = new SeededRandom(3);
		const picked = rng.sample(10, 4);
		expect(picked).toHaveLength(4);
		expect(new Set(picked).size).toBe(4);
		expect([...picked].sort((x, y) => x - y)).toEqual(picked);
		expect(picked.every((index) => index >= 0 && index < 10)).toBe(true);
	});

	it("caps the sample at the population size", () => {
		const rng = new SeededRandom(3);
		expect(rng.sample(3, 10)).toEqual([0, 1, 2]);
	});
});
