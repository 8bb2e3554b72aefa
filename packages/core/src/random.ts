/**
 * Seeded pseudo-random source (mulberry32). Every stochastic model takes one
 * of these so repeated runs with the same seed produce identical output.
 */
export class SeededRandom {
	private state: number;
	private spare: number | null = null;

	constructor(seed: number) {
		this.state = seed >>> 0;
	}

	next(): number {
		this.state = (this.state + 0x6d2b79f5) | 0;
		let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
		t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	}

	/** Integer in [0, maxExclusive). */
	int(maxExclusive: number): number {
		return Math.floor(this.next() * maxExclusive);
	}

	normal(): number {
		if (this.spare !== null) {
			const value = this.spare;
			this.spare = null;
			return value;
		}
		let u = 0;
		while (u === 0) {
			u = this.next();
		}
		const v = this.next();
		const radius = Math.sqrt(-2 * Math.log(u));
		this.spare = radius * Math.sin(2 * Math.PI * v);
		return radius * Math.cos(2 * Math.PI * v);
	}

	/** Picks `count` distinct indices from [0, size) in ascending order. */
	sample(size: number, count: number): number[] {
		const pool = Array.from({ length: size }, (_, index) => index);
		const take = Math.min(Math.max(count, 0), size);
		for (let i = 0; i < take; i += 1) {
			const j = i + this.int(size - i);
			[pool[i], pool[j]] = [pool[j], pool[i]];
		}
		return pool.slice(0, take).sort((a, b) => a - b);
	}
}
