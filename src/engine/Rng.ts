/**
 * Source of uniform random integers. Injected everywhere randomness is
 * needed so combat can be replayed under a fixed seed.
 */
export interface IRng {
	/** Uniform integer in [min, max], both inclusive. */
	nextInt(min: number, max: number): number;
}

export class MathRandomRng implements IRng {
	nextInt(min: number, max: number): number {
		return min + Math.floor(Math.random() * (max - min + 1));
	}
}

/**
 * mulberry32 generator; the same seed always yields the same sequence.
 */
export class SeededRng implements IRng {
	private t: number;

	constructor(seed: number) {
		this.t = seed >>> 0;
	}

	next(): number {
		this.t = (this.t + 0x6d2b79f5) >>> 0;
		let x = Math.imul(this.t ^ (this.t >>> 15), 1 | this.t);
		x ^= x + Math.imul(x ^ (x >>> 7), 61 | x);
		return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
	}

	nextInt(min: number, max: number): number {
		return min + Math.floor(this.next() * (max - min + 1));
	}
}

export function pickRandom<T>(rng: IRng, items: readonly T[]): T {
	if (items.length === 0) {
		throw new Error('Cannot pick from an empty list.');
	}
	return items[rng.nextInt(0, items.length - 1)];
}
