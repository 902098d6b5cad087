// ============================================================
// Seeded sample generators for the test suites
// ============================================================

export type Random = () => number;

/**
 * Deterministic generator (mulberry32) returning floats in [0, 1).
 * The same seed always replays the same samples.
 */
export function seededRandom(seed: number): Random {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Finite float with a log-uniform magnitude in [minAbs, maxAbs] and a random sign,
 * so tiny and huge values are sampled as often as mid-range ones.
 */
export function finiteSample(random: Random, maxAbs: number, minAbs: number = 1e-10): number {
    const lo = Math.log10(minAbs);
    const hi = Math.log10(maxAbs);
    const magnitude = Math.min(maxAbs, Math.max(minAbs, 10 ** (lo + random() * (hi - lo))));
    return random() < 0.5 ? -magnitude : magnitude;
}

/** Integer in [lo, hi]. */
export function intBetween(random: Random, lo: number, hi: number): number {
    return lo + Math.floor(random() * (hi - lo + 1));
}

export function pick<T>(random: Random, items: readonly T[]): T {
    return items[Math.floor(random() * items.length)];
}

export function samples<T>(count: number, seed: number, make: (random: Random) => T): T[] {
    const random = seededRandom(seed);
    return Array.from({ length: count }, () => make(random));
}
