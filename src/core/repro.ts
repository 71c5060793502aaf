/**
 * @module core/repro
 * @description Seeded randomness for reproducible runs
 *
 * Use `SeededRandom` instead of `Math.random()` wherever a run has to be
 * replayed: space sampling, baseline policies, replayed telemetry.
 */

// ==================== Seeded Random ====================

/**
 * Seeded random number generator (Mulberry32)
 */
export class SeededRandom {
    private state: number;

    constructor(seed: number) {
        this.state = seed >>> 0;
    }

    /**
     * Generate a random float in [0, 1)
     */
    random(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    /**
     * Generate a random sample from a normal distribution
     */
    normal(mean: number = 0, std: number = 1): number {
        // Box-Muller transform; 1 - u keeps the log argument in (0, 1]
        const u1 = 1 - this.random();
        const u2 = this.random();
        const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
        return mean + std * z;
    }

    /**
     * Sample Gamma(shape, 1) (Marsaglia-Tsang)
     */
    gamma(shape: number): number {
        if (shape <= 0) {
            throw new RangeError(`gamma shape must be positive, got ${shape}`);
        }
        if (shape < 1) {
            // Boost: Gamma(a) = Gamma(a + 1) * U^(1/a)
            const u = 1 - this.random();
            return this.gamma(shape + 1) * Math.pow(u, 1 / shape);
        }

        const d = shape - 1 / 3;
        const c = 1 / Math.sqrt(9 * d);
        for (;;) {
            let x: number;
            let v: number;
            do {
                x = this.normal();
                v = 1 + c * x;
            } while (v <= 0);
            v = v * v * v;
            const u = 1 - this.random();
            if (u < 1 - 0.0331 * x * x * x * x) return d * v;
            if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v;
        }
    }

    /**
     * Sample Beta(alpha, beta)
     */
    beta(alpha: number, beta: number): number {
        const x = this.gamma(alpha);
        const y = this.gamma(beta);
        return x / (x + y);
    }
}

/**
 * Create a seeded random number generator
 */
export function createRng(seed: number): SeededRandom {
    return new SeededRandom(seed);
}
