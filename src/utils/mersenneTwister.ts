const N = 624;
const M = 397;
const MATRIX_A = 0x9908b0df;
const UPPER_MASK = 0x80000000;
const LOWER_MASK = 0x7fffffff;
const WORD = 0x100000000;

/**
 * MT19937 generator seeded from an integer through init_by_array over the
 * 32-bit words of its absolute value. Bounded draws use rejection sampling on
 * the top bits, so a seed always yields the same sequence.
 */
export class MersenneTwister {
    private readonly state = new Uint32Array(N);
    private index = N;

    constructor(seed: number) {
        this.seedByArray(MersenneTwister.seedWords(seed));
    }

    /** Splits |seed| into 32-bit words, least significant first. */
    static seedWords(seed: number): number[] {
        let remaining = Math.abs(Math.trunc(seed));
        const words: number[] = [];

        do {
            words.push(remaining % WORD);
            remaining = Math.floor(remaining / WORD);
        } while (remaining > 0);

        return words;
    }

    nextUint32(): number {
        if (this.index >= N) {
            this.twist();
        }

        let y = this.state[this.index++];
        y ^= y >>> 11;
        y ^= (y << 7) & 0x9d2c5680;
        y ^= (y << 15) & 0xefc60000;
        y ^= y >>> 18;

        return y >>> 0;
    }

    /** Uniform integer in [0, bound) by rejection sampling of the top bits. */
    nextBelow(bound: number): number {
        if (!Number.isInteger(bound) || bound <= 0 || bound >= WORD) {
            throw new RangeError(`bound must be an integer in 1..2^32-1, got ${bound}`);
        }

        const bits = 32 - Math.clz32(bound);
        let value = this.nextBits(bits);
        while (value >= bound) {
            value = this.nextBits(bits);
        }

        return value;
    }

    /** Inclusive on both ends. */
    nextInt(min: number, max: number): number {
        return min + this.nextBelow(max - min + 1);
    }

    private nextBits(bits: number): number {
        return this.nextUint32() >>> (32 - bits);
    }

    private seedWith(seed: number): void {
        const mt = this.state;
        mt[0] = seed >>> 0;
        for (let i = 1; i < N; i++) {
            const prev = mt[i - 1] ^ (mt[i - 1] >>> 30);
            mt[i] = (Math.imul(1812433253, prev) + i) >>> 0;
        }
        this.index = N;
    }

    private seedByArray(key: number[]): void {
        const mt = this.state;
        this.seedWith(19650218);

        let i = 1;
        let j = 0;
        for (let k = Math.max(N, key.length); k > 0; k--) {
            const prev = mt[i - 1] ^ (mt[i - 1] >>> 30);
            mt[i] = ((mt[i] ^ Math.imul(prev, 1664525)) >>> 0) + key[j] + j;
            i++;
            j++;
            if (i >= N) {
                mt[0] = mt[N - 1];
                i = 1;
            }
            if (j >= key.length) {
                j = 0;
            }
        }

        for (let k = N - 1; k > 0; k--) {
            const prev = mt[i - 1] ^ (mt[i - 1] >>> 30);
            mt[i] = ((mt[i] ^ Math.imul(prev, 1566083941)) >>> 0) - i;
            i++;
            if (i >= N) {
                mt[0] = mt[N - 1];
                i = 1;
            }
        }

        mt[0] = UPPER_MASK;
        this.index = N;
    }

    private twist(): void {
        const mt = this.state;
        for (let k = 0; k < N; k++) {
            const y = (mt[k] & UPPER_MASK) | (mt[(k + 1) % N] & LOWER_MASK);
            mt[k] = mt[(k + M) % N] ^ (y >>> 1) ^ (y & 1 ? MATRIX_A : 0);
        }
        this.index = 0;
    }
}
