import { MersenneTwister } from '../utils/mersenneTwister';

const BASE_DIGITS = 9;
const PSEUDO_IDENTIFIER_PATTERN = /^(\d{3})\.(\d{3})\.(\d{3})-(\d{2})$/;

const checkDigit = (sum: number): number => {
    const digit = (sum * 10) % 11;
    return digit === 10 ? 0 : digit;
};

const checkDigitsFor = (base: number[]): [number, number] => {
    const first = checkDigit(base.reduce((sum, digit, i) => sum + digit * (10 - i), 0));
    const second = checkDigit(base.reduce((sum, digit, i) => sum + digit * (11 - i), 0) + first * 2);
    return [first, second];
};

const format = (digits: string): string =>
    `${digits.slice(0, 3)}.${digits.slice(3, 6)}.${digits.slice(6, 9)}-${digits.slice(9)}`;

/**
 * Derives a simulated national identifier (`ddd.ddd.ddd-dd`) from a seed,
 * usually the user id. Nine digits come from a generator created for this
 * call only, followed by two mod-11 check digits. Same seed, same result.
 */
export const synthesizePseudoIdentifier = (seed: number): string => {
    const rng = new MersenneTwister(seed);
    const base: number[] = [];

    for (let i = 0; i < BASE_DIGITS; i++) {
        base.push(rng.nextInt(0, 9));
    }

    const [first, second] = checkDigitsFor(base);
    return format(`${base.join('')}${first}${second}`);
};

export const isValidPseudoIdentifier = (value: string): boolean => {
    const match = PSEUDO_IDENTIFIER_PATTERN.exec(value);
    if (!match) {
        return false;
    }

    const digits = value.replace(/\D/g, '').split('').map(Number);
    const [first, second] = checkDigitsFor(digits.slice(0, BASE_DIGITS));

    return digits[9] === first && digits[10] === second;
};

export const lastDigitOf = (identifier: string): number => {
    const digits = identifier.replace(/\D/g, '');
    return digits.length > 0 ? Number(digits[digits.length - 1]) : 0;
};
