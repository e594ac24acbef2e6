/**
 * Mathematical Utility Functions
 */

/**
 * Integer division rounding up.
 *
 * @example ceilDiv(10, 4) === 3
 */
export function ceilDiv(value: number, divisor: number): number {
    if (!Number.isInteger(divisor) || divisor <= 0) {
        throw new Error(`ceilDiv: divisor must be a positive integer, got ${divisor}`);
    }
    return Math.ceil(value / divisor);
}
