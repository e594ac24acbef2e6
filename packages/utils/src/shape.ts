import type { Dims } from "@kernloom/types";

/**
 * Number of elements described by a dims list. A scalar (`[]`) holds one.
 */
export function computeNumel(dims: Dims): number {
    return dims.reduce((a: number, b: number) => a * b, 1);
}
