/**
 * Unary Map Operations
 *
 * Graph operator name -> WGSL builtin applied per vector.
 * Adding an operator is one line here; the template does the rest.
 */

import type { UnaryMapOpConfig } from './types';

export const UNARY_MAP_OPS: Readonly<Record<string, UnaryMapOpConfig>> = Object.freeze({
    Abs: { fn: 'abs' },
    Acos: { fn: 'acos' },
    Asin: { fn: 'asin' },
    Atan: { fn: 'atan' },
    Ceil: { fn: 'ceil' },
    Cos: { fn: 'cos' },
    Cosh: { fn: 'cosh' },
    Exp: { fn: 'exp' },
    Floor: { fn: 'floor' },
    Log: { fn: 'log' },
    Round: { fn: 'round' },
    Sign: { fn: 'sign' },
    Sin: { fn: 'sin' },
    Sinh: { fn: 'sinh' },
    Sqrt: { fn: 'sqrt' },
    Tan: { fn: 'tan' },
    Tanh: { fn: 'tanh' },
});

export function isUnaryMapOp(opType: string): boolean {
    return Object.prototype.hasOwnProperty.call(UNARY_MAP_OPS, opType);
}

/**
 * The function token a graph operator name lowers to: the table's `fn`,
 * or the lower-cased name for operators registered outside the table.
 */
export function toWgslUnaryFunction(
    opType: string,
    table: Readonly<Record<string, UnaryMapOpConfig>> = UNARY_MAP_OPS
): string {
    const config = Object.prototype.hasOwnProperty.call(table, opType) ? table[opType] : undefined;
    return config?.fn ?? opType.toLowerCase();
}
