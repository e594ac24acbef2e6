/**
 * Array-vector layout schema
 *
 * Versioned description of the storage struct map kernels bind to,
 * and the WGSL it emits.
 */

import type { ArrayVectorLayout, WgslVectorType } from '@kernloom/types';
import { isWgslIdentifier } from '@kernloom/utils';
import { LayoutSchemaError } from '../errors';

const VECTOR_TYPE = /^vec([234])<(f32|i32|u32)>$/;

/**
 * v1: `struct ArrayVector { data: array<vec4<f32>> }`
 */
const LAYOUT_V1: ArrayVectorLayout = {
    version: 1,
    structName: 'ArrayVector',
    fieldName: 'data',
    elementType: 'vec4<f32>',
};

export const DEFAULT_ARRAY_VECTOR_LAYOUT: ArrayVectorLayout = Object.freeze(LAYOUT_V1);

function isVectorType(value: string): value is WgslVectorType {
    return VECTOR_TYPE.test(value);
}

/**
 * Number of lanes of a vector element type (2, 3 or 4)
 */
export function getVectorLanes(elementType: WgslVectorType): number {
    const match = VECTOR_TYPE.exec(elementType);
    if (!match) {
        throw new LayoutSchemaError(`unknown element type '${elementType}'`);
    }
    return Number(match[1]);
}

/**
 * Check a layout and return it frozen.
 * Fields left out are taken from the default layout.
 */
export function defineArrayVectorLayout(
    layout: Partial<ArrayVectorLayout>
): ArrayVectorLayout {
    const resolved = { ...DEFAULT_ARRAY_VECTOR_LAYOUT, ...layout };

    if (!Number.isInteger(resolved.version) || resolved.version < 1) {
        throw new LayoutSchemaError(`version must be a positive integer, got ${resolved.version}`);
    }
    if (!isWgslIdentifier(resolved.structName)) {
        throw new LayoutSchemaError(`structName '${resolved.structName}' is not a WGSL identifier`);
    }
    if (!isWgslIdentifier(resolved.fieldName)) {
        throw new LayoutSchemaError(`fieldName '${resolved.fieldName}' is not a WGSL identifier`);
    }
    if (!isVectorType(resolved.elementType)) {
        throw new LayoutSchemaError(`unknown element type '${resolved.elementType}'`);
    }

    return Object.freeze(resolved);
}

/**
 * WGSL declaration of the layout struct, one line per member
 */
export function generateLayoutStruct(layout: ArrayVectorLayout): string[] {
    return [
        `struct ${layout.structName} {`,
        `    ${layout.fieldName}: array<${layout.elementType}>,`,
        '};',
    ];
}
