/**
 * Map Shader Builder
 *
 * Generates the WGSL for a unary element-wise kernel:
 *
 *   output.data[gidx] = op(input.data[gidx])
 *
 * The skeleton never changes. Only the two buffer names and the op token
 * are substituted, and nothing is validated: aliased names, unknown
 * functions and bad identifiers surface when the host compiles the shader.
 * No bounds check either, the dispatch has to match the buffer length.
 */

import type {
    BufferBinding,
    KernelSource,
    MapKernelOptions,
    UnaryOpType,
    WorkgroupSize,
} from '@kernloom/types';
import { DEFAULT_ARRAY_VECTOR_LAYOUT, generateLayoutStruct } from '../../shader/ArrayVectorLayout';

export const DEFAULT_WORKGROUP_SIZE: WorkgroupSize = Object.freeze([1, 1, 1] as const);

export const DEFAULT_ENTRY_POINT = 'main';

export function generateMapKernel(
    inputName: string,
    outputName: string,
    opType: UnaryOpType,
    options: MapKernelOptions = {}
): KernelSource {
    const layout = options.layout ?? DEFAULT_ARRAY_VECTOR_LAYOUT;
    const workgroupSize = options.workgroupSize ?? DEFAULT_WORKGROUP_SIZE;
    const entryPoint = options.entryPoint ?? DEFAULT_ENTRY_POINT;
    const field = layout.fieldName;
    const [wx, wy, wz] = workgroupSize;

    const lines: string[] = [];

    lines.push(...generateLayoutStruct(layout));
    lines.push('');

    // Bindings: 0 = input (read), 1 = output (write)
    lines.push(`@group(0) @binding(0) var<storage, read> ${inputName}: ${layout.structName};`);
    lines.push(`@group(0) @binding(1) var<storage, read_write> ${outputName}: ${layout.structName};`);
    lines.push('');

    lines.push(`@compute @workgroup_size(${wx}, ${wy}, ${wz})`);
    lines.push(`fn ${entryPoint}(@builtin(global_invocation_id) global_id: vec3<u32>) {`);
    lines.push('    let gidx = global_id.x;');
    lines.push(`    ${outputName}.${field}[gidx] = ${opType}(${inputName}.${field}[gidx]);`);
    lines.push('}');
    lines.push('');

    const input: BufferBinding = { group: 0, binding: 0, name: inputName, access: 'read' };
    const output: BufferBinding = { group: 0, binding: 1, name: outputName, access: 'write' };

    const kernel: KernelSource = {
        code: lines.join('\n'),
        entryPoint,
        workgroupSize: Object.freeze([wx, wy, wz] as const),
        bindings: Object.freeze([Object.freeze(input), Object.freeze(output)] as const),
        opType,
        layout,
    };
    return Object.freeze(kernel);
}
