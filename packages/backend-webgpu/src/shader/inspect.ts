/**
 * WGSL Inspector
 *
 * Reads the declarations of a generated kernel back out of its text.
 * Pattern-based, and only as strict as the generators here need:
 * it is not a WGSL parser.
 */

import type { KernelSource, WorkgroupSize } from '@kernloom/types';

export type StorageAccessMode = 'read' | 'read_write';

export interface InspectedBinding {
    group: number;
    binding: number;
    access: StorageAccessMode;
    name: string;
    type: string;
}

export interface InspectedEntryPoint {
    stage: 'compute';
    name: string;
    workgroupSize: WorkgroupSize;
}

export interface KernelInspection {
    structs: string[];
    bindings: InspectedBinding[];
    entryPoints: InspectedEntryPoint[];
    /** Called function names, in order of appearance */
    calls: string[];
}

const STRUCT_DECL = /\bstruct\s+([A-Za-z_]\w*)\s*\{/g;
const STORAGE_BINDING =
    /@group\((\d+)\)\s*@binding\((\d+)\)\s*var<storage(?:\s*,\s*(read|read_write))?>\s+([A-Za-z_]\w*)\s*:\s*([^;]+?)\s*;/g;
const COMPUTE_ENTRY = /@compute\s+@workgroup_size\(([^)]*)\)\s*fn\s+([A-Za-z_]\w*)\s*\(/g;
// Identifier followed by `(`, but not an attribute (`@binding(`) or a declaration (`fn main(`)
const CALL = /(?<![@\w])(?<!\bfn\s+)([A-Za-z_]\w*)\s*\(/g;

function parseWorkgroupSize(args: string): WorkgroupSize {
    const [x = 1, y = 1, z = 1] = args
        .split(',')
        .map((arg) => arg.trim())
        .filter((arg) => arg.length > 0)
        .map((arg) => Number.parseInt(arg, 10));
    return [x, y, z];
}

export function inspectKernelSource(code: string): KernelInspection {
    const structs = [...code.matchAll(STRUCT_DECL)].map((m) => m[1] ?? '');

    const bindings = [...code.matchAll(STORAGE_BINDING)].map((m): InspectedBinding => ({
        group: Number(m[1]),
        binding: Number(m[2]),
        // var<storage> without an access mode is read-only
        access: m[3] === 'read_write' ? 'read_write' : 'read',
        name: m[4] ?? '',
        type: m[5] ?? '',
    }));

    const entryPoints = [...code.matchAll(COMPUTE_ENTRY)].map((m): InspectedEntryPoint => ({
        stage: 'compute',
        name: m[2] ?? '',
        workgroupSize: parseWorkgroupSize(m[1] ?? ''),
    }));

    const calls = [...code.matchAll(CALL)].map((m) => m[1] ?? '');

    return { structs, bindings, entryPoints, calls };
}

/**
 * Structural problems of a map kernel; empty when it matches its own metadata
 */
export function verifyMapKernel(kernel: KernelSource): string[] {
    const problems: string[] = [];
    const { bindings, entryPoints, calls } = inspectKernelSource(kernel.code);
    const [input, output] = kernel.bindings;

    if (bindings.length !== 2) {
        problems.push(`expected 2 storage bindings, found ${bindings.length}`);
    }

    const slot0 = bindings.filter((b) => b.group === 0 && b.binding === 0);
    if (slot0.length !== 1 || slot0[0]?.access !== 'read' || slot0[0]?.name !== input.name) {
        problems.push(`binding 0 must be a single read-only buffer named '${input.name}'`);
    }

    const slot1 = bindings.filter((b) => b.group === 0 && b.binding === 1);
    if (slot1.length !== 1 || slot1[0]?.access !== 'read_write' || slot1[0]?.name !== output.name) {
        problems.push(`binding 1 must be a single writable buffer named '${output.name}'`);
    }

    const entry = entryPoints[0];
    if (entryPoints.length !== 1 || !entry) {
        problems.push(`expected 1 compute entry point, found ${entryPoints.length}`);
    } else {
        if (entry.name !== kernel.entryPoint) {
            problems.push(`entry point is '${entry.name}', expected '${kernel.entryPoint}'`);
        }
        if (entry.workgroupSize.join(',') !== kernel.workgroupSize.join(',')) {
            problems.push(
                `workgroup size is (${entry.workgroupSize.join(', ')}), expected (${kernel.workgroupSize.join(', ')})`
            );
        }
    }

    if (calls.length !== 1 || calls[0] !== kernel.opType) {
        problems.push(`body must call '${kernel.opType}' once, found [${calls.join(', ')}]`);
    }

    return problems;
}
