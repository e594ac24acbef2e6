import type { ArrayVectorLayout } from "./layout";

/**
 * Name of a unary function `(vecN) -> vecN` resolvable in the shader.
 * Builtins (`abs`, `exp`, ...) or anything the host links in alongside.
 */
export type UnaryOpType = string;

/**
 * Binding access as the kernel uses it.
 * WGSL has no write-only storage buffers, so `write` is emitted as `read_write`.
 */
export type BufferAccess = 'read' | 'write';

export interface BufferBinding {
    readonly group: number;
    readonly binding: number;
    readonly name: string;
    readonly access: BufferAccess;
}

export type WorkgroupSize = readonly [x: number, y: number, z: number];

export type DispatchSize = readonly [x: number, y: number, z: number];

/**
 * A generated single-entry compute program.
 * Immutable once built: the generator freezes it.
 */
export interface KernelSource {
    readonly code: string;
    readonly entryPoint: string;
    readonly workgroupSize: WorkgroupSize;
    readonly bindings: readonly [input: BufferBinding, output: BufferBinding];
    readonly opType: UnaryOpType;
    readonly layout: ArrayVectorLayout;
}

export interface MapKernelOptions {
    /** Defaults to (1, 1, 1): one invocation per workgroup */
    workgroupSize?: WorkgroupSize;
    layout?: ArrayVectorLayout;
    /** Defaults to `main` */
    entryPoint?: string;
}
