/**
 * WebGPU kernel generation
 *
 * Map-kernel templates, the layout schema they bind to, and the compiler
 * that lowers graph nodes onto them.
 */

export * from './kernels';
export * from './errors';
export * from './config';
export { compileNode } from './compiler/compileNode';
export type { CompileOptions } from './compiler/compileNode';
export { KernelSourceCache, mapKernelKey } from './pipelines/KernelSourceCache';
export {
    DEFAULT_ARRAY_VECTOR_LAYOUT,
    defineArrayVectorLayout,
    generateLayoutStruct,
    getVectorLanes,
} from './shader/ArrayVectorLayout';
export { inspectKernelSource, verifyMapKernel } from './shader/inspect';
export type {
    InspectedBinding,
    InspectedEntryPoint,
    KernelInspection,
    StorageAccessMode,
} from './shader/inspect';
