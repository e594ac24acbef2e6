import type { DispatchSize, KernelSource } from "./kernel";

/**
 * One operator node of a model graph, as handed to the compiler.
 * Values are referenced by name; `shapes` below resolves them.
 */
export interface OperatorNode {
    readonly opType: string;
    readonly inputs: readonly string[];
    readonly outputs: readonly string[];
    /** Diagnostic only */
    readonly name?: string;
}

export type Dims = readonly number[];

export type ShapeTable = ReadonlyMap<string, Dims>;

/**
 * Everything the compiler resolved for a node before template lowering
 */
export interface LoweringContext {
    readonly node: OperatorNode;
    /** Sanitized input names */
    readonly inputs: readonly string[];
    /** Sanitized output names */
    readonly outputs: readonly string[];
    readonly inputDims: readonly Dims[];
    readonly outputDims: readonly Dims[];
    readonly inputLengths: readonly number[];
    readonly outputLengths: readonly number[];
}

export interface CompiledKernel {
    readonly kernel: KernelSource;
    readonly dispatch: DispatchSize;
}
