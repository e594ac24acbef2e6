/**
 * Map Kernel Registration
 */

import type { CompiledKernel, ITemplateRegistry, LoweringContext, MapKernelOptions } from '@kernloom/types';
import { computeMapDispatch, detectAliasing, Logger, MAX_WORKGROUPS_PER_DIMENSION } from '@kernloom/utils';
import { DEFAULT_ARRAY_VECTOR_LAYOUT, getVectorLanes } from '../../shader/ArrayVectorLayout';
import { KernelSourceCache, mapKernelKey } from '../../pipelines/KernelSourceCache';
import { DEFAULT_WORKGROUP_SIZE, generateMapKernel } from './shaderBuilder';
import { UNARY_MAP_OPS, toWgslUnaryFunction } from './ops';

export { generateMapKernel, DEFAULT_WORKGROUP_SIZE, DEFAULT_ENTRY_POINT } from './shaderBuilder';
export { UNARY_MAP_OPS, isUnaryMapOp, toWgslUnaryFunction } from './ops';
export type { UnaryMapOpConfig } from './types';

const logger = new Logger('Map-Kernel');

/**
 * Lower a unary node: first input -> first output through `fn`
 */
export function lowerMapNode(ctx: LoweringContext, options: MapKernelOptions): CompiledKernel {
    const inputName = ctx.inputs[0];
    const outputName = ctx.outputs[0];
    const outputLength = ctx.outputLengths[0];
    if (inputName === undefined || outputName === undefined || outputLength === undefined) {
        throw new Error(`Map operator '${ctx.node.opType}' needs one input and one output`);
    }

    const fn = toWgslUnaryFunction(ctx.node.opType);
    const key = mapKernelKey(inputName, outputName, fn, options);
    const kernel = KernelSourceCache.getOrCreate(key, () =>
        generateMapKernel(inputName, outputName, fn, options)
    );

    const [input, output] = kernel.bindings;
    if (detectAliasing(input, output)) {
        // Same buffer read and written: still generated, invocation order is undefined
        logger.warn(`'${ctx.node.name ?? outputName}' reads and writes buffer '${inputName}'; invocation order is undefined`);
    }

    const lanes = getVectorLanes((options.layout ?? DEFAULT_ARRAY_VECTOR_LAYOUT).elementType);
    const dispatch = computeMapDispatch(outputLength, lanes, options.workgroupSize ?? DEFAULT_WORKGROUP_SIZE);
    if (dispatch[0] > MAX_WORKGROUPS_PER_DIMENSION) {
        logger.warn(`${fn} ${inputName} -> ${outputName}: ${dispatch[0]} workgroups exceed the default per-dimension limit of ${MAX_WORKGROUPS_PER_DIMENSION}`);
    }

    return { kernel, dispatch };
}

/**
 * Register every unary map operator
 */
export function registerMapTemplates(registry: ITemplateRegistry): void {
    for (const opType of Object.keys(UNARY_MAP_OPS)) {
        registry.register(opType, lowerMapNode);
    }
}
