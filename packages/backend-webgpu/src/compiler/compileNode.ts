/**
 * Node Compiler
 *
 * Resolves a graph node against the shape table, then hands it to the
 * template registered for its operator.
 */

import type {
    CompiledKernel,
    Dims,
    ITemplateRegistry,
    LoweringContext,
    MapKernelOptions,
    OperatorNode,
    ShapeTable,
} from '@kernloom/types';
import { computeNumel, Logger, sanitizeIdentifier } from '@kernloom/utils';
import { createDefaultRegistry } from '../kernels';
import { ShapeNotFoundError, UnsupportedOperatorError } from '../errors';

const logger = new Logger('Kernel-Compiler');

let defaultRegistry: ITemplateRegistry | undefined;

function getDefaultRegistry(): ITemplateRegistry {
    defaultRegistry ??= createDefaultRegistry();
    return defaultRegistry;
}

export interface CompileOptions extends MapKernelOptions {
    /** Defaults to a registry holding every built-in template */
    registry?: ITemplateRegistry;
}

function resolveDims(names: readonly string[], shapes: ShapeTable): Dims[] {
    return names.map((name) => {
        const dims = shapes.get(name);
        if (!dims) {
            throw new ShapeNotFoundError(name);
        }
        return dims;
    });
}

/**
 * Lower one node into a kernel and its dispatch size
 */
export function compileNode(
    node: OperatorNode,
    shapes: ShapeTable,
    options: CompileOptions = {}
): CompiledKernel {
    const { registry = getDefaultRegistry(), ...kernelOptions } = options;

    const inputDims = resolveDims(node.inputs, shapes);
    const outputDims = resolveDims(node.outputs, shapes);

    const template = registry.find(node.opType);
    if (!template) {
        throw new UnsupportedOperatorError(node.opType);
    }

    const ctx: LoweringContext = {
        node,
        inputs: node.inputs.map(sanitizeIdentifier),
        outputs: node.outputs.map(sanitizeIdentifier),
        inputDims,
        outputDims,
        inputLengths: inputDims.map(computeNumel),
        outputLengths: outputDims.map(computeNumel),
    };

    const compiled = template(ctx, kernelOptions);
    logger.debug(`${node.opType} ${ctx.inputs.join(',')} -> ${ctx.outputs.join(',')} dispatch [${compiled.dispatch.join(', ')}]`);
    return compiled;
}
