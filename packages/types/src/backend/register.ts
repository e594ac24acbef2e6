import type { LoweringContext, CompiledKernel } from "../graph";
import type { MapKernelOptions } from "../kernel";

/**
 * Lowers a resolved graph node into a kernel and its dispatch size
 */
export type TemplateImpl = (
    ctx: LoweringContext,
    options: MapKernelOptions
) => CompiledKernel;

export interface ITemplateRegistry {
    /**
     * Register the lowering for a graph operator name
     */
    register(opType: string, impl: TemplateImpl): void;

    /**
     * Find a registered lowering
     */
    find(opType: string): TemplateImpl | undefined;

    /**
     * Check if an operator name is registered
     */
    has(opType: string): boolean;

    /**
     * Registered operator names, in registration order
     */
    keys(): string[];
}
