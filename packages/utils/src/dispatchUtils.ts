/**
 * Dispatch Utilities
 *
 * Helpers for sizing and sanity-checking map-kernel dispatches
 */

import type { BufferBinding, DispatchSize, WorkgroupSize } from "@kernloom/types";
import { ceilDiv } from "./math";

/**
 * Default `maxComputeWorkgroupsPerDimension` of a WebGPU device
 */
export const MAX_WORKGROUPS_PER_DIMENSION = 65535;

/**
 * Workgroups needed so that every vector of the output gets one invocation.
 *
 * The vector count truncates (`floor(length / lanes)`): a trailing partial
 * vector is not covered, matching how outputs are laid out in whole vectors.
 * Only x is used; y and z stay 1.
 *
 * With a workgroup x size above 1 the last workgroup is padded: its extra
 * invocations index past the end of the buffer, and the kernel has no
 * bounds check to stop them.
 */
export function computeMapDispatch(
    outputLength: number,
    lanes: number,
    workgroupSize: WorkgroupSize
): DispatchSize {
    const vectors = Math.floor(outputLength / lanes);
    return [ceilDiv(vectors, workgroupSize[0]), 1, 1];
}

/**
 * Detect whether the read binding and the write binding name the same buffer.
 *
 * Aliased map kernels have no defined read/write ordering across invocations.
 */
export function detectAliasing(
    input: BufferBinding,
    output: BufferBinding
): boolean {
    return input.name === output.name;
}
