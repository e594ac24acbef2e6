/**
 * Generator configuration
 *
 * Defaults, overridable from the environment and then from explicit options.
 */

import type { WorkgroupSize } from '@kernloom/types';
import { LogLevel, parseLogLevel } from '@kernloom/utils';

export const KERNEL_GEN_DEFAULTS = {
    /** One invocation per workgroup */
    WORKGROUP_SIZE: [1, 1, 1],
    LOG_LEVEL: LogLevel.WARN,
    OUTPUT_DIR: 'generated/kernels',
} as const;

export interface KernelGenConfig {
    readonly workgroupSize: WorkgroupSize;
    readonly logLevel: LogLevel;
    readonly outputDir: string;
}

export type KernelGenEnv = Readonly<Record<string, string | undefined>>;

/**
 * Parse `64` or `64,1,1` into a workgroup size. Missing y/z default to 1.
 */
export function parseWorkgroupSize(value: string | undefined): WorkgroupSize | undefined {
    if (!value) return undefined;
    const parts = value.split(',').map((part) => part.trim());
    if (parts.length > 3) {
        throw new Error(`Invalid workgroup size '${value}': at most three dimensions`);
    }
    const dims = parts.map((part) => Number(part));
    if (dims.some((dim) => !Number.isInteger(dim) || dim < 1)) {
        throw new Error(`Invalid workgroup size '${value}': dimensions must be positive integers`);
    }
    const [x, y = 1, z = 1] = dims;
    if (x === undefined) return undefined;
    return [x, y, z];
}

/**
 * Merge defaults, `KERNLOOM_LOG_LEVEL` / `KERNLOOM_WORKGROUP_SIZE` / `KERNLOOM_OUTPUT_DIR`,
 * and `overrides`, later sources winning.
 */
export function resolveKernelGenConfig(
    overrides: Partial<KernelGenConfig> = {},
    env: KernelGenEnv = process.env
): KernelGenConfig {
    return {
        workgroupSize:
            overrides.workgroupSize
            ?? parseWorkgroupSize(env.KERNLOOM_WORKGROUP_SIZE)
            ?? KERNEL_GEN_DEFAULTS.WORKGROUP_SIZE,
        logLevel:
            overrides.logLevel
            ?? parseLogLevel(env.KERNLOOM_LOG_LEVEL)
            ?? KERNEL_GEN_DEFAULTS.LOG_LEVEL,
        outputDir:
            overrides.outputDir
            ?? (env.KERNLOOM_OUTPUT_DIR || undefined)
            ?? KERNEL_GEN_DEFAULTS.OUTPUT_DIR,
    };
}
