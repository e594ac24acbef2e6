/**
 * Map Kernel Emitter
 *
 * Writes one `.wgsl` file per unary map operator, verified before writing.
 *
 * Run: npx tsx scripts/kernels [outputDir]
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import {
    UNARY_MAP_OPS,
    generateMapKernel,
    resolveKernelGenConfig,
    toWgslUnaryFunction,
    verifyMapKernel,
} from '@kernloom/backend-webgpu';
import type { WorkgroupSize } from '@kernloom/types';
import { Logger, setGlobalLogLevel } from '@kernloom/utils';

const logger = new Logger('Kernel-Emitter');

export interface EmitResult {
    written: string[];
    failed: string[];
}

export function emitMapKernels(outputDir: string, workgroupSize: WorkgroupSize): EmitResult {
    fs.mkdirSync(outputDir, { recursive: true });

    const result: EmitResult = { written: [], failed: [] };
    for (const opType of Object.keys(UNARY_MAP_OPS)) {
        const fn = toWgslUnaryFunction(opType);
        const kernel = generateMapKernel('input_0', 'output_0', fn, { workgroupSize });

        const problems = verifyMapKernel(kernel);
        if (problems.length > 0) {
            logger.error(`${opType}: ${problems.join('; ')}`);
            result.failed.push(opType);
            continue;
        }

        const file = path.join(outputDir, `${fn}.wgsl`);
        fs.writeFileSync(file, kernel.code);
        logger.info(`${opType} -> ${file}`);
        result.written.push(file);
    }
    return result;
}

function main(): void {
    const config = resolveKernelGenConfig(
        process.argv[2] ? { outputDir: process.argv[2] } : {}
    );
    setGlobalLogLevel(config.logLevel);

    const outputDir = path.resolve(process.cwd(), config.outputDir);
    const { written, failed } = emitMapKernels(outputDir, config.workgroupSize);

    console.log(`Wrote ${written.length} kernels to ${outputDir}`);
    if (failed.length > 0) {
        console.error(`Failed: ${failed.join(', ')}`);
        process.exitCode = 1;
    }
}

// ESM-compatible entry check
const __filename_esm = fileURLToPath(import.meta.url);
const invokedPath = process.argv[1] ? path.resolve(process.argv[1]) : '';
if (invokedPath === __filename_esm || invokedPath === path.dirname(__filename_esm)) {
    main();
}
