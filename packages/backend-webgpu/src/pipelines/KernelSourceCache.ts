import type { KernelSource, MapKernelOptions } from '@kernloom/types';
import { Logger } from '@kernloom/utils';
import { DEFAULT_ARRAY_VECTOR_LAYOUT } from '../shader/ArrayVectorLayout';
import { DEFAULT_ENTRY_POINT, DEFAULT_WORKGROUP_SIZE } from '../kernels/map/shaderBuilder';

const logger = new Logger('Kernel-Cache');

/**
 * Cache key for a map kernel: every input of the template, JSON-encoded so
 * names containing separators cannot collide.
 *
 * e.g. map:["abs","x","y",[1,1,1],"ArrayVector","data","vec4<f32>",1,"main"]
 */
export function mapKernelKey(
    inputName: string,
    outputName: string,
    opType: string,
    options: MapKernelOptions = {}
): string {
    const [x, y, z] = options.workgroupSize ?? DEFAULT_WORKGROUP_SIZE;
    const layout = options.layout ?? DEFAULT_ARRAY_VECTOR_LAYOUT;
    const entry = options.entryPoint ?? DEFAULT_ENTRY_POINT;
    return `map:${JSON.stringify([
        opType,
        inputName,
        outputName,
        [x, y, z],
        layout.structName,
        layout.fieldName,
        layout.elementType,
        layout.version,
        entry,
    ])}`;
}

/**
 * Process-wide store of generated kernels.
 * A key is generated once; later lookups return the same frozen object.
 */
export class KernelSourceCache {

    private static sources: Map<string, KernelSource> = new Map<string, KernelSource>();

    static get(key: string): KernelSource | undefined {
        return KernelSourceCache.sources.get(key);
    }

    static has(key: string): boolean {
        return KernelSourceCache.sources.has(key);
    }

    static getOrCreate(key: string, factory: () => KernelSource): KernelSource {
        const cached = KernelSourceCache.sources.get(key);
        if (cached) {
            return cached;
        }

        const source = factory();
        KernelSourceCache.sources.set(key, source);
        logger.debug(`Generated ${key}`);
        return source;
    }

    static size(): number {
        return KernelSourceCache.sources.size;
    }

    static clear(): void {
        KernelSourceCache.sources.clear();
    }
}
