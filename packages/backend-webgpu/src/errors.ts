// ============================================================================
// Errors
// ============================================================================

/**
 * Base class for failures while lowering a graph node into a kernel
 */
export class KernelCompileError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'KernelCompileError';
    }
}

/**
 * A node references a value the shape table does not know
 */
export class ShapeNotFoundError extends KernelCompileError {
    readonly valueName: string;

    constructor(valueName: string) {
        super(`${valueName} not found`);
        this.name = 'ShapeNotFoundError';
        this.valueName = valueName;
    }
}

/**
 * No template is registered for the node's operator
 */
export class UnsupportedOperatorError extends KernelCompileError {
    readonly opType: string;

    constructor(opType: string) {
        super(`Unsupported operator '${opType}': no kernel template registered`);
        this.name = 'UnsupportedOperatorError';
        this.opType = opType;
    }
}

/**
 * An array-vector layout that cannot be emitted as a WGSL struct
 */
export class LayoutSchemaError extends Error {
    constructor(reason: string) {
        super(`Invalid array-vector layout: ${reason}`);
        this.name = 'LayoutSchemaError';
    }
}
