/**
 * Map Kernel Types
 */

/**
 * One graph operator lowered through the map template
 */
export interface UnaryMapOpConfig {
    /**
     * WGSL function called on each vector, e.g. `abs`.
     * Must accept and return the layout's vector type.
     */
    fn: string;
}
