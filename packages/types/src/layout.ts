/**
 * Array-vector buffer layout
 *
 * The struct shape every map kernel binds its storage buffers to.
 * It is passed to the generator as data instead of being pulled in
 * from a shared include, so a kernel carries the layout it was built against.
 */

export type WgslScalarType = 'f32' | 'i32' | 'u32';

export type WgslVectorType =
    | `vec2<${WgslScalarType}>`
    | `vec3<${WgslScalarType}>`
    | `vec4<${WgslScalarType}>`;

export interface ArrayVectorLayout {
    /** Schema version, bumped whenever the emitted struct text changes */
    readonly version: number;
    /** WGSL struct name, e.g. `ArrayVector` */
    readonly structName: string;
    /** Name of the runtime-sized array member, e.g. `data` */
    readonly fieldName: string;
    readonly elementType: WgslVectorType;
}
