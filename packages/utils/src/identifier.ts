/**
 * Characters graph value names may carry that cannot appear in a WGSL identifier
 * (`(` `)` `,` `"` `.` `;` `:` `'` `/`). They are dropped, not replaced.
 */
const STRIPPED_CHARS = /[(),".;:'/]/g;

/**
 * Turn a graph value name into the buffer name used in generated WGSL.
 *
 * @example sanitizeIdentifier('conv1/out:0') === 'conv1out0'
 */
export function sanitizeIdentifier(name: string): string {
    return name.replace(STRIPPED_CHARS, '');
}

const WGSL_IDENTIFIER = /^([a-zA-Z][0-9a-zA-Z_]*|_[0-9a-zA-Z_]+)$/;

/**
 * Whether `name` is a syntactically valid WGSL identifier.
 * Reserved words are not checked.
 */
export function isWgslIdentifier(name: string): boolean {
    return WGSL_IDENTIFIER.test(name) && !name.startsWith('__');
}
