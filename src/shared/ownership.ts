/**
 * How an accessor or combinator takes the payload:
 * - `mut`: mutable borrow; the container keeps ownership
 * - `const`: read-only borrow
 * - `move`: the payload is handed over and the container becomes moved-from
 * - `const-move`: a move out of a read-only container, which can only borrow
 */
export type Ownership = 'mut' | 'const' | 'move' | 'const-move'

export type MutableAccess = 'mut' | 'move'
export type ConstAccess = 'const' | 'const-move'

export type ConvertMode = 'copy' | 'move'

export const consumes = (access: Ownership): boolean => access === 'move'
