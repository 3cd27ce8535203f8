export type {
  Allocator,
  Cloneable,
  Constructor,
  Destroyable,
  InPlaceCopy,
  InPlaceCreate,
  Slab,
  SlabError,
  SlabHandle,
  StatusLike,
  Storage,
} from './types.js'
export { createStorage, isStorage } from './storage.js'
export { constructAt, copyAt } from './construct.js'
export { destroyAt, duplicate, isDestroyable } from './payload.js'
export { createDefaultAllocator, type AllocatorOptions } from './allocator.js'
export { createSlab, type SlabOptions } from './slab.js'
