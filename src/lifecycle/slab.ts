import type { Allocator, Slab, SlabError, SlabHandle, Storage } from './types.js'
import type { Result } from '../result/types.js'
import type { Status } from '../status/types.js'
import type { TrapHandler } from '../trap/types.js'
import type { CopySupported, DefaultStrictness, Require } from '../strictness/types.js'
import { createResults } from '../result/constructors.js'
import { createStatuses } from '../status/status.js'
import { createDefaultAllocator } from './allocator.js'
import { createStorage } from './storage.js'
import { copyAt } from './construct.js'
import { duplicate } from './payload.js'
import { defaultTrap } from '../trap/trap.js'
import { scopedLogger } from '../shared/logger.js'

const log = scopedLogger('slab')

export type SlabOptions<T> = {
  capacity: number
  allocator?: Allocator<T>
  trap?: TrapHandler
}

/**
 * Slab of `capacity` cells. Values are copied in on insert and copied out on
 * get; the slab alone owns what it holds.
 */
export const createSlab = <T>(
  options: SlabOptions<T>,
  ..._gate: Require<CopySupported<T, DefaultStrictness>>
): Result<Slab<T>, SlabError> => {
  const trap = options.trap ?? defaultTrap()
  const results = createResults({ trap })
  const statuses = createStatuses({ trap })
  const allocator = options.allocator ?? createDefaultAllocator<T>({ trap })
  const { capacity } = options

  const cells = allocator.allocate(capacity)
  if (cells === null) {
    log().warn(`Could not allocate ${capacity} cells`)
    return results.error<SlabError, Slab<T>>({ kind: 'allocation-failed', capacity })
  }

  // Lowest handle first
  const free: SlabHandle[] = []
  for (let handle = capacity - 1; handle >= 0; handle -= 1) {
    free.push(handle)
  }
  let live = 0

  const occupied = (handle: SlabHandle): Storage<T> | undefined => {
    const cell = Number.isInteger(handle) ? cells[handle] : undefined
    return cell?.isConstructed() ? cell : undefined
  }

  const insert = (value: T): Result<SlabHandle, SlabError> => {
    const handle = free.at(-1)
    const cell = handle === undefined ? undefined : cells[handle]
    if (handle === undefined || cell === undefined) {
      return results.error<SlabError, SlabHandle>({ kind: 'full', capacity })
    }
    copyAt(cell, value)
    // Claimed only once the copy is in place
    free.pop()
    live += 1
    return results.ok<SlabHandle, SlabError>(handle)
  }

  const get = (handle: SlabHandle): Result<T, SlabError> => {
    const cell = occupied(handle)
    if (!cell) {
      return results.error<SlabError, T>({ kind: 'invalid-handle', handle })
    }
    return results.ok<T, SlabError>(duplicate(cell.get()))
  }

  const remove = (handle: SlabHandle): Status<SlabError> => {
    const cell = occupied(handle)
    if (!cell) {
      return statuses.from<SlabError>({ kind: 'invalid-handle', handle })
    }
    cell.dispose()
    // Cells are single-use; a fresh one takes the slot
    cells[handle] = createStorage<T>(trap)
    free.push(handle)
    live -= 1
    return statuses.ok<SlabError>()
  }

  const dispose = (): void => {
    for (const cell of cells) {
      if (cell.isConstructed()) cell.dispose()
    }
    allocator.deallocate(cells, capacity)
    free.length = 0
    live = 0
  }

  return results.ok<Slab<T>, SlabError>({
    capacity,
    size: () => live,
    insert,
    get,
    remove,
    dispose
  })
}
