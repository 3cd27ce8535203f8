import type { Allocator, Storage } from './types.js'
import type { TrapHandler } from '../trap/types.js'
import { createStorage } from './storage.js'
import { loadConfig } from '../shared/config.js'
import { scopedLogger } from '../shared/logger.js'

const log = scopedLogger('allocator')

export type AllocatorOptions = {
  // Largest block handed out; defaults to ALLOCATOR_MAX_CELLS
  maxCells?: number
  trap?: TrapHandler
}

export const createDefaultAllocator = <T>(options: AllocatorOptions = {}): Allocator<T> => {
  const maxCells = options.maxCells ?? loadConfig().allocator.maxCells

  const allocate = (count: number): Storage<T>[] | null => {
    if (!Number.isInteger(count) || count < 0 || count > maxCells) {
      log().debug(`Refusing a block of ${count} cells (limit ${maxCells})`)
      return null
    }
    return Array.from({ length: count }, () => createStorage<T>(options.trap))
  }

  const deallocate = (block: Storage<T>[] | null, count: number): void => {
    if (block === null) return
    if (block.length !== count) {
      log().warn(`Releasing a block of ${block.length} cells as ${count}`)
    }
    block.length = 0
  }

  return {
    allocate,
    deallocate
  }
}
