import { describe, it, expect } from 'vitest'
import { createDefaultAllocator } from './allocator.js'
import { throwTrap } from '../trap/trap.js'

describe('createDefaultAllocator', () => {
  const allocator = createDefaultAllocator<number>({ maxCells: 4, trap: throwTrap })

  it('hands out empty cells', () => {
    const block = allocator.allocate(3)

    expect(block).toHaveLength(3)
    expect(block?.every((cell) => !cell.isConstructed())).toBe(true)
  })

  it('allows an empty block', () => {
    expect(allocator.allocate(0)).toEqual([])
  })

  it('returns null for requests it cannot meet', () => {
    expect(allocator.allocate(5)).toBeNull()
    expect(allocator.allocate(-1)).toBeNull()
    expect(allocator.allocate(1.5)).toBeNull()
    expect(allocator.allocate(Number.NaN)).toBeNull()
  })

  it('releases blocks and ignores null', () => {
    const block = allocator.allocate(2)

    allocator.deallocate(block, 2)
    allocator.deallocate(null, 0)

    expect(block).toEqual([])
  })

  it('reads its limit from configuration by default', () => {
    // ALLOCATOR_MAX_CELLS is unset in the test environment
    const fromConfig = createDefaultAllocator<number>({ trap: throwTrap })

    expect(fromConfig.allocate(1_048_577)).toBeNull()
  })
})
