import { describe, it, expect } from 'vitest'
import { createSlab } from './slab.js'
import { createDefaultAllocator } from './allocator.js'
import type { Slab } from './types.js'
import { throwTrap } from '../trap/trap.js'

class Lease {
  constructor(
    readonly id: string,
    readonly released: string[]
  ) {}

  clone(): Lease {
    return new Lease(`${this.id}-copy`, this.released)
  }

  dispose(): void {
    this.released.push(this.id)
  }
}

class Resource {
  disposed = 0

  dispose(): void {
    this.disposed += 1
  }
}

class Fragile {
  constructor(readonly broken: boolean) {}

  clone(): Fragile {
    if (this.broken) throw new Error('copy failed')
    return new Fragile(false)
  }
}

const openSlab = (capacity: number): Slab<string> =>
  createSlab<string>({ capacity, trap: throwTrap }).value()

describe('createSlab', () => {
  it('fails when the allocator cannot supply the cells', () => {
    const allocator = createDefaultAllocator<string>({ maxCells: 1, trap: throwTrap })
    const result = createSlab<string>({ capacity: 2, allocator, trap: throwTrap })

    expect(result.hasValue()).toBe(false)
    expect(result.error()).toEqual({ kind: 'allocation-failed', capacity: 2 })
  })

  it('only holds payloads it can copy', () => {
    // @ts-expect-error Resource has dispose() and no clone()
    const result = createSlab<Resource>({ capacity: 1, trap: throwTrap })

    expect(result.hasValue()).toBe(true)
  })

  it('stores values under the lowest free handle', () => {
    const slab = openSlab(2)

    expect(slab.insert('a').value()).toBe(0)
    expect(slab.insert('b').value()).toBe(1)
    expect(slab.size()).toBe(2)
    expect(slab.get(1).value()).toBe('b')
  })

  it('reports a full slab', () => {
    const slab = openSlab(1)
    slab.insert('a')

    expect(slab.insert('b').error()).toEqual({ kind: 'full', capacity: 1 })
  })

  it('copies plain data on insert and on get', () => {
    const slab = createSlab<{ n: number }>({ capacity: 1, trap: throwTrap }).value()
    const original = { n: 1 }
    const handle = slab.insert(original).value()
    original.n = 2
    slab.get(handle).value().n = 3

    expect(slab.get(handle).value()).toEqual({ n: 1 })
  })

  it('keeps the handle when copying in fails', () => {
    const slab = createSlab<Fragile>({ capacity: 1, trap: throwTrap }).value()

    expect(() => slab.insert(new Fragile(true))).toThrow('copy failed')
    expect(slab.size()).toBe(0)
    expect(slab.insert(new Fragile(false)).value()).toBe(0)
  })

  it('reuses a removed handle', () => {
    const slab = openSlab(2)
    slab.insert('a')
    slab.insert('b')

    expect(slab.remove(0).ok()).toBe(true)
    expect(slab.size()).toBe(1)
    expect(slab.insert('c').value()).toBe(0)
    expect(slab.get(0).value()).toBe('c')
  })

  it('rejects handles that hold nothing', () => {
    const slab = openSlab(2)
    slab.insert('a')
    slab.remove(0)

    expect(slab.remove(0).error()).toEqual({ kind: 'invalid-handle', handle: 0 })
    expect(slab.get(1).error()).toEqual({ kind: 'invalid-handle', handle: 1 })
    expect(slab.get(7).error()).toEqual({ kind: 'invalid-handle', handle: 7 })
    expect(slab.get(0.5).error()).toEqual({ kind: 'invalid-handle', handle: 0.5 })
  })

  it('owns its copies and destroys each once', () => {
    const released: string[] = []
    const slab = createSlab<Lease>({ capacity: 2, trap: throwTrap }).value()
    const first = slab.insert(new Lease('r', released)).value()
    slab.insert(new Lease('k', released))

    slab.remove(first)
    expect(released).toEqual(['r-copy'])

    slab.dispose()
    expect(released).toEqual(['r-copy', 'k-copy'])
    expect(slab.size()).toBe(0)
  })

  it('hands out a copy that can be disposed on its own', () => {
    const released: string[] = []
    const slab = createSlab<Lease>({ capacity: 1, trap: throwTrap }).value()
    const handle = slab.insert(new Lease('g', released)).value()

    slab.get(handle).dispose()
    slab.dispose()

    expect(released).toEqual(['g-copy-copy', 'g-copy'])
  })
})
