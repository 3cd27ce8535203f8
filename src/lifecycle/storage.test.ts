import { describe, it, expect } from 'vitest'
import { createStorage, isStorage } from './storage.js'
import { isContractViolation, throwTrap } from '../trap/trap.js'
import type { ViolationKind } from '../trap/types.js'

const violationKind = (action: () => unknown): ViolationKind | undefined => {
  try {
    action()
  } catch (error) {
    if (isContractViolation(error)) return error.violation.kind
    throw error
  }
  return undefined
}

class Resource {
  disposed = 0

  dispose(): void {
    this.disposed += 1
  }
}

describe('createStorage', () => {
  it('starts empty', () => {
    const storage = createStorage<number>(throwTrap)

    expect(storage.isConstructed()).toBe(false)
    expect(isStorage(storage)).toBe(true)
    expect(violationKind(() => storage.get())).toBe('storage-empty')
    expect(violationKind(() => storage.dispose())).toBe('storage-empty')
  })

  it('holds the constructed value', () => {
    const storage = createStorage<string>(throwTrap)
    storage.emplace('cell')

    expect(storage.isConstructed()).toBe(true)
    expect(storage.get()).toBe('cell')
  })

  it('rejects a second construction', () => {
    const storage = createStorage<string>(throwTrap)
    storage.emplace('first')

    expect(violationKind(() => storage.emplace('second'))).toBe('storage-occupied')
    expect(storage.get()).toBe('first')
  })

  it('destroys the occupant once and cannot be reused', () => {
    const resource = new Resource()
    const storage = createStorage<Resource>(throwTrap)
    storage.emplace(resource)
    storage.dispose()

    expect(resource.disposed).toBe(1)
    expect(storage.isConstructed()).toBe(false)
    expect(violationKind(() => storage.get())).toBe('storage-destroyed')
    expect(violationKind(() => storage.dispose())).toBe('storage-destroyed')
    expect(violationKind(() => storage.emplace(new Resource()))).toBe('storage-destroyed')
    expect(resource.disposed).toBe(1)
  })
})
