import type { Storage } from './types.js'
import type { TrapHandler } from '../trap/types.js'
import { defaultTrap } from '../trap/trap.js'
import { destroyAt } from './payload.js'
import { STORAGE } from '../shared/brands.js'

type Cell<T> =
  | { state: 'empty' }
  | { state: 'constructed'; value: T }
  | { state: 'destroyed' }

export const createStorage = <T>(trap: TrapHandler = defaultTrap()): Storage<T> => {
  let cell: Cell<T> = { state: 'empty' }

  const isConstructed = (): boolean => cell.state === 'constructed'

  const emplace = (value: T): void => {
    if (cell.state !== 'empty') {
      trap({
        kind: cell.state === 'destroyed' ? 'storage-destroyed' : 'storage-occupied',
        message: `Cannot construct into a ${cell.state} storage cell`,
      })
    }
    cell = { state: 'constructed', value }
  }

  const get = (): T => {
    if (cell.state === 'constructed') return cell.value
    return trap({
      kind: cell.state === 'destroyed' ? 'storage-destroyed' : 'storage-empty',
      message: `Cannot read a ${cell.state} storage cell`,
    })
  }

  const dispose = (): void => {
    if (cell.state !== 'constructed') {
      return trap({
        kind: cell.state === 'destroyed' ? 'storage-destroyed' : 'storage-empty',
        message: `Cannot destroy a ${cell.state} storage cell`,
      })
    }
    const occupant = cell.value
    cell = { state: 'destroyed' }
    destroyAt(occupant)
  }

  return {
    [STORAGE]: true,
    trap,
    isConstructed,
    emplace,
    get,
    dispose,
  }
}

export const isStorage = (value: unknown): value is Storage<unknown> =>
  typeof value === 'object' && value !== null && STORAGE in value
