/**
 * Transposition Cache
 *
 * Per-search memo of node values. A fresh cache is created for every
 * top-level move selection and passed down the recursion explicitly.
 *
 * Entries are keyed by node role, remaining depth and the exact board, so a
 * value is only reused in the same search context it was computed in. A board
 * first reached with little depth left never answers for a deeper visit.
 */

import { type Board, boardKey } from '../game/othello'

export type NodeRole = 'max' | 'min'

/**
 * How a stored value relates to the true node value.
 */
export enum BoundType {
  EXACT = 0, // Searched with the full window
  LOWER = 1, // Failed high (beta cutoff): true value >= stored
  UPPER = 2, // Failed low: true value <= stored
}

interface CacheEntry {
  value: number
  bound: BoundType
}

export interface CacheStats {
  size: number
  hits: number
  misses: number
  stores: number
}

/**
 * Classifies a fail-soft alpha-beta result against the window it was
 * searched with.
 */
export function classifyBound(value: number, alpha: number, beta: number): BoundType {
  if (value <= alpha) return BoundType.UPPER
  if (value >= beta) return BoundType.LOWER
  return BoundType.EXACT
}

export class TranspositionCache {
  private table: Map<string, CacheEntry> = new Map()
  private hits = 0
  private misses = 0
  private stores = 0

  private key(board: Board, role: NodeRole, depth: number): string {
    return `${role}:${depth}:${boardKey(board)}`
  }

  /**
   * Looks up a node. Exact entries always answer; bound entries answer only
   * when they already decide the cutoff for the (alpha, beta) window.
   *
   * @returns The cached value, or null on a miss
   */
  lookup(
    board: Board,
    role: NodeRole,
    depth: number,
    alpha = -Infinity,
    beta = Infinity
  ): number | null {
    const entry = this.table.get(this.key(board, role, depth))

    if (entry !== undefined) {
      switch (entry.bound) {
        case BoundType.EXACT:
          this.hits++
          return entry.value
        case BoundType.LOWER:
          if (entry.value >= beta) {
            this.hits++
            return entry.value
          }
          break
        case BoundType.UPPER:
          if (entry.value <= alpha) {
            this.hits++
            return entry.value
          }
          break
      }
    }

    this.misses++
    return null
  }

  /**
   * Stores a node value, replacing any entry for the same context.
   */
  store(
    board: Board,
    role: NodeRole,
    depth: number,
    value: number,
    bound: BoundType = BoundType.EXACT
  ): void {
    this.table.set(this.key(board, role, depth), { value, bound })
    this.stores++
  }

  get size(): number {
    return this.table.size
  }

  getStats(): CacheStats {
    return {
      size: this.table.size,
      hits: this.hits,
      misses: this.misses,
      stores: this.stores,
    }
  }
}
