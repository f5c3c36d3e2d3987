/**
 * Search Engine Abstraction Layer
 *
 * Provides a common interface over the search algorithms so callers such as
 * the game-manager agent can pick one by name.
 */

import type { Board, Color, Move } from '../game/othello'
import type { EvalWeights, EvaluationKind } from './evaluation'
import type { DepthLimit } from './search'

// ============================================================================
// CORE TYPES
// ============================================================================

/**
 * Configuration passed to engines for move selection.
 */
export interface EngineConfig {
  /** Plies to search, or 'unbounded' */
  depthLimit: DepthLimit
  /** Reuse node values through a per-search transposition cache */
  caching: boolean
  /** Sort successors before searching them (alpha-beta only) */
  ordering: boolean
  /** Leaf evaluator */
  evaluation: EvaluationKind
  /** Optional heuristic weights */
  weights?: EvalWeights
}

/**
 * Search statistics for debugging and analysis.
 */
export interface SearchInfo {
  /** Depth limit the search ran with */
  depthLimit: DepthLimit
  /** Number of nodes entered */
  nodesSearched: number
  /** Number of pruning cutoffs */
  cutoffs: number
  /** Number of transposition cache hits */
  cacheHits: number
  /** Time spent on move selection (ms) */
  timeUsed: number
}

/**
 * Result returned from move selection.
 */
export interface MoveResult {
  /** Selected move, or null when there is nothing to play */
  move: Move | null
  /** Search value from the mover's point of view */
  value: number
  searchInfo: SearchInfo
}

/**
 * Pluggable search engine interface.
 *
 * Engines are stateless: every selectMove call starts from a fresh cache.
 */
export interface SearchEngine {
  /** Unique engine identifier */
  readonly name: EngineType

  /** Human-readable description */
  readonly description: string

  /**
   * Select the best move for the given position.
   *
   * @param board - Current board state
   * @param color - Color to move
   * @param config - Engine configuration
   */
  selectMove(board: Board, color: Color, config: EngineConfig): MoveResult

  /**
   * Evaluate the position statically from the perspective of `color`.
   */
  evaluatePosition(board: Board, color: Color, config?: Partial<EngineConfig>): number

  /**
   * Generate a human-readable explanation for a move.
   *
   * @param board - Board state before the move
   * @param move - Move that was played
   * @param color - Color that played it
   */
  explainMove?(board: Board, move: Move, color: Color): string
}

/**
 * Supported engine types.
 */
export type EngineType =
  | 'minimax' // Exhaustive minimax to the depth limit
  | 'alphabeta' // Minimax with alpha-beta pruning and optional move ordering

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  depthLimit: 4,
  caching: false,
  ordering: false,
  evaluation: 'exact',
}

// ============================================================================
// ENGINE REGISTRY
// ============================================================================

/**
 * Registry for search engines.
 * Provides lookup by name with fallback to the default engine.
 */
export class EngineRegistry {
  private engines: Map<string, SearchEngine> = new Map()
  private defaultEngineName: string | null = null

  /**
   * Register an engine. The first registered engine becomes the default.
   */
  register(engine: SearchEngine): void {
    this.engines.set(engine.name, engine)

    if (this.defaultEngineName === null) {
      this.defaultEngineName = engine.name
    }
  }

  /**
   * Get an engine by name.
   *
   * @returns Engine instance or null if not found
   */
  get(name: string): SearchEngine | null {
    return this.engines.get(name) ?? null
  }

  /**
   * Get an engine by name with fallback to the default.
   *
   * @throws Error if no engines are registered
   */
  getWithFallback(name: string): SearchEngine {
    const engine = this.engines.get(name)
    if (engine) {
      return engine
    }

    const fallback = this.getDefault()
    if (fallback) {
      console.warn(`Engine "${name}" not registered, falling back to "${fallback.name}"`)
      return fallback
    }

    throw new Error('No search engines registered')
  }

  /**
   * Set the default engine.
   *
   * @throws Error if engine not registered
   */
  setDefault(name: string): void {
    if (!this.engines.has(name)) {
      throw new Error(`Engine "${name}" not registered`)
    }
    this.defaultEngineName = name
  }

  getDefault(): SearchEngine | null {
    if (this.defaultEngineName === null) return null
    return this.get(this.defaultEngineName)
  }

  list(): Array<{ name: string; description: string }> {
    return Array.from(this.engines.values()).map((engine) => ({
      name: engine.name,
      description: engine.description,
    }))
  }

  has(name: string): boolean {
    return this.engines.has(name)
  }
}

// Global engine registry instance
export const engineRegistry = new EngineRegistry()
