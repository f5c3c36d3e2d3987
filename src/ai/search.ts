/**
 * Game-Tree Search
 *
 * Depth-limited minimax and alpha-beta search for Othello. Both algorithms
 * share one recursive procedure parameterized by node role:
 *
 * - max nodes: the root color moves and picks the highest value
 * - min nodes: the opponent moves and picks the lowest value
 *
 * Values are always measured from the root color's point of view. Among
 * equally good moves the first one in oracle order wins.
 */

import {
  type Board,
  type Color,
  type Move,
  applyMove,
  getLegalMoves,
  opponent,
} from '../game/othello'
import {
  type EvalWeights,
  type EvaluationKind,
  type Evaluator,
  computeUtility,
  getEvaluator,
} from './evaluation'
import { BoundType, type NodeRole, TranspositionCache, classifyBound } from './transposition'

// ============================================================================
// TYPES
// ============================================================================

/** Plies to search, or no limit at all. */
export type DepthLimit = number | 'unbounded'

export interface SearchOptions {
  /** Evaluator used at depth-limited leaves and for move ordering (default: exact) */
  evaluation?: EvaluationKind
  /** Heuristic weights, only used with the heuristic evaluator */
  weights?: EvalWeights
}

export interface SearchStats {
  /** Nodes entered, including cache hits */
  nodesVisited: number
  /** Leaves scored by an evaluator */
  leafEvaluations: number
  /** Sibling loops stopped early by alpha or beta */
  cutoffs: number
  cacheHits: number
  cacheMisses: number
  cacheStores: number
}

export interface SearchResult {
  /** Chosen move, or null when the side to act has no legal move */
  move: Move | null
  /** Value of the root from the acting color's point of view */
  value: number
  stats: SearchStats
}

interface NodeResult {
  move: Move | null
  value: number
}

interface Successor {
  move: Move
  board: Board
}

interface SearchContext {
  color: Color
  evaluate: Evaluator
  cache: TranspositionCache | null
  pruning: boolean
  ordering: boolean
  nodesVisited: number
  leafEvaluations: number
  cutoffs: number
}

// ============================================================================
// DEPTH HANDLING
// ============================================================================

/**
 * Converts a depth limit into a remaining-depth count. Infinity never reaches
 * zero, so an unbounded search only stops at boards with no legal move.
 *
 * @throws RangeError for negative or fractional limits
 */
export function toRemainingDepth(limit: DepthLimit): number {
  if (limit === 'unbounded') return Infinity
  if (!Number.isInteger(limit) || limit < 0) {
    throw new RangeError(`Depth limit must be a non-negative integer or 'unbounded', got ${limit}`)
  }
  return limit
}

// ============================================================================
// RECURSION
// ============================================================================

/**
 * Expands every legal move into its successor board, optionally sorted so
 * the most promising branch for the mover comes first. The sort is stable:
 * equal scores keep oracle order.
 */
function expand(ctx: SearchContext, board: Board, mover: Color, moves: Move[], role: NodeRole): Successor[] {
  const successors = moves.map((move) => ({ move, board: applyMove(board, mover, move) }))
  if (!ctx.ordering) return successors

  const scored = successors.map((s) => ({ ...s, score: ctx.evaluate(s.board, ctx.color) }))
  scored.sort((a, b) => (role === 'max' ? b.score - a.score : a.score - b.score))
  return scored
}

function searchNode(
  ctx: SearchContext,
  board: Board,
  role: NodeRole,
  depth: number,
  alpha: number,
  beta: number
): NodeResult {
  ctx.nodesVisited++

  if (ctx.cache) {
    const cached = ctx.cache.lookup(board, role, depth, alpha, beta)
    if (cached !== null) {
      return { move: null, value: cached }
    }
  }

  const maximizing = role === 'max'
  const mover = maximizing ? ctx.color : opponent(ctx.color)
  const moves = getLegalMoves(board, mover)

  // Leaf: the mover is stuck or the depth budget is spent
  if (moves.length === 0 || depth === 0) {
    const value =
      moves.length === 0 ? computeUtility(board, ctx.color) : ctx.evaluate(board, ctx.color)
    ctx.leafEvaluations++
    ctx.cache?.store(board, role, depth, value, BoundType.EXACT)
    return { move: null, value }
  }

  const childRole: NodeRole = maximizing ? 'min' : 'max'
  const windowAlpha = alpha
  const windowBeta = beta

  let bestMove: Move | null = null
  let bestValue = maximizing ? -Infinity : Infinity

  for (const successor of expand(ctx, board, mover, moves, role)) {
    const { value } = searchNode(ctx, successor.board, childRole, depth - 1, alpha, beta)

    if (maximizing ? value > bestValue : value < bestValue) {
      bestMove = successor.move
      bestValue = value
    }

    if (!ctx.pruning) continue

    if (maximizing) {
      if (bestValue >= beta) {
        ctx.cutoffs++
        break
      }
      alpha = Math.max(alpha, bestValue)
    } else {
      if (bestValue <= alpha) {
        ctx.cutoffs++
        break
      }
      beta = Math.min(beta, bestValue)
    }
  }

  const bound = ctx.pruning ? classifyBound(bestValue, windowAlpha, windowBeta) : BoundType.EXACT
  ctx.cache?.store(board, role, depth, bestValue, bound)

  return { move: bestMove, value: bestValue }
}

function runSearch(
  board: Board,
  color: Color,
  depth: number,
  flags: { caching: boolean; pruning: boolean; ordering: boolean },
  options: SearchOptions
): SearchResult {
  const ctx: SearchContext = {
    color,
    evaluate: getEvaluator(options.evaluation ?? 'exact', options.weights),
    cache: flags.caching ? new TranspositionCache() : null,
    pruning: flags.pruning,
    ordering: flags.ordering,
    nodesVisited: 0,
    leafEvaluations: 0,
    cutoffs: 0,
  }

  const root = searchNode(ctx, board, 'max', depth, -Infinity, Infinity)
  const cacheStats = ctx.cache?.getStats()

  return {
    move: root.move,
    value: root.value,
    stats: {
      nodesVisited: ctx.nodesVisited,
      leafEvaluations: ctx.leafEvaluations,
      cutoffs: ctx.cutoffs,
      cacheHits: cacheStats?.hits ?? 0,
      cacheMisses: cacheStats?.misses ?? 0,
      cacheStores: cacheStats?.stores ?? 0,
    },
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Plain minimax search. The root is searched with the full depth limit.
 */
export function searchMinimax(
  board: Board,
  color: Color,
  depthLimit: DepthLimit,
  useCaching: boolean,
  options: SearchOptions = {}
): SearchResult {
  return runSearch(
    board,
    color,
    toRemainingDepth(depthLimit),
    { caching: useCaching, pruning: false, ordering: false },
    options
  )
}

/**
 * Alpha-beta search. The root counts as ply 0, so the root node is searched
 * with `depthLimit - 1` plies remaining: a limit of N here matches minimax
 * with a limit of N - 1. A limit of 0 leaves nothing to count down from and
 * searches without a bound.
 */
export function searchAlphaBeta(
  board: Board,
  color: Color,
  depthLimit: DepthLimit,
  useCaching: boolean,
  useOrdering: boolean,
  options: SearchOptions = {}
): SearchResult {
  const limit = toRemainingDepth(depthLimit)
  const depth = limit === 0 ? Infinity : limit - 1
  return runSearch(
    board,
    color,
    depth,
    { caching: useCaching, pruning: true, ordering: useOrdering },
    options
  )
}

/**
 * Chooses a move with minimax.
 *
 * @returns The chosen move, or null if `color` has no legal move
 */
export function selectMoveMinimax(
  board: Board,
  color: Color,
  depthLimit: DepthLimit,
  useCaching: boolean,
  options?: SearchOptions
): Move | null {
  return searchMinimax(board, color, depthLimit, useCaching, options).move
}

/**
 * Chooses a move with alpha-beta pruning.
 *
 * @returns The chosen move, or null if `color` has no legal move
 */
export function selectMoveAlphaBeta(
  board: Board,
  color: Color,
  depthLimit: DepthLimit,
  useCaching: boolean,
  useOrdering = false,
  options?: SearchOptions
): Move | null {
  return searchAlphaBeta(board, color, depthLimit, useCaching, useOrdering, options).move
}
