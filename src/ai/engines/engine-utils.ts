/**
 * Shared Engine Utilities
 *
 * Helpers shared by the minimax and alpha-beta engines.
 */

import { type Board, type Color, type Move, findLines } from '../../game/othello'
import type { EngineConfig, MoveResult } from '../engine'
import { DEFAULT_EVAL_WEIGHTS, getEvaluator } from '../evaluation'
import type { SearchResult } from '../search'

/**
 * Static evaluation with the engine's configured evaluator.
 */
export function evaluateWithConfig(
  board: Board,
  color: Color,
  config: Partial<EngineConfig> = {}
): number {
  const evaluate = getEvaluator(config.evaluation ?? 'exact', config.weights ?? DEFAULT_EVAL_WEIGHTS)
  return evaluate(board, color)
}

/**
 * Wraps a search result with timing and configuration details.
 */
export function toMoveResult(
  result: SearchResult,
  config: EngineConfig,
  startTime: number
): MoveResult {
  return {
    move: result.move,
    value: result.value,
    searchInfo: {
      depthLimit: config.depthLimit,
      nodesSearched: result.stats.nodesVisited,
      cutoffs: result.stats.cutoffs,
      cacheHits: result.stats.cacheHits,
      timeUsed: Date.now() - startTime,
    },
  }
}

function isCorner(board: Board, move: Move): boolean {
  const last = board.length - 1
  return (move.column === 0 || move.column === last) && (move.row === 0 || move.row === last)
}

/**
 * Describes a move in words, e.g. for stderr diagnostics.
 */
export function describeMove(board: Board, move: Move, color: Color): string {
  const at = `(${move.column}, ${move.row})`
  const flipped = findLines(board, move, color).reduce((sum, line) => sum + line.length, 0)
  if (flipped === 0) {
    return `Invalid move: ${at}`
  }

  const discs = flipped === 1 ? 'disc' : 'discs'
  if (isCorner(board, move)) {
    return `Taking corner ${at}, flipping ${flipped} ${discs}`
  }
  return `Playing ${at}, flipping ${flipped} ${discs}`
}
