/**
 * Minimax Engine
 *
 * Exhaustive minimax search to the configured depth limit.
 * Move ordering has no effect on plain minimax and is ignored.
 */

import type { Board, Color, Move } from '../../game/othello'
import type { EngineConfig, MoveResult, SearchEngine } from '../engine'
import { searchMinimax } from '../search'
import { describeMove, evaluateWithConfig, toMoveResult } from './engine-utils'

export class MinimaxEngine implements SearchEngine {
  readonly name = 'minimax'
  readonly description = 'Minimax search with optional state caching'

  selectMove(board: Board, color: Color, config: EngineConfig): MoveResult {
    const startTime = Date.now()
    const result = searchMinimax(board, color, config.depthLimit, config.caching, {
      evaluation: config.evaluation,
      weights: config.weights,
    })
    return toMoveResult(result, config, startTime)
  }

  evaluatePosition(board: Board, color: Color, config?: Partial<EngineConfig>): number {
    return evaluateWithConfig(board, color, config)
  }

  explainMove(board: Board, move: Move, color: Color): string {
    return describeMove(board, move, color)
  }
}

// Export singleton instance
export const minimaxEngine = new MinimaxEngine()
