/**
 * Alpha-Beta Engine
 *
 * Minimax with alpha-beta pruning. The root counts as ply 0, so a depth limit
 * of N explores one ply less than the minimax engine with the same limit.
 */

import type { Board, Color, Move } from '../../game/othello'
import type { EngineConfig, MoveResult, SearchEngine } from '../engine'
import { searchAlphaBeta } from '../search'
import { describeMove, evaluateWithConfig, toMoveResult } from './engine-utils'

export class AlphaBetaEngine implements SearchEngine {
  readonly name = 'alphabeta'
  readonly description = 'Minimax with alpha-beta pruning, optional caching and move ordering'

  selectMove(board: Board, color: Color, config: EngineConfig): MoveResult {
    const startTime = Date.now()
    const result = searchAlphaBeta(board, color, config.depthLimit, config.caching, config.ordering, {
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
export const alphaBetaEngine = new AlphaBetaEngine()
