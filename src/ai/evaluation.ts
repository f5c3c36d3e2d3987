/**
 * Board Evaluation
 *
 * Static evaluators used at the leaves of the search tree and for move
 * ordering. Both are pure functions of (board, color); larger values are
 * better for `color`.
 */

import { type Board, type Color, getLegalMoves, getScore, DARK, opponent } from '../game/othello'

// ============================================================================
// EVALUATION WEIGHTS
// ============================================================================

/**
 * Weights for the heuristic terms. Each term is a ratio in [-100, 100].
 */
export interface EvalWeights {
  mobility: number
  potentialMobility: number
  cornerControl: number
}

/**
 * Default weights: all three terms count equally.
 */
export const DEFAULT_EVAL_WEIGHTS: EvalWeights = {
  mobility: 1,
  potentialMobility: 1,
  cornerControl: 1,
}

export type EvaluationKind = 'exact' | 'heuristic'

export type Evaluator = (board: Board, color: Color) => number

// ============================================================================
// EXACT UTILITY
// ============================================================================

/**
 * Disc differential from `color`'s point of view.
 */
export function computeUtility(board: Board, color: Color): number {
  const { dark, light } = getScore(board)
  return color === DARK ? dark - light : light - dark
}

// ============================================================================
// HEURISTIC
// ============================================================================

/**
 * 100 * (mine - theirs) / (mine + theirs), or 0 when neither side has any.
 */
function ratio(mine: number, theirs: number): number {
  const total = mine + theirs
  if (total === 0) return 0
  return (100 * (mine - theirs)) / total
}

/**
 * Checks if any of the 8 neighbours of (column, row) is empty.
 */
export function hasEmptyNeighbour(board: Board, column: number, row: number): boolean {
  const size = board.length
  for (let r = row - 1; r <= row + 1; r++) {
    if (r < 0 || r >= size) continue
    for (let c = column - 1; c <= column + 1; c++) {
      if (c < 0 || c >= size || (c === column && r === row)) continue
      if (board[r][c] === null) return true
    }
  }
  return false
}

/**
 * Counts the discs of `color` that touch at least one empty cell.
 */
export function countFrontierDiscs(board: Board, color: Color): number {
  let total = 0
  for (let row = 0; row < board.length; row++) {
    for (let column = 0; column < board.length; column++) {
      if (board[row][column] === color && hasEmptyNeighbour(board, column, row)) {
        total++
      }
    }
  }
  return total
}

/**
 * Counts the corners held by each side.
 */
export function countCorners(board: Board, color: Color): { mine: number; theirs: number } {
  const last = board.length - 1
  const corners = [board[0][0], board[0][last], board[last][0], board[last][last]]
  const other = opponent(color)
  return {
    mine: corners.filter((c) => c === color).length,
    theirs: corners.filter((c) => c === other).length,
  }
}

/**
 * Positional estimate combining mobility, potential mobility and corner
 * control.
 *
 * @param weights - Multipliers for each term
 */
export function computeHeuristic(
  board: Board,
  color: Color,
  weights: EvalWeights = DEFAULT_EVAL_WEIGHTS
): number {
  const other = opponent(color)

  const mobility = ratio(getLegalMoves(board, color).length, getLegalMoves(board, other).length)
  const potential = ratio(countFrontierDiscs(board, color), countFrontierDiscs(board, other))
  const corners = countCorners(board, color)
  const cornerControl = ratio(corners.mine, corners.theirs)

  return (
    weights.mobility * mobility +
    weights.potentialMobility * potential +
    weights.cornerControl * cornerControl
  )
}

/**
 * Returns the evaluator for the requested kind.
 */
export function getEvaluator(
  kind: EvaluationKind,
  weights: EvalWeights = DEFAULT_EVAL_WEIGHTS
): Evaluator {
  if (kind === 'heuristic') {
    return (board, color) => computeHeuristic(board, color, weights)
  }
  return computeUtility
}
