/**
 * Othello Game Engine
 *
 * Board model and move oracle for the search engine: legal move enumeration,
 * move application with disc flipping, and scoring.
 *
 * Boards are indexed board[row][column] and are never mutated in place.
 * A move is identified by its (column, row) coordinates.
 */

// ============================================================================
// TYPES AND CONSTANTS
// ============================================================================

/** 1 = dark (moves first), 2 = light */
export type Color = 1 | 2
export type Cell = Color | null
export type Board = ReadonlyArray<ReadonlyArray<Cell>>

export interface Move {
  column: number
  row: number
}

export interface Score {
  dark: number
  light: number
}

export const DARK: Color = 1
export const LIGHT: Color = 2
export const DEFAULT_BOARD_SIZE = 8

/** The 8 neighbouring directions as [deltaColumn, deltaRow] pairs. */
const DIRECTIONS: ReadonlyArray<readonly [number, number]> = [
  [-1, -1],
  [-1, 0],
  [-1, 1],
  [0, -1],
  [0, 1],
  [1, -1],
  [1, 0],
  [1, 1],
]

/**
 * Thrown by applyMove for a move that captures nothing or targets an
 * occupied or off-board cell.
 */
export class IllegalMoveError extends Error {
  constructor(
    readonly move: Move,
    readonly color: Color
  ) {
    super(`Illegal move (${move.column}, ${move.row}) for color ${color}`)
    this.name = 'IllegalMoveError'
  }
}

// ============================================================================
// BOARD CREATION
// ============================================================================

/**
 * Returns the other player's color.
 */
export function opponent(color: Color): Color {
  return color === DARK ? LIGHT : DARK
}

/**
 * Creates an empty board of the given size.
 */
export function createEmptyBoard(size = DEFAULT_BOARD_SIZE): Cell[][] {
  return Array.from({ length: size }, () => Array<Cell>(size).fill(null))
}

/**
 * Creates the standard starting position: four discs in the centre,
 * light on the main diagonal and dark on the anti-diagonal.
 *
 * @throws RangeError if size is odd or smaller than 4
 */
export function createInitialBoard(size = DEFAULT_BOARD_SIZE): Board {
  if (!Number.isInteger(size) || size < 4 || size % 2 !== 0) {
    throw new RangeError(`Board size must be an even integer >= 4, got ${size}`)
  }
  const board = createEmptyBoard(size)
  const mid = size / 2
  board[mid - 1][mid - 1] = LIGHT
  board[mid][mid] = LIGHT
  board[mid - 1][mid] = DARK
  board[mid][mid - 1] = DARK
  return board
}

/**
 * Deep clones a board into a mutable copy.
 */
export function cloneBoard(board: Board): Cell[][] {
  return board.map((row) => [...row])
}

function isOnBoard(board: Board, column: number, row: number): boolean {
  return row >= 0 && row < board.length && column >= 0 && column < board.length
}

// ============================================================================
// MOVE ORACLE
// ============================================================================

/**
 * Finds every line of opponent discs that playing `move` would capture.
 * Each line lists the captured cells in order, walking away from the move.
 * Returns an empty array when the move captures nothing or the cell is taken.
 */
export function findLines(board: Board, move: Move, color: Color): Move[][] {
  const { column, row } = move
  if (!isOnBoard(board, column, row) || board[row][column] !== null) {
    return []
  }

  const other = opponent(color)
  const lines: Move[][] = []

  for (const [dc, dr] of DIRECTIONS) {
    const line: Move[] = []
    let c = column + dc
    let r = row + dr

    while (isOnBoard(board, c, r) && board[r][c] === other) {
      line.push({ column: c, row: r })
      c += dc
      r += dr
    }

    // The run of opponent discs must be closed by one of our own
    if (line.length > 0 && isOnBoard(board, c, r) && board[r][c] === color) {
      lines.push(line)
    }
  }

  return lines
}

/**
 * Checks if `color` may play `move`.
 */
export function isLegalMove(board: Board, move: Move, color: Color): boolean {
  return findLines(board, move, color).length > 0
}

/**
 * Returns all legal moves for `color`, column by column and top to bottom
 * within a column. Search tie-breaking depends on this order.
 */
export function getLegalMoves(board: Board, color: Color): Move[] {
  const moves: Move[] = []
  for (let column = 0; column < board.length; column++) {
    for (let row = 0; row < board.length; row++) {
      const move = { column, row }
      if (isLegalMove(board, move, color)) {
        moves.push(move)
      }
    }
  }
  return moves
}

/**
 * Plays a move, returning the new board with all captured lines flipped.
 *
 * @throws IllegalMoveError if the move captures nothing
 */
export function applyMove(board: Board, color: Color, move: Move): Board {
  const lines = findLines(board, move, color)
  if (lines.length === 0) {
    throw new IllegalMoveError(move, color)
  }

  const next = cloneBoard(board)
  next[move.row][move.column] = color
  for (const line of lines) {
    for (const cell of line) {
      next[cell.row][cell.column] = color
    }
  }
  return next
}

/**
 * Checks whether neither player has a legal move.
 */
export function isGameOver(board: Board): boolean {
  return getLegalMoves(board, DARK).length === 0 && getLegalMoves(board, LIGHT).length === 0
}

// ============================================================================
// SCORING
// ============================================================================

/**
 * Counts the discs of each color.
 */
export function getScore(board: Board): Score {
  let dark = 0
  let light = 0
  for (const row of board) {
    for (const cell of row) {
      if (cell === DARK) dark++
      else if (cell === LIGHT) light++
    }
  }
  return { dark, light }
}

// ============================================================================
// SERIALIZATION
// ============================================================================

/**
 * Canonical string form of a board: one digit per cell (0 empty, 1 dark,
 * 2 light), rows separated by '|'. Two boards share a key iff all cells match.
 */
export function boardKey(board: Board): string {
  return board.map((row) => row.map((c) => (c === null ? '0' : c)).join('')).join('|')
}

/**
 * Formats a board as a bracketed list of rows, e.g. `[[0, 1], [2, 0]]`.
 */
export function formatBoard(board: Board): string {
  const rows = board.map((row) => `[${row.map((c) => (c === null ? 0 : c)).join(', ')}]`)
  return `[${rows.join(', ')}]`
}

/**
 * Converts numeric cell rows (0 empty, 1 dark, 2 light) into a board.
 */
export function boardFromRows(rows: ReadonlyArray<ReadonlyArray<0 | 1 | 2>>): Board {
  return rows.map((row) => row.map((value): Cell => (value === 0 ? null : value)))
}

/**
 * Formats a move the way it is printed to the game manager.
 */
export function formatMove(move: Move): string {
  return `${move.column} ${move.row}`
}
