import { describe, it, expect } from 'vitest'
import {
  DARK,
  LIGHT,
  IllegalMoveError,
  applyMove,
  boardFromRows,
  boardKey,
  createEmptyBoard,
  createInitialBoard,
  findLines,
  formatBoard,
  formatMove,
  getLegalMoves,
  getScore,
  isGameOver,
  isLegalMove,
  opponent,
} from './othello'

describe('Othello Game Engine', () => {
  describe('opponent', () => {
    it('maps each color to the other', () => {
      expect(opponent(DARK)).toBe(LIGHT)
      expect(opponent(LIGHT)).toBe(DARK)
    })
  })

  describe('createInitialBoard', () => {
    it('creates an 8x8 board by default', () => {
      const board = createInitialBoard()
      expect(board.length).toBe(8)
      expect(board.every((row) => row.length === 8)).toBe(true)
    })

    it('places the four centre discs', () => {
      const board = createInitialBoard()
      expect(board[3][3]).toBe(LIGHT)
      expect(board[4][4]).toBe(LIGHT)
      expect(board[3][4]).toBe(DARK)
      expect(board[4][3]).toBe(DARK)
      expect(getScore(board)).toEqual({ dark: 2, light: 2 })
    })

    it('supports smaller even sizes', () => {
      const board = createInitialBoard(4)
      expect(boardKey(board)).toBe('0000|0210|0120|0000')
    })

    it('rejects odd or tiny sizes', () => {
      expect(() => createInitialBoard(7)).toThrow(RangeError)
      expect(() => createInitialBoard(2)).toThrow(RangeError)
    })
  })

  describe('findLines', () => {
    it('finds a single captured disc', () => {
      const board = createInitialBoard()
      expect(findLines(board, { column: 2, row: 3 }, DARK)).toEqual([[{ column: 3, row: 3 }]])
    })

    it('finds lines in several directions', () => {
      const board = boardFromRows([
        [1, 0, 1, 0],
        [2, 2, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ])
      // (0, 2) captures upward through (0, 1) and diagonally through (1, 1)
      expect(findLines(board, { column: 0, row: 2 }, DARK)).toEqual([
        [{ column: 0, row: 1 }],
        [{ column: 1, row: 1 }],
      ])
    })

    it('returns nothing for occupied or off-board cells', () => {
      const board = createInitialBoard()
      expect(findLines(board, { column: 3, row: 3 }, DARK)).toEqual([])
      expect(findLines(board, { column: -1, row: 3 }, DARK)).toEqual([])
      expect(findLines(board, { column: 8, row: 0 }, DARK)).toEqual([])
    })

    it('ignores runs that reach the edge without an own disc', () => {
      const board = boardFromRows([
        [0, 2, 2, 2],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 1],
      ])
      expect(findLines(board, { column: 0, row: 0 }, DARK)).toEqual([])
    })
  })

  describe('getLegalMoves', () => {
    it('returns the four opening moves for dark in column order', () => {
      expect(getLegalMoves(createInitialBoard(), DARK)).toEqual([
        { column: 2, row: 3 },
        { column: 3, row: 2 },
        { column: 4, row: 5 },
        { column: 5, row: 4 },
      ])
    })

    it('returns the four opening moves for light in column order', () => {
      expect(getLegalMoves(createInitialBoard(), LIGHT)).toEqual([
        { column: 2, row: 4 },
        { column: 3, row: 5 },
        { column: 4, row: 2 },
        { column: 5, row: 3 },
      ])
    })

    it('returns an empty list for a color with no discs', () => {
      const board = boardFromRows([
        [0, 0, 0, 0],
        [0, 2, 0, 0],
        [0, 0, 2, 0],
        [0, 0, 0, 0],
      ])
      expect(getLegalMoves(board, DARK)).toEqual([])
    })
  })

  describe('applyMove', () => {
    it('places the disc and flips the captured line', () => {
      const board = createInitialBoard()
      const next = applyMove(board, DARK, { column: 2, row: 3 })
      expect(next[3][2]).toBe(DARK)
      expect(next[3][3]).toBe(DARK)
      expect(getScore(next)).toEqual({ dark: 4, light: 1 })
    })

    it('does not mutate the original board', () => {
      const board = createInitialBoard()
      applyMove(board, DARK, { column: 2, row: 3 })
      expect(board[3][2]).toBeNull()
      expect(board[3][3]).toBe(LIGHT)
    })

    it('flips every captured line at once', () => {
      const board = boardFromRows([
        [1, 0, 1, 0],
        [2, 2, 0, 0],
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ])
      const next = applyMove(board, DARK, { column: 0, row: 2 })
      expect(boardKey(next)).toBe('1010|1100|1000|0000')
    })

    it('throws IllegalMoveError for a move that captures nothing', () => {
      const board = createInitialBoard()
      expect(() => applyMove(board, DARK, { column: 0, row: 0 })).toThrow(IllegalMoveError)
      expect(() => applyMove(board, DARK, { column: 3, row: 3 })).toThrow(
        'Illegal move (3, 3) for color 1'
      )
    })
  })

  describe('isLegalMove', () => {
    it('agrees with the move list', () => {
      const board = createInitialBoard()
      expect(isLegalMove(board, { column: 2, row: 3 }, DARK)).toBe(true)
      expect(isLegalMove(board, { column: 2, row: 3 }, LIGHT)).toBe(false)
    })
  })

  describe('isGameOver', () => {
    it('is false at the start', () => {
      expect(isGameOver(createInitialBoard())).toBe(false)
    })

    it('is true when neither side can move', () => {
      const board = boardFromRows([
        [2, 1, 2, 2],
        [2, 2, 2, 2],
        [2, 2, 2, 2],
        [2, 2, 2, 0],
      ])
      expect(isGameOver(board)).toBe(true)
    })

    it('is true on a full board', () => {
      const board = createEmptyBoard(4).map((row, r) => row.map((_, c) => ((r + c) % 2 === 0 ? DARK : LIGHT)))
      expect(isGameOver(board)).toBe(true)
    })
  })

  describe('getScore', () => {
    it('counts an empty board as zero', () => {
      expect(getScore(createEmptyBoard())).toEqual({ dark: 0, light: 0 })
    })
  })

  describe('serialization', () => {
    it('formats boards as bracketed rows', () => {
      expect(formatBoard(createInitialBoard(4))).toBe('[[0, 0, 0, 0], [0, 2, 1, 0], [0, 1, 2, 0], [0, 0, 0, 0]]')
    })

    it('builds boards from numeric rows', () => {
      const board = boardFromRows([
        [0, 0, 0, 0],
        [0, 2, 1, 0],
        [0, 1, 2, 0],
        [0, 0, 0, 0],
      ])
      expect(board).toEqual(createInitialBoard(4))
    })

    it('gives equal boards equal keys', () => {
      const a = applyMove(createInitialBoard(), DARK, { column: 2, row: 3 })
      const b = applyMove(createInitialBoard(), DARK, { column: 2, row: 3 })
      expect(a).not.toBe(b)
      expect(boardKey(a)).toBe(boardKey(b))
    })

    it('formats moves as "column row"', () => {
      expect(formatMove({ column: 2, row: 3 })).toBe('2 3')
    })
  })
})
