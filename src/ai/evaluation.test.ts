import { describe, it, expect } from 'vitest'
import {
  DEFAULT_EVAL_WEIGHTS,
  computeHeuristic,
  computeUtility,
  countCorners,
  countFrontierDiscs,
  getEvaluator,
  hasEmptyNeighbour,
} from './evaluation'
import { DARK, LIGHT, applyMove, boardFromRows, createInitialBoard } from '../game/othello'

// Dark holds three corners and can only play (3, 3); light has no move
const CORNERED = boardFromRows([
  [1, 1, 1, 1],
  [1, 2, 2, 1],
  [1, 2, 2, 1],
  [1, 1, 1, 0],
])

describe('computeUtility', () => {
  it('is zero at the start', () => {
    expect(computeUtility(createInitialBoard(), DARK)).toBe(0)
    expect(computeUtility(createInitialBoard(), LIGHT)).toBe(0)
  })

  it('is the disc differential for each side', () => {
    const board = applyMove(createInitialBoard(), DARK, { column: 2, row: 3 })
    expect(computeUtility(board, DARK)).toBe(3)
    expect(computeUtility(board, LIGHT)).toBe(-3)
  })
})

describe('hasEmptyNeighbour', () => {
  it('looks at all eight neighbours', () => {
    expect(hasEmptyNeighbour(CORNERED, 2, 2)).toBe(true) // (3, 3) is diagonal
    expect(hasEmptyNeighbour(CORNERED, 1, 1)).toBe(false)
  })

  it('clips at the board edge', () => {
    expect(hasEmptyNeighbour(CORNERED, 0, 0)).toBe(false)
    expect(hasEmptyNeighbour(CORNERED, 3, 2)).toBe(true)
  })
})

describe('countFrontierDiscs', () => {
  it('counts discs touching an empty cell', () => {
    expect(countFrontierDiscs(CORNERED, DARK)).toBe(2)
    expect(countFrontierDiscs(CORNERED, LIGHT)).toBe(1)
  })
})

describe('countCorners', () => {
  it('counts corners for both sides', () => {
    expect(countCorners(CORNERED, DARK)).toEqual({ mine: 3, theirs: 0 })
    expect(countCorners(CORNERED, LIGHT)).toEqual({ mine: 0, theirs: 3 })
  })
})

describe('computeHeuristic', () => {
  it('is zero for the symmetric starting position', () => {
    expect(computeHeuristic(createInitialBoard(), DARK)).toBe(0)
    expect(computeHeuristic(createInitialBoard(), LIGHT)).toBe(0)
  })

  it('rewards potential mobility after the first move', () => {
    // Mobility 3 vs 3, frontier discs 4 vs 1, no corners
    const board = applyMove(createInitialBoard(), DARK, { column: 2, row: 3 })
    expect(computeHeuristic(board, DARK)).toBe(60)
    expect(computeHeuristic(board, LIGHT)).toBe(-60)
  })

  it('sums mobility, potential mobility and corner control', () => {
    // 100 (1 vs 0 moves) + 33.3 (2 vs 1 frontier) + 100 (3 vs 0 corners)
    expect(computeHeuristic(CORNERED, DARK)).toBeCloseTo(700 / 3)
    expect(computeHeuristic(CORNERED, LIGHT)).toBeCloseTo(-700 / 3)
  })

  it('contributes nothing for a term with no material on either side', () => {
    const board = boardFromRows([
      [1, 0, 0, 2],
      [0, 0, 0, 0],
      [0, 0, 0, 0],
      [1, 0, 0, 0],
    ])
    // No moves for anyone; frontier 2 vs 1; corners 2 vs 1
    expect(computeHeuristic(board, DARK)).toBeCloseTo(200 / 3)
  })

  it('applies custom weights', () => {
    const weights = { mobility: 0, potentialMobility: 0, cornerControl: 2 }
    expect(computeHeuristic(CORNERED, DARK, weights)).toBe(200)
  })
})

describe('getEvaluator', () => {
  it('returns the exact evaluator by default kind', () => {
    expect(getEvaluator('exact')).toBe(computeUtility)
  })

  it('returns a heuristic evaluator bound to the weights', () => {
    const evaluate = getEvaluator('heuristic', DEFAULT_EVAL_WEIGHTS)
    expect(evaluate(CORNERED, DARK)).toBe(computeHeuristic(CORNERED, DARK))
  })
})
