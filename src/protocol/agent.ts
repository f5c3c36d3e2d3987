/**
 * Game-Manager Agent
 *
 * Speaks the line protocol of the Othello game manager:
 *
 *   agent   -> "Othello AI"
 *   manager -> "color,limit,minimax,caching,ordering"
 *   manager -> "SCORE <dark> <light>"      (or "FINAL ..." when the game ends)
 *   manager -> "[[0, 0, ...], ...]"        (board rows, only after SCORE)
 *   agent   -> "<column> <row>"            (or "pass" without a legal move)
 *
 * The last three steps repeat until FINAL or end of input.
 */

import * as readline from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import type { EngineConfig } from '../ai/engine'
import type { EvaluationKind } from '../ai/evaluation'
import { engineRegistry } from '../ai/engines'
import { formatMove, getLegalMoves } from '../game/othello'
import { ProtocolError } from '../lib/errorUtils'
import { type AgentConfig, parseAgentConfig, parseBoard, parseStatusLine } from '../lib/schemas'

export const AGENT_NAME = 'Othello AI'
export const PASS_REPLY = 'pass'

export interface AgentOptions {
  input: Readable
  output: Writable
  /** Leaf evaluator (default: exact) */
  evaluation?: EvaluationKind
}

export interface AgentSummary {
  config: AgentConfig
  /** Moves sent to the manager, passes included */
  movesPlayed: number
  /** Final score, when the manager sent one */
  final: { dark: number; light: number } | null
}

function describeConfig(config: AgentConfig): string[] {
  const lines = [
    config.algorithm === 'minimax' ? 'Running MINIMAX' : 'Running ALPHA-BETA',
    `State Caching is ${config.caching ? 'ON' : 'OFF'}`,
    `Node Ordering is ${config.ordering ? 'ON' : 'OFF'}`,
    config.depthLimit === 'unbounded' ? 'Depth Limit is OFF' : `Depth Limit is ${config.depthLimit}`,
  ]
  if (config.algorithm === 'minimax' && config.ordering) {
    lines.push('Node Ordering should have no impact on Minimax')
  }
  return lines
}

/**
 * Runs the agent until the manager reports the final score or closes input.
 *
 * @throws ProtocolError on a malformed or missing line
 */
export async function runAgent(options: AgentOptions): Promise<AgentSummary> {
  const { input, output, evaluation = 'exact' } = options
  const rl = readline.createInterface({ input, crlfDelay: Infinity })
  const lines = rl[Symbol.asyncIterator]()

  const nextLine = async (): Promise<string | null> => {
    const result = await lines.next()
    return result.done ? null : result.value
  }
  const send = (line: string): void => {
    output.write(`${line}\n`)
  }

  try {
    send(AGENT_NAME)

    const configLine = await nextLine()
    if (configLine === null) {
      throw new ProtocolError('Input closed before the configuration line')
    }
    const config = parseAgentConfig(configLine)
    for (const line of describeConfig(config)) {
      console.error(line)
    }

    const engine = engineRegistry.getWithFallback(config.algorithm)
    const engineConfig: EngineConfig = {
      depthLimit: config.depthLimit,
      caching: config.caching,
      ordering: config.ordering,
      evaluation,
    }

    let movesPlayed = 0

    for (let statusLine = await nextLine(); statusLine !== null; statusLine = await nextLine()) {
      // Tolerate blank keep-alive lines
      if (statusLine.trim() === '') continue

      const status = parseStatusLine(statusLine)
      if (status.status === 'FINAL') {
        return { config, movesPlayed, final: { dark: status.dark, light: status.light } }
      }

      const boardLine = await nextLine()
      if (boardLine === null) {
        throw new ProtocolError('Input closed before the board line', statusLine)
      }
      const board = parseBoard(boardLine)

      let result = engine.selectMove(board, config.color, engineConfig)
      movesPlayed++

      if (result.move === null) {
        if (getLegalMoves(board, config.color).length === 0) {
          console.error(`[agent] No legal move for color ${config.color}, passing`)
          send(PASS_REPLY)
          continue
        }
        // Alpha-beta counts the root as ply 0, so a limit of 1 expands nothing
        console.error(
          `[agent] Depth limit ${config.depthLimit} leaves ${engine.name} no plies to search, using one-ply lookahead`
        )
        result = engineRegistry
          .getWithFallback('minimax')
          .selectMove(board, config.color, { ...engineConfig, depthLimit: 1 })
      }
      if (result.move === null) {
        throw new Error(`One-ply lookahead found no move for color ${config.color}`)
      }

      console.error(
        `[agent] ${engine.explainMove?.(board, result.move, config.color) ?? formatMove(result.move)}` +
          ` (value ${result.value}, ${result.searchInfo.nodesSearched} nodes, ${result.searchInfo.timeUsed}ms)`
      )
      send(formatMove(result.move))
    }

    return { config, movesPlayed, final: null }
  } finally {
    rl.close()
  }
}
