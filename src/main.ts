/**
 * Entry point: runs the agent over stdin/stdout.
 *
 * Set OTHELLO_EVALUATION=heuristic to score depth-limited leaves with the
 * positional heuristic instead of the disc differential.
 */

import { runAgent } from './protocol/agent'
import { logError } from './lib/errorUtils'
import { loadEnvironment } from './lib/schemas'

async function main(): Promise<void> {
  const env = loadEnvironment()
  const summary = await runAgent({
    input: process.stdin,
    output: process.stdout,
    evaluation: env.OTHELLO_EVALUATION,
  })
  if (summary.final) {
    console.error(`[agent] Game over: dark ${summary.final.dark}, light ${summary.final.light}`)
  }
}

main().catch((err: unknown) => {
  logError('agent', err)
  process.exitCode = 1
})
