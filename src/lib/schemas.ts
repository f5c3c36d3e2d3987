import { z } from 'zod'
import { type Board, boardFromRows } from '../game/othello'
import type { DepthLimit } from '../ai/search'
import { ProtocolError } from './errorUtils'

// Integer fields arrive as text on the wire
const integerString = z
  .string()
  .trim()
  .regex(/^-?\d+$/, 'Expected an integer')
  .transform(Number)

const flagSchema = integerString.pipe(
  z.union([z.literal(0), z.literal(1)], {
    errorMap: () => ({ message: 'Flags must be 0 or 1' }),
  })
)

export const colorSchema = z.union([z.literal(1), z.literal(2)], {
  errorMap: () => ({ message: 'Color must be 1 (dark) or 2 (light)' }),
})

const depthLimitSchema = integerString
  .pipe(z.number().int().min(-1, 'Depth limit must be -1 (unbounded) or >= 0'))
  .transform((limit): DepthLimit => (limit === -1 ? 'unbounded' : limit))

// Agent configuration: "color,limit,minimax,caching,ordering"
export const agentConfigSchema = z
  .string()
  .transform((line) => line.split(','))
  .pipe(
    z.tuple([integerString.pipe(colorSchema), depthLimitSchema, flagSchema, flagSchema, flagSchema], {
      errorMap: () => ({ message: 'Expected "color,limit,minimax,caching,ordering"' }),
    })
  )
  .transform(([color, depthLimit, minimax, caching, ordering]) => ({
    color,
    depthLimit,
    algorithm: minimax === 1 ? ('minimax' as const) : ('alphabeta' as const),
    caching: caching === 1,
    ordering: ordering === 1,
  }))

export type AgentConfig = z.infer<typeof agentConfigSchema>

const countString = integerString.pipe(z.number().int().min(0))

// Status line: "SCORE <dark> <light>" or "FINAL <dark> <light>"
export const statusLineSchema = z
  .string()
  .transform((line) => line.trim().split(/\s+/))
  .pipe(
    z.tuple([z.enum(['SCORE', 'FINAL']), countString, countString], {
      errorMap: () => ({ message: 'Expected "SCORE <dark> <light>" or "FINAL <dark> <light>"' }),
    })
  )
  .transform(([status, dark, light]) => ({ status, dark, light }))

export type StatusLine = z.infer<typeof statusLineSchema>

const cellValueSchema = z.union([z.literal(0), z.literal(1), z.literal(2)], {
  errorMap: () => ({ message: 'Cells must be 0, 1 or 2' }),
})

export const boardRowsSchema = z
  .array(z.array(cellValueSchema))
  .min(4, 'Board must have at least 4 rows')
  .refine((rows) => rows.every((row) => row.length === rows.length), {
    message: 'Board must be square',
  })

// Board line: a bracketed list of rows, e.g. "[[0, 0, 1], ...]"
export const boardLineSchema = z
  .string()
  .transform((line, ctx): unknown => {
    try {
      return JSON.parse(line)
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Board is not a bracketed list of rows' })
      return z.NEVER
    }
  })
  .pipe(boardRowsSchema)
  .transform((rows): Board => boardFromRows(rows))

// Process environment
export const environmentSchema = z.object({
  OTHELLO_EVALUATION: z.enum(['exact', 'heuristic']).default('exact'),
})

export type Environment = z.infer<typeof environmentSchema>

// ============================================================================
// PARSERS
// ============================================================================

function parseLine<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, line: string, what: string): T {
  const result = schema.safeParse(line)
  if (!result.success) {
    const details = result.error.issues.map((issue) => issue.message).join('; ')
    throw new ProtocolError(`Invalid ${what}: ${details}`, line)
  }
  return result.data
}

/**
 * @throws ProtocolError when the line is not a valid configuration
 */
export function parseAgentConfig(line: string): AgentConfig {
  return parseLine(agentConfigSchema, line, 'configuration')
}

/**
 * @throws ProtocolError when the line is not a SCORE or FINAL line
 */
export function parseStatusLine(line: string): StatusLine {
  return parseLine(statusLineSchema, line, 'status line')
}

/**
 * @throws ProtocolError when the line is not a square board of 0/1/2 cells
 */
export function parseBoard(line: string): Board {
  return parseLine(boardLineSchema, line, 'board')
}

/**
 * Reads the agent's settings from the environment.
 *
 * @throws ProtocolError on an unknown evaluator name
 */
export function loadEnvironment(env: Record<string, string | undefined> = process.env): Environment {
  const result = environmentSchema.safeParse(env)
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ProtocolError(`Invalid environment: ${details.join('; ')}`)
  }
  return result.data
}
