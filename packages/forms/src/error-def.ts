import { z } from 'zod'
import { ErrorDefDecodeError } from './errors'
import type { ErrorDef } from './types'

const errorDefSchema = z.object({
  text: z.string(),
  key: z.string(),
})

const errorDefListSchema = z.array(errorDefSchema)

function parseInput(input: unknown): unknown {
  if (typeof input !== 'string') return input
  try {
    const parsed: unknown = JSON.parse(input)
    return parsed
  } catch (err) {
    throw new ErrorDefDecodeError(`Invalid JSON: ${err instanceof Error ? err.message : String(err)}`)
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ')
}

/**
 * Decode a list of `{ text, key }` errors, typically a server's validation
 * response. Accepts a parsed value or a JSON string.
 */
export function decodeErrorDefs(input: unknown): ErrorDef[] {
  const result = errorDefListSchema.safeParse(parseInput(input))
  if (!result.success) throw new ErrorDefDecodeError(formatIssues(result.error))
  return result.data
}

export function decodeErrorDef(input: unknown): ErrorDef {
  const result = errorDefSchema.safeParse(parseInput(input))
  if (!result.success) throw new ErrorDefDecodeError(formatIssues(result.error))
  return result.data
}

export function encodeErrorDef(error: ErrorDef): { text: string; key: string } {
  return { text: error.text, key: error.key }
}
