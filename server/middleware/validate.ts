import type { Request, Response, NextFunction } from 'express'
import type { z } from 'zod'

/**
 * Helper to safely extract a string param from Express params
 * (Express 5 params can be string | string[])
 */
export function getStringParam(param: string | string[] | undefined): string | undefined {
  if (Array.isArray(param)) return param[0]
  return param
}

/**
 * Docker container ID format: 12-64 hex characters
 */
const containerIdRegex = /^[a-f0-9]{12,64}$/i

/**
 * Validate container ID parameter
 */
export function validateContainerId(
  req: Request,
  res: Response,
  next: NextFunction
) {
  const id = getStringParam(req.params.id)
  if (!id || !containerIdRegex.test(id)) {
    res.status(400).json({
      error: 'Invalid container ID format',
      message: 'Container ID must be 12-64 hexadecimal characters',
    })
    return
  }
  next()
}

/**
 * Keys of stored overrides. Looser than container IDs because overrides
 * outlive their containers and older documents may hold other keys.
 */
const settingsKeyRegex = /^[a-zA-Z0-9_.\-]+$/
const SETTINGS_KEY_MAX_LENGTH = 128

export function validateSettingsKey(
  req: Request,
  res: Response,
  next: NextFunction
) {
  const id = getStringParam(req.params.id)
  if (!id || !settingsKeyRegex.test(id)) {
    res.status(400).json({
      error: 'Invalid settings key',
      message: 'Key must be alphanumeric with dots, dashes or underscores',
    })
    return
  }
  if (id.length > SETTINGS_KEY_MAX_LENGTH) {
    res.status(400).json({
      error: 'Settings key too long',
      message: `Key must be at most ${SETTINGS_KEY_MAX_LENGTH} characters`,
    })
    return
  }
  next()
}

/**
 * Parse the JSON body against a schema. Answers 400 and returns undefined
 * when it does not match.
 */
export function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  req: Request,
  res: Response
): T | undefined {
  const result = schema.safeParse(req.body)
  if (result.success) {
    return result.data
  }

  const issue = result.error.issues[0]
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''
  res.status(400).json({
    error: 'Invalid request body',
    message: `${where}${issue?.message ?? 'Invalid input'}`,
  })
  return undefined
}
