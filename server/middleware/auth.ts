import type { Request, Response, NextFunction } from 'express'

/**
 * Optional API key authentication middleware.
 * If DASHBOARD_API_KEY environment variable is set, requires X-API-Key header.
 * If not set, allows all requests (development mode).
 */
export function optionalApiKey(
  req: Request,
  res: Response,
  next: NextFunction
) {
  const apiKey = process.env.DASHBOARD_API_KEY

  // No key configured - skip auth (development mode)
  if (!apiKey) {
    next()
    return
  }

  const provided = req.headers['x-api-key']

  if (!provided) {
    res.status(401).json({
      error: 'API key required',
      message: 'Set X-API-Key header with valid API key',
    })
    return
  }

  if (provided !== apiKey) {
    res.status(401).json({
      error: 'Invalid API key',
      message: 'The provided API key is not valid',
    })
    return
  }

  next()
}
