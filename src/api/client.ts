const API_BASE = '/api'
const DEFAULT_TIMEOUT = 15000
const API_KEY_STORAGE = 'dockboard:apiKey'

export class ApiError extends Error {
  constructor(
    message: string,
    public status: number,
    public statusText: string
  ) {
    super(message)
    this.name = 'ApiError'
  }
}

export class TimeoutError extends Error {
  constructor(message = 'Request timed out') {
    super(message)
    this.name = 'TimeoutError'
  }
}

export class ParseError extends Error {
  constructor(message = 'Failed to parse response') {
    super(message)
    this.name = 'ParseError'
  }
}

/**
 * Key sent as X-API-Key when the server requires one
 */
export function getApiKey(): string | null {
  if (typeof window === 'undefined') return null
  return window.localStorage.getItem(API_KEY_STORAGE)
}

export function setApiKey(key: string | null) {
  if (key) {
    window.localStorage.setItem(API_KEY_STORAGE, key)
  } else {
    window.localStorage.removeItem(API_KEY_STORAGE)
  }
}

/**
 * Prefer the server's own explanation of a failed request
 */
async function describeFailure(response: Response): Promise<string> {
  const fallback = `API error: ${response.status} ${response.statusText}`
  let body: unknown
  try {
    body = await response.json()
  } catch {
    return fallback
  }
  if (typeof body !== 'object' || body === null) return fallback

  const error = 'error' in body && typeof body.error === 'string' ? body.error : undefined
  const message = 'message' in body && typeof body.message === 'string' ? body.message : undefined
  if (error && message) return `${error}: ${message}`
  return error ?? message ?? fallback
}

async function send(
  endpoint: string,
  options?: RequestInit & { timeout?: number }
): Promise<Response> {
  const { timeout = DEFAULT_TIMEOUT, ...fetchOptions } = options || {}
  const apiKey = getApiKey()

  const controller = new AbortController()
  const timeoutId = setTimeout(() => controller.abort(), timeout)

  try {
    const response = await fetch(`${API_BASE}${endpoint}`, {
      ...fetchOptions,
      headers: {
        'Content-Type': 'application/json',
        ...(apiKey ? { 'X-API-Key': apiKey } : {}),
        ...fetchOptions.headers,
      },
      signal: controller.signal,
    })

    if (!response.ok) {
      throw new ApiError(await describeFailure(response), response.status, response.statusText)
    }
    return response
  } catch (error) {
    if (error instanceof Error && error.name === 'AbortError') {
      throw new TimeoutError(`Request to ${endpoint} timed out after ${timeout}ms`)
    }
    throw error
  } finally {
    clearTimeout(timeoutId)
  }
}

async function parse<T>(response: Response, endpoint: string): Promise<T> {
  try {
    return await response.json()
  } catch (parseError) {
    throw new ParseError(
      `Failed to parse response from ${endpoint}: ${parseError instanceof Error ? parseError.message : 'Unknown error'}`
    )
  }
}

async function request<T>(
  endpoint: string,
  options?: RequestInit & { timeout?: number }
): Promise<T> {
  return parse<T>(await send(endpoint, options), endpoint)
}

function withBody(method: string, body: unknown, timeout?: number) {
  return { method, body: JSON.stringify(body), timeout }
}

export const api = {
  get: <T>(endpoint: string, timeout?: number) =>
    request<T>(endpoint, { timeout }),
  /** GET that also hands back the response headers */
  getWithHeaders: async <T>(endpoint: string, timeout?: number) => {
    const response = await send(endpoint, { timeout })
    return { data: await parse<T>(response, endpoint), headers: response.headers }
  },
  post: <T>(endpoint: string, body: unknown, timeout?: number) =>
    request<T>(endpoint, withBody('POST', body, timeout)),
  put: <T>(endpoint: string, body: unknown, timeout?: number) =>
    request<T>(endpoint, withBody('PUT', body, timeout)),
  patch: <T>(endpoint: string, body: unknown, timeout?: number) =>
    request<T>(endpoint, withBody('PATCH', body, timeout)),
  delete: <T>(endpoint: string, timeout?: number) =>
    request<T>(endpoint, { method: 'DELETE', timeout }),
}
