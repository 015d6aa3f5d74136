/**
 * Failures the discovery pipeline knows how to absorb. Anything else propagates.
 */

export class ContainerSourceUnavailableError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ContainerSourceUnavailableError'
  }
}

export class SettingsReadError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SettingsReadError'
  }
}

export class SettingsWriteError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'SettingsWriteError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
