/**
 * Server configuration with environment variable support
 */
import path from 'path'

const dataDir = process.env.DATA_DIR || './data'

export const config = {
  // Server port
  port: parseInt(process.env.DASHBOARD_PORT || process.env.PORT || '5000', 10),

  // Frontend dev server port (for CORS)
  frontendPort: parseInt(process.env.DASHBOARD_FRONTEND_PORT || '5173', 10),

  // Allowed CORS origins (comma-separated in env)
  corsOrigins: (process.env.DASHBOARD_CORS_ORIGINS || '')
    .split(',')
    .filter(Boolean)
    .map(s => s.trim()),

  // Settings document location
  dataDir,
  settingsFile: path.join(dataDir, process.env.DASHBOARD_SETTINGS_FILE || 'dashboard_settings.json'),

  docker: {
    socketPath: process.env.DOCKER_SOCKET || '/var/run/docker.sock',
    timeoutMs: parseInt(process.env.DOCKER_TIMEOUT_MS || '5000', 10),
  },

  // Address used in derived service URLs; detected when empty
  hostIp: process.env.HOST_IP?.trim() || '',

  // API requests per minute per IP
  rateLimit: parseInt(process.env.DASHBOARD_RATE_LIMIT || '120', 10),

  // Socket push intervals (in milliseconds)
  polling: {
    services: parseInt(process.env.DASHBOARD_SERVICES_POLL_MS || '5000', 10),
    system: parseInt(process.env.DASHBOARD_SYSTEM_POLL_MS || '5000', 10),
  },

  // Get default CORS origins if none specified
  getCorsOrigins(): string[] {
    if (this.corsOrigins.length > 0) {
      return this.corsOrigins
    }

    // Default origins for development
    return [
      `http://localhost:${this.frontendPort}`,
      `http://localhost:${this.port}`,
    ]
  },
}

export type Config = typeof config
