import { io, Socket } from 'socket.io-client'
import type { ServerToClientEvents, ClientToServerEvents } from '../types'
import { useSocketStore } from '../stores/socketStore'
import { getApiKey } from './client'

type TypedSocket = Socket<ServerToClientEvents, ClientToServerEvents>

let socket: TypedSocket | null = null
let initialized = false

export function getSocket(): TypedSocket {
  if (!socket) {
    socket = io({
      autoConnect: true,
      reconnection: true,
      reconnectionAttempts: Infinity,
      reconnectionDelay: 1000,
      reconnectionDelayMax: 10000,
      auth: (cb) => cb({ token: getApiKey() }),
    })
  }

  if (!initialized) {
    initialized = true
    setupSocketListeners(socket)
  }

  return socket
}

/**
 * Keep a throwing handler from taking the socket down
 */
function safeHandler<T>(handler: (data: T) => void): (data: T) => void {
  return (data: T) => {
    try {
      handler(data)
    } catch (error) {
      console.error('Socket handler error:', error)
    }
  }
}

function setupSocketListeners(socket: TypedSocket) {
  const store = useSocketStore.getState()

  socket.removeAllListeners()

  socket.on('connect', () => {
    console.log('Socket connected:', socket.id)
    store.setConnected(true)
    store.setConnectionError(null)
  })

  socket.on('disconnect', () => {
    console.log('Socket disconnected')
    store.setConnected(false)
    store.clearStaleData()
  })

  socket.on('connect_error', (error: Error) => {
    console.error('Socket connection error:', error.message)
    store.setConnectionError(error.message)
  })

  socket.on('services:update', safeHandler((update) => {
    store.setServices(update)
  }))

  socket.on('system:stats', safeHandler((overview) => {
    store.setOverview(overview)
  }))
}

/**
 * Ask the server for a fresh service list right away
 */
export function requestServicesRefresh() {
  getSocket().emit('services:refresh')
}
