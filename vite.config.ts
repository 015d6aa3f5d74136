import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'

const serverPort = process.env.DASHBOARD_PORT || process.env.PORT || '5000'

export default defineConfig({
  plugins: [react()],
  server: {
    port: 5173,
    proxy: {
      '/api': `http://localhost:${serverPort}`,
      '/socket.io': {
        target: `ws://localhost:${serverPort}`,
        ws: true,
      },
    },
  },
  build: {
    outDir: 'dist',
  },
})
