import type { Config } from 'tailwindcss'

export default {
  content: ['./index.html', './src/**/*.{ts,tsx}'],
  theme: {
    extend: {
      colors: {
        dock: {
          bg: 'var(--dock-bg, #1a1a1a)',
          panel: 'var(--dock-panel, #2d2d2d)',
          border: 'var(--dock-border, #404040)',
          text: 'var(--dock-text, #e0e0e0)',
          accent: 'var(--dock-accent, #4CAF50)',
        },
        signal: {
          green: '#4ade80',
          yellow: '#facc15',
          red: '#f87171',
          blue: '#60a5fa',
        },
      },
      borderRadius: {
        tile: 'var(--dock-radius, 8px)',
      },
    },
  },
  plugins: [],
} satisfies Config
