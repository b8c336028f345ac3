import path from 'node:path'
import { defineConfig } from 'vite'
import react from '@vitejs/plugin-react'
import tailwindcss from 'tailwindcss'
import autoprefixer from 'autoprefixer'

export default defineConfig(({ mode }) => ({
  root: __dirname,
  plugins: [react()],
  define: {
    __I18N_DEBUG__: JSON.stringify(mode !== 'production'),
  },
  css: {
    postcss: {
      plugins: [tailwindcss(path.resolve(__dirname, 'tailwind.config.ts')), autoprefixer()],
    },
  },
  server: {
    host: true,
    port: 5173,
    proxy: {
      '/api': 'http://localhost:3000',
      '/socket.io': {
        target: 'http://localhost:3000',
        ws: true
      }
    }
  },
  build: {
    outDir: 'dist',
  }
}))
