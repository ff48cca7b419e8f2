import { defineConfig, loadEnv } from 'vite'
import react from '@vitejs/plugin-react'
import { clientEnvDefines } from './src/lib/envDefines'

export default defineConfig(({ command, mode }) => {
  // '' prefix: read GOOGLE_API_KEY as-is, without requiring VITE_
  const env = loadEnv(mode, process.cwd(), '')
  return {
    plugins: [react()],
    define: clientEnvDefines(command, env),
  }
})
