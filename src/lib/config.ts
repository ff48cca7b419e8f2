import type { AppConfig } from '../types'
import { envSchema, type EnvInput } from './schemas'
import { DEFAULT_MODEL, mapUiModelToApi } from './models'

// Vite substitutes these two expressions at build time (see envDefines.ts),
// so they have to stay spelled out in full.
export const readEnv = (): EnvInput => ({
  GOOGLE_API_KEY: process.env.GOOGLE_API_KEY,
  GEMINI_MODEL: process.env.GEMINI_MODEL,
})

export const loadConfig = (env: EnvInput = readEnv()): AppConfig => {
  const parsed = envSchema.parse(env)
  return {
    apiKey: parsed.GOOGLE_API_KEY,
    model: mapUiModelToApi(parsed.GEMINI_MODEL ?? DEFAULT_MODEL),
  }
}
