export type ViteCommand = 'serve' | 'build'

/**
 * Compile-time replacements for the `process.env` reads in config.ts.
 *
 * `GOOGLE_API_KEY` is only inlined for the local dev server. A production
 * bundle is served to every visitor, so `vite build` always leaves it blank
 * and the built page runs offline.
 */
export const clientEnvDefines = (command: ViteCommand, env: Record<string, string | undefined>): Record<string, string> => ({
  'process.env.GOOGLE_API_KEY': JSON.stringify(command === 'serve' ? env.GOOGLE_API_KEY ?? '' : ''),
  'process.env.GEMINI_MODEL': JSON.stringify(env.GEMINI_MODEL ?? ''),
})
