import { z } from 'zod'

// blank env values count as unset
const optionalSetting = z
  .string()
  .optional()
  .transform(v => {
    const trimmed = v?.trim()
    return trimmed ? trimmed : undefined
  })

export const envSchema = z.object({
  GOOGLE_API_KEY: optionalSetting,
  GEMINI_MODEL: optionalSetting,
})

export const apiKeySchema = z.string().min(10, 'API key looks too short')

export const messageInputSchema = z.object({
  content: z.string().trim().min(1),
})

export type EnvInput = z.input<typeof envSchema>
