import { apiKeySchema } from './schemas'
import { buildChatContext, type ChatMessage } from './contextBuilder'
import { streamOpenAiCompat, type FetchLike } from './openAiCompatClient'
import { mapUiModelToApi } from './models'
import type { Result } from './result'

export const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai'

export type RemoteResult = Result<string>

export interface SendOptions {
  onDelta?: (delta: string) => void
}

export interface RemoteChat {
  readonly model: string
  /** Turns accepted so far, oldest first. */
  readonly history: readonly ChatMessage[]
  sendMessage: (text: string, opts?: SendOptions) => Promise<RemoteResult>
}

export interface GeminiChatOptions {
  apiKey: string
  model: string
  systemPrompt?: string
  maxContextTokens?: number
  fetchImpl?: FetchLike
}

const errorMessage = (e: unknown): string => (e instanceof Error ? e.message : String(e))

class GeminiChat implements RemoteChat {
  private readonly turns: ChatMessage[] = []

  constructor(private readonly opts: GeminiChatOptions) {}

  get model(): string {
    return this.opts.model
  }

  get history(): readonly ChatMessage[] {
    return this.turns
  }

  async sendMessage(text: string, sendOpts: SendOptions = {}): Promise<RemoteResult> {
    const { apiKey, model, systemPrompt, maxContextTokens, fetchImpl } = this.opts
    const userTurn: ChatMessage = { role: 'user', content: text }
    const messages = buildChatContext({ systemPrompt, turns: [...this.turns, userTurn], maxTokens: maxContextTokens })
    let reply = ''
    try {
      await streamOpenAiCompat({
        apiKey,
        baseUrl: GEMINI_BASE_URL,
        model,
        messages,
        onDelta: (delta) => {
          reply += delta
          sendOpts.onDelta?.(delta)
        },
        fetchImpl,
      })
    } catch (e) {
      return { ok: false, error: errorMessage(e) }
    }
    if (!reply.trim()) return { ok: false, error: 'Gemini response had no text content' }
    this.turns.push(userTurn, { role: 'assistant', content: reply })
    return { ok: true, value: reply }
  }
}

/** Throws when the client cannot be set up, e.g. on a malformed key. */
export const createGeminiChat = (opts: GeminiChatOptions): RemoteChat => {
  const key = apiKeySchema.safeParse(opts.apiKey)
  if (!key.success) {
    throw new Error(key.error.issues[0]?.message ?? 'Invalid API key')
  }
  return new GeminiChat({ ...opts, apiKey: key.data, model: mapUiModelToApi(opts.model) })
}
