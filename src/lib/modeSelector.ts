import type { AppConfig, Mode, Notice, Session } from '../types'
import { createGeminiChat, type GeminiChatOptions, type RemoteChat } from './geminiClient'
import { createNotice } from './notices'

export const OFFLINE_NOTICE =
  'Running in offline mode — no GOOGLE_API_KEY found. The chatbot will use simple fallback replies.'

export const initFailedNotice = (reason: string): string =>
  `Could not initialize Gemini API; falling back to offline mode. (${reason})`

export interface ModeSelection {
  mode: Mode
  remote?: RemoteChat
  notices: Notice[]
}

export interface SelectModeOptions {
  // a session that already owns a remote context keeps it
  current?: Pick<Session, 'remote'>
  createClient?: (opts: GeminiChatOptions) => RemoteChat
  systemPrompt?: string
  maxContextTokens?: number
}

export const selectMode = (config: AppConfig, options: SelectModeOptions = {}): ModeSelection => {
  const { current, createClient = createGeminiChat, systemPrompt, maxContextTokens } = options
  if (current?.remote) return { mode: 'online', remote: current.remote, notices: [] }

  if (!config.apiKey) {
    return { mode: 'offline', notices: [createNotice('info', OFFLINE_NOTICE)] }
  }
  try {
    const remote = createClient({ apiKey: config.apiKey, model: config.model, systemPrompt, maxContextTokens })
    return { mode: 'online', remote, notices: [] }
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e)
    return { mode: 'offline', notices: [createNotice('warning', initFailedNotice(reason))] }
  }
}
