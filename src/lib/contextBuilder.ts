export interface ChatMessage {
  role: 'system' | 'user' | 'assistant'
  content: string
}

export const approxTokenCount = (text: string): number => {
  // crude approximation: 1 token ~ 4 chars
  return Math.ceil(text.length / 4)
}

export const countMessagesTokens = (msgs: ChatMessage[]): number => msgs.reduce((acc, m) => acc + approxTokenCount(m.content), 0)

export interface BuildChatContextParams {
  systemPrompt?: string
  turns: ChatMessage[]
  maxTokens?: number
}

export const buildChatContext = (params: BuildChatContextParams): ChatMessage[] => {
  const { systemPrompt, turns, maxTokens = 32000 } = params
  const out: ChatMessage[] = []
  if (systemPrompt) out.push({ role: 'system', content: systemPrompt })
  for (const t of turns) out.push({ role: t.role, content: t.content })

  // trim oldest non-system turns, never the newest one
  const start = systemPrompt ? 1 : 0
  while (countMessagesTokens(out) > maxTokens && out.length > start + 1) {
    out.splice(start, 1)
  }
  return out
}
