import type { ChatMessage } from './contextBuilder'

type StreamReadResult = { done: boolean; value?: Uint8Array }

// The slice of `Response` the streaming loop reads; `fetch` satisfies it.
export interface StreamingResponse {
  ok: boolean
  status: number
  body: { getReader: () => { read: () => Promise<StreamReadResult> } } | null
  text: () => Promise<string>
}

export type FetchLike = (url: string, init: RequestInit) => Promise<StreamingResponse>

export interface OpenAiCompatStreamOptions {
  apiKey: string
  baseUrl: string
  model: string
  messages: ChatMessage[]
  temperature?: number
  maxTokens?: number
  onDelta: (delta: string) => void
  fetchImpl?: FetchLike
}

const defaultFetch: FetchLike = (url, init) => fetch(url, init)

const extractDeltaText = (json: unknown): string[] => {
  if (!json || typeof json !== 'object' || !('choices' in json) || !Array.isArray(json.choices)) return []
  const choice: unknown = json.choices[0]
  if (!choice || typeof choice !== 'object' || !('delta' in choice)) return []
  const delta: unknown = choice.delta
  if (!delta || typeof delta !== 'object' || !('content' in delta)) return []
  const content: unknown = delta.content
  if (typeof content === 'string') return [content]
  if (!Array.isArray(content)) return []
  const out: string[] = []
  for (const part of content) {
    if (part && typeof part === 'object' && 'text' in part && typeof part.text === 'string') out.push(part.text)
  }
  return out
}

// Returns 'done' on the [DONE] sentinel; empty and malformed lines are skipped.
const handleLine = (raw: string, onDelta: (delta: string) => void): 'done' | undefined => {
  const line = raw.trim()
  if (!line.startsWith('data:')) return undefined
  const data = line.slice(5).trim()
  if (data === '[DONE]') return 'done'
  if (!data) return undefined
  let json: unknown
  try {
    json = JSON.parse(data)
  } catch {
    return undefined
  }
  for (const text of extractDeltaText(json)) onDelta(text)
  return undefined
}

export const streamOpenAiCompat = async (opts: OpenAiCompatStreamOptions): Promise<void> => {
  const { apiKey, baseUrl, model, messages, temperature, maxTokens, onDelta, fetchImpl = defaultFetch } = opts

  const payload: Record<string, unknown> = {
    model,
    messages: messages.map(m => ({ role: m.role, content: m.content })),
    stream: true,
  }
  if (typeof temperature === 'number') payload.temperature = temperature
  if (typeof maxTokens === 'number') payload.max_tokens = maxTokens

  const res = await fetchImpl(`${baseUrl}/chat/completions`, {
    method: 'POST',
    headers: {
      'content-type': 'application/json',
      'authorization': `Bearer ${apiKey}`,
    },
    body: JSON.stringify(payload),
  })
  if (!res.ok || !res.body) {
    const text = await res.text().catch(() => '')
    throw new Error(text || `Provider request failed: ${res.status}`)
  }

  const reader = res.body.getReader()
  const decoder = new TextDecoder('utf-8')
  let done = false
  let buffer = ''
  while (!done) {
    const { value, done: d } = await reader.read()
    done = d
    if (value) buffer += decoder.decode(value, { stream: true })
    let idx
    while ((idx = buffer.indexOf('\n')) >= 0) {
      const line = buffer.slice(0, idx)
      buffer = buffer.slice(idx + 1)
      if (handleLine(line, onDelta) === 'done') return
    }
  }
  // last line may arrive without a trailing newline
  buffer += decoder.decode()
  handleLine(buffer, onDelta)
}
