/**
 * @jest-environment node
 */
import { GEMINI_BASE_URL, createGeminiChat } from '../src/lib/geminiClient'
import type { StreamingResponse } from '../src/lib/openAiCompatClient'
import { resolveReply } from '../src/lib/resolver'

const encoder = new TextEncoder()

const sseResponse = (chunks: string[]): StreamingResponse => {
  const queue = chunks.map(c => encoder.encode(c))
  return {
    ok: true,
    status: 200,
    text: async () => '',
    body: {
      getReader: () => ({
        read: async () => {
          const value = queue.shift()
          return value ? { done: false, value } : { done: true }
        },
      }),
    },
  }
}

const deltaLine = (content: string) => `data: ${JSON.stringify({ choices: [{ delta: { content } }] })}\n`

// same line without its trailing newline
const lastLine = (content: string) => deltaLine(content).slice(0, -1)

const failedResponse = (status: number, text: string): StreamingResponse => ({
  ok: false,
  status,
  text: async () => text,
  body: null,
})

const mockFetch = (...responses: StreamingResponse[]) =>
  jest.fn<Promise<StreamingResponse>, [string, RequestInit]>(async () => {
    const next = responses.shift()
    if (!next) throw new Error('unexpected request')
    return next
  })

const sentMessages = (fetchImpl: ReturnType<typeof mockFetch>, call: number): unknown => {
  const body = fetchImpl.mock.calls[call][1].body
  return JSON.parse(String(body)).messages
}

describe('gemini chat client', () => {
  test('rejects a malformed key at creation', () => {
    expect(() => createGeminiChat({ apiKey: 'short', model: 'gemini-2.5-flash' })).toThrow('API key looks too short')
  })

  test('normalizes the model id', () => {
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'models/gemini-2.5-pro' })
    expect(chat.model).toBe('gemini-2.5-pro')
    expect(chat.history).toEqual([])
  })

  test('concatenates streamed deltas', async () => {
    const fetchImpl = mockFetch(sseResponse([deltaLine('Hel'), deltaLine('lo'), 'data: [DONE]\n']))
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', fetchImpl })
    const deltas: string[] = []

    const result = await chat.sendMessage('hi', { onDelta: d => deltas.push(d) })

    expect(result).toEqual({ ok: true, value: 'Hello' })
    expect(deltas).toEqual(['Hel', 'lo'])
    const [url, init] = fetchImpl.mock.calls[0]
    expect(url).toBe(`${GEMINI_BASE_URL}/chat/completions`)
    expect(init.headers).toEqual({ 'content-type': 'application/json', 'authorization': 'Bearer test-secret-key' })
    expect(JSON.parse(String(init.body))).toEqual({
      model: 'gemini-2.5-flash',
      messages: [{ role: 'user', content: 'hi' }],
      stream: true,
    })
  })

  test('handles lines split across chunks and skips malformed ones', async () => {
    const line = deltaLine('Hi there')
    const fetchImpl = mockFetch(sseResponse(['data: {not json\n', line.slice(0, 20), line.slice(20)]))
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', fetchImpl })

    expect(await chat.sendMessage('hi')).toEqual({ ok: true, value: 'Hi there' })
  })

  test('keeps the conversation context across calls', async () => {
    const fetchImpl = mockFetch(sseResponse([deltaLine('first')]), sseResponse([deltaLine('second')]))
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', systemPrompt: 'be kind', fetchImpl })

    await chat.sendMessage('one')
    await chat.sendMessage('two')

    expect(sentMessages(fetchImpl, 1)).toEqual([
      { role: 'system', content: 'be kind' },
      { role: 'user', content: 'one' },
      { role: 'assistant', content: 'first' },
      { role: 'user', content: 'two' },
    ])
    expect(chat.history).toHaveLength(4)
  })

  test('parses a final line that has no trailing newline', async () => {
    const fetchImpl = mockFetch(sseResponse([deltaLine('Hello '), lastLine('world')]))
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', fetchImpl })

    expect(await chat.sendMessage('hi')).toEqual({ ok: true, value: 'Hello world' })
  })

  test('an unterminated single line is still a remote answer', async () => {
    const fetchImpl = mockFetch(sseResponse([lastLine('Only line')]))
    const remote = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', fetchImpl })

    expect(await resolveReply({ mode: 'online', remote }, 'hi')).toBe('Only line')
  })

  test('skips empty data lines instead of ending the stream', async () => {
    const fetchImpl = mockFetch(sseResponse([deltaLine('A'), 'data:\n', deltaLine('B'), 'data: [DONE]\n', deltaLine('ignored')]))
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', fetchImpl })

    expect(await chat.sendMessage('hi')).toEqual({ ok: true, value: 'AB' })
  })

  test('trims the sent context to the token budget', async () => {
    const fetchImpl = mockFetch(sseResponse([deltaLine('first')]), sseResponse([deltaLine('second')]))
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', systemPrompt: 'sys', maxContextTokens: 2, fetchImpl })

    await chat.sendMessage('one')
    await chat.sendMessage('two')

    expect(sentMessages(fetchImpl, 1)).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'two' },
    ])
    expect(chat.history).toHaveLength(4)
  })

  test('returns the provider error text and leaves the context unchanged', async () => {
    const fetchImpl = mockFetch(failedResponse(500, 'boom'))
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', fetchImpl })

    expect(await chat.sendMessage('hi')).toEqual({ ok: false, error: 'boom' })
    expect(chat.history).toEqual([])
  })

  test('falls back to the status code when the error body is empty', async () => {
    const fetchImpl = mockFetch(failedResponse(401, ''))
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', fetchImpl })

    expect(await chat.sendMessage('hi')).toEqual({ ok: false, error: 'Provider request failed: 401' })
  })

  test('treats transport errors and empty replies as failures', async () => {
    const fetchImpl = mockFetch(sseResponse(['data: [DONE]\n']))
    const chat = createGeminiChat({ apiKey: 'test-secret-key', model: 'gemini-2.5-flash', fetchImpl })

    expect(await chat.sendMessage('hi')).toEqual({ ok: false, error: 'Gemini response had no text content' })
    expect(await chat.sendMessage('again')).toEqual({ ok: false, error: 'unexpected request' })
    expect(chat.history).toEqual([])
  })
})
