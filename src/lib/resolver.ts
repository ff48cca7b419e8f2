import type { Notice, Session } from '../types'
import type { RemoteResult } from './geminiClient'
import { matchOffline } from './fallback'
import { createNotice } from './notices'

export const remoteErrorNotice = (reason: string): string =>
  `An error occurred while getting the response: ${reason}`

export interface ResolveOptions {
  onDelta?: (delta: string) => void
  onNotice?: (notice: Notice) => void
}

/**
 * Produces the assistant reply for `query`. Never rejects: a failed remote
 * call surfaces an error notice and answers from the offline matcher for this
 * call only, leaving `session.mode` as it was.
 */
export const resolveReply = async (
  session: Pick<Session, 'mode' | 'remote'>,
  query: string,
  opts: ResolveOptions = {},
): Promise<string> => {
  const { remote } = session
  if (session.mode === 'offline' || !remote) return matchOffline(query)

  let result: RemoteResult
  try {
    result = await remote.sendMessage(query, { onDelta: opts.onDelta })
  } catch (e) {
    result = { ok: false, error: e instanceof Error ? e.message : String(e) }
  }
  if (result.ok) return result.value

  opts.onNotice?.(createNotice('error', remoteErrorNotice(result.error)))
  return matchOffline(query)
}
