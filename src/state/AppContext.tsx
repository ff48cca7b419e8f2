import React, { createContext, useCallback, useContext, useEffect, useMemo, useReducer } from 'react'
import type { AppConfig, Message, Notice, Session } from '../types'
import { loadConfig } from '../lib/config'
import { selectMode, type SelectModeOptions } from '../lib/modeSelector'
import { appendMessage, createMessage, createSession } from '../lib/session'
import { resolveReply } from '../lib/resolver'
import { logNotice } from '../lib/notices'
import { messageInputSchema } from '../lib/schemas'

export type State = {
  session: Session
  notices: Notice[]
  pending: boolean
  // streamed text of the reply in flight
  draft: string
}

export type Action =
  | { type: 'addMessage'; message: Message }
  | { type: 'pushNotice'; notice: Notice }
  | { type: 'dismissNotice'; id: string }
  | { type: 'startReply' }
  | { type: 'appendDraft'; delta: string }
  | { type: 'finishReply'; message: Message }

export const initState = (config: AppConfig, options?: SelectModeOptions): State => {
  const selection = selectMode(config, options)
  return { session: createSession(selection), notices: selection.notices, pending: false, draft: '' }
}

export const reducer = (state: State, action: Action): State => {
  switch (action.type) {
    case 'addMessage': {
      return { ...state, session: appendMessage(state.session, action.message) }
    }
    case 'pushNotice': {
      return { ...state, notices: [...state.notices, action.notice] }
    }
    case 'dismissNotice': {
      return { ...state, notices: state.notices.filter(n => n.id !== action.id) }
    }
    case 'startReply': {
      return { ...state, pending: true, draft: '' }
    }
    case 'appendDraft': {
      return { ...state, draft: state.draft + action.delta }
    }
    case 'finishReply': {
      return { ...state, session: appendMessage(state.session, action.message), pending: false, draft: '' }
    }
    default:
      return state
  }
}

type AppCtxValue = {
  state: State
  dispatch: React.Dispatch<Action>
  send: (content: string) => Promise<void>
}

const AppCtx = createContext<AppCtxValue | undefined>(undefined)

export interface AppProviderProps {
  children: React.ReactNode
  config?: AppConfig
  selectOptions?: SelectModeOptions
}

export const AppProvider: React.FC<AppProviderProps> = ({ children, config, selectOptions }) => {
  // mode selection runs once, in the lazy initializer
  const [state, dispatch] = useReducer(reducer, undefined, () => initState(config ?? loadConfig(), selectOptions))

  useEffect(() => {
    for (const n of state.notices) logNotice(n)
    // startup notices only; later ones are logged where they are raised
  }, [])

  const { mode, remote } = state.session
  const pending = state.pending

  const send = useCallback(async (content: string) => {
    // validated trimmed, but stored and sent exactly as typed
    if (!messageInputSchema.safeParse({ content }).success || pending) return
    dispatch({ type: 'addMessage', message: createMessage('user', content) })
    dispatch({ type: 'startReply' })
    const reply = await resolveReply({ mode, remote }, content, {
      onDelta: (delta) => dispatch({ type: 'appendDraft', delta }),
      onNotice: (notice) => {
        logNotice(notice)
        dispatch({ type: 'pushNotice', notice })
      },
    })
    dispatch({ type: 'finishReply', message: createMessage('assistant', reply) })
  }, [mode, remote, pending])

  const value = useMemo(() => ({ state, dispatch, send }), [state, send])
  return <AppCtx.Provider value={value}>{children}</AppCtx.Provider>
}

export const useApp = () => {
  const ctx = useContext(AppCtx)
  if (!ctx) throw new Error('useApp must be used within AppProvider')
  return ctx
}
