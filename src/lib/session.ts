import { nanoid } from 'nanoid'
import type { Message, Role, Session } from '../types'
import type { ModeSelection } from './modeSelector'

export const createSession = (selection: Pick<ModeSelection, 'mode' | 'remote'>): Session => ({
  messages: [],
  mode: selection.mode,
  remote: selection.mode === 'online' ? selection.remote : undefined,
})

export const createMessage = (role: Role, text: string): Message => ({
  id: nanoid(),
  role,
  text,
  createdAt: Date.now(),
})

export const appendMessage = (session: Session, message: Message): Session => ({
  ...session,
  messages: [...session.messages, message],
})
