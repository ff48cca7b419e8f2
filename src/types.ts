import type { RemoteChat } from './lib/geminiClient'

export type Role = 'user' | 'assistant'

export type Mode = 'online' | 'offline'

export interface Message {
  readonly id: string
  readonly role: Role
  readonly text: string
  readonly createdAt: number
}

export interface Session {
  readonly messages: readonly Message[]
  readonly mode: Mode
  // only present while online
  readonly remote?: RemoteChat
}

export type NoticeLevel = 'info' | 'warning' | 'error'

export interface Notice {
  readonly id: string
  readonly level: NoticeLevel
  readonly text: string
}

export interface AppConfig {
  apiKey?: string
  model: string
}
