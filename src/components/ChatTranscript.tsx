import React from 'react'
import type { Message, Role } from '../types'

const AVATARS: Record<Role, string> = { user: '🧑‍💻', assistant: '🤖' }

const BUBBLE_CLASSES: Record<Role, string> = {
  user: 'bg-gradient-to-r from-carbon-100 to-carbon-50',
  assistant: 'bg-gradient-to-r from-[#FFFAF0] to-[#F5F5F0]',
}

const Bubble: React.FC<{ role: Role; children: React.ReactNode }> = ({ role, children }) => (
  <div className={`chat-bubble flex items-start gap-3 ${BUBBLE_CLASSES[role]}`} data-role={role}>
    <span aria-hidden className="text-xl leading-6">{AVATARS[role]}</span>
    <div className="whitespace-pre-wrap text-[15px] leading-6">{children}</div>
  </div>
)

export interface ChatTranscriptProps {
  messages: readonly Message[]
  pending: boolean
  draft: string
}

export const ChatTranscript: React.FC<ChatTranscriptProps> = ({ messages, pending, draft }) => (
  <div className="space-y-3" aria-live="polite">
    {messages.map(m => (
      <Bubble key={m.id} role={m.role}>{m.text}</Bubble>
    ))}
    {pending && (
      <Bubble role="assistant">{draft || <span className="text-gray-500">Thinking...</span>}</Bubble>
    )}
  </div>
)
