import React from 'react'
import type { Notice, NoticeLevel } from '../types'

const LEVEL_CLASSES: Record<NoticeLevel, string> = {
  info: 'bg-sky-50 border-sky-200 text-sky-900',
  warning: 'bg-amber-50 border-amber-200 text-amber-900',
  error: 'bg-red-50 border-red-200 text-red-800',
}

export const NoticeList: React.FC<{ notices: Notice[]; onDismiss: (id: string) => void }> = ({ notices, onDismiss }) => {
  if (notices.length === 0) return null
  return (
    <div className="space-y-2">
      {notices.map(n => (
        <div key={n.id} role={n.level === 'info' ? 'status' : 'alert'} className={`flex items-start gap-2 border rounded-xl px-3 py-2 text-sm ${LEVEL_CLASSES[n.level]}`}>
          <div className="flex-1">{n.text}</div>
          <button className="text-xs underline" onClick={() => onDismiss(n.id)} aria-label="Dismiss">Dismiss</button>
        </div>
      ))}
    </div>
  )
}
