import React, { useState } from 'react'
import { AppProvider, useApp, type AppProviderProps } from './state/AppContext'
import { ChatTranscript } from './components/ChatTranscript'
import { CarbonSidebar } from './components/CarbonSidebar'
import { NoticeList } from './components/NoticeList'
import { TranscriptBoundary, transcriptErrorNotice } from './components/TranscriptBoundary'
import { modelLabel } from './lib/models'
import { createNotice, logNotice } from './lib/notices'

const INPUT_PLACEHOLDER = 'Ask me about math, science, history, or any educational topic!'

const Composer: React.FC = () => {
  const { state, send } = useApp()
  const [composer, setComposer] = useState('')

  const onSubmit = async (e: React.FormEvent) => {
    e.preventDefault()
    const text = composer
    if (!text.trim()) return
    setComposer('')
    await send(text)
  }

  return (
    <form className="chat-input flex items-center gap-2" onSubmit={onSubmit}>
      <input
        className="flex-1 p-2 outline-none bg-transparent"
        placeholder={INPUT_PLACEHOLDER}
        aria-label="Message"
        value={composer}
        disabled={state.pending}
        onChange={e => setComposer(e.target.value)}
      />
      <button type="submit" className="px-3 py-2 bg-carbon-700 text-white rounded-[10px] disabled:opacity-50" disabled={state.pending}>
        Send
      </button>
    </form>
  )
}

const ModeBadge: React.FC = () => {
  const { state } = useApp()
  const { mode, remote } = state.session
  const label = mode === 'online' && remote ? `Online · ${modelLabel(remote.model)}` : 'Offline'
  return <span className="text-xs px-2 py-1 border rounded-full text-carbon-700 border-carbon-100" data-testid="mode-badge">{label}</span>
}

const AppInner: React.FC = () => {
  const { state, dispatch } = useApp()
  const { session, notices, pending, draft } = state

  const onTranscriptError = (reason: string) => {
    const notice = createNotice('error', transcriptErrorNotice(reason))
    logNotice(notice)
    dispatch({ type: 'pushNotice', notice })
  }

  return (
    <div className="min-h-screen">
      <div className="mx-auto max-w-5xl p-4 flex flex-col-reverse md:flex-row gap-6">
        <main className="flex-1 flex flex-col gap-4">
          <header className="space-y-1">
            <div className="flex items-center gap-2">
              <h1 className="text-2xl font-bold text-carbon-700">🌍 Carbon Buddy — Chat &amp; Footprint</h1>
              <div className="ml-auto"><ModeBadge /></div>
            </div>
            <p className="text-sm">
              Chat normally and also see a simple carbon footprint indicator in the sidebar. This theme uses a green/earth palette to look like a carbon-footprint tracker.
            </p>
          </header>
          <NoticeList notices={notices} onDismiss={id => dispatch({ type: 'dismissNotice', id })} />
          <Composer />
          <TranscriptBoundary resetKey={session.messages.length} onError={onTranscriptError}>
            <ChatTranscript messages={session.messages} pending={pending} draft={draft} />
          </TranscriptBoundary>
        </main>
        <CarbonSidebar historyLength={session.messages.length} />
      </div>
    </div>
  )
}

const App: React.FC<Omit<AppProviderProps, 'children'>> = (props) => (
  <AppProvider {...props}>
    <AppInner />
  </AppProvider>
)

export default App
