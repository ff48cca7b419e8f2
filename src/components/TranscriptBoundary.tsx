import React from 'react'

export const transcriptErrorNotice = (reason: string): string => `The conversation could not be displayed: ${reason}`

type Props = React.PropsWithChildren<{
  // a new value (e.g. history length) clears a caught error
  resetKey: number
  onError: (reason: string) => void
}>

type State = { reason?: string }

const reasonOf = (error: unknown): string => (error instanceof Error ? error.message : String(error))

export class TranscriptBoundary extends React.Component<Props, State> {
  state: State = {}

  static getDerivedStateFromError(error: unknown): State {
    return { reason: reasonOf(error) }
  }

  componentDidCatch(error: unknown) {
    this.props.onError(reasonOf(error))
  }

  componentDidUpdate(prev: Props) {
    if (this.state.reason !== undefined && prev.resetKey !== this.props.resetKey) this.retry()
  }

  retry = () => this.setState({ reason: undefined })

  render() {
    if (this.state.reason === undefined) return this.props.children
    return (
      <div role="alert" className="carbon-card flex items-center gap-3 text-sm">
        <span aria-hidden>🌱</span>
        <div className="flex-1">Your chat is still here, it just could not be drawn ({this.state.reason}).</div>
        <button className="px-2 py-1 border rounded text-carbon-700" onClick={this.retry}>Show again</button>
      </div>
    )
  }
}
