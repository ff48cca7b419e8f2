import React from 'react'
import { computeCarbonScore } from '../lib/carbonScore'

const TIPS = [
  'Use public transport or cycle when possible 🚲',
  'Reduce meat consumption a few days a week 🥗',
  'Turn off lights and devices when not in use 💡',
]

export const CarbonSidebar: React.FC<{ historyLength: number }> = ({ historyLength }) => {
  const score = computeCarbonScore(historyLength)
  return (
    <aside className="w-full md:w-[260px] shrink-0 space-y-3">
      <h2 className="text-lg font-semibold text-carbon-700">Your Carbon Score</h2>
      <div className="carbon-card">
        <div className="text-xs text-gray-600">Estimated footprint (kg CO₂/day)</div>
        <div className="text-3xl font-bold text-carbon-900" data-testid="carbon-score">{score}</div>
        <div
          className="mt-2 h-2 w-full rounded bg-carbon-100"
          role="progressbar"
          aria-valuemin={0}
          aria-valuemax={100}
          aria-valuenow={score}
        >
          <div className="h-2 rounded bg-carbon-700" style={{ width: `${score}%` }} />
        </div>
      </div>
      <div className="carbon-card">
        <strong className="text-sm">Tips to reduce footprint</strong>
        <ul className="mt-1 list-disc pl-5 text-sm">
          {TIPS.map(t => <li key={t}>{t}</li>)}
        </ul>
      </div>
    </aside>
  )
}
