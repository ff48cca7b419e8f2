const BASE_SCORE = 12
const PER_MESSAGE = 1

// Cosmetic only, not derived from any emissions data.
export const computeCarbonScore = (historyLength: number): number => {
  const score = Math.trunc(BASE_SCORE + historyLength * PER_MESSAGE)
  return Math.min(Math.max(score, 0), 100)
}
