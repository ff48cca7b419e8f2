// Canned replies used whenever Gemini is not reachable. Order matters: the
// first rule with a matching keyword wins.
const RULES: { keywords: string[]; reply: string }[] = [
  {
    keywords: ['joke', 'funny', 'make me laugh'],
    reply: 'Why did the tomato blush? Because it saw the salad dressing! 😄',
  },
  {
    keywords: ['story', 'bedtime', 'tell me a story'],
    reply: 'Once upon a time a little star learned to shine. The end. ✨',
  },
  {
    keywords: ['riddle', 'puzzle'],
    reply: "What has keys but can't open locks? A keyboard!",
  },
]

export const JOKE_REPLY = RULES[0].reply
export const STORY_REPLY = RULES[1].reply
export const RIDDLE_REPLY = RULES[2].reply
export const GENERIC_REPLY =
  "I can't reach the helper brain right now, but I'd love to help — try rephrasing your question or check your API key."

export const matchOffline = (query: string): string => {
  const q = query.toLowerCase()
  const rule = RULES.find(r => r.keywords.some(k => q.includes(k)))
  return rule ? rule.reply : GENERIC_REPLY
}
