export type UiModelId =
  | 'gemini-2.5-flash'
  | 'gemini-2.5-flash-lite'
  | 'gemini-2.5-pro'

export const DEFAULT_MODEL: UiModelId = 'gemini-2.5-flash'

export const UI_MODELS: { id: UiModelId; label: string }[] = [
  { id: 'gemini-2.5-flash', label: 'Gemini 2.5 Flash' },
  { id: 'gemini-2.5-flash-lite', label: 'Gemini 2.5 Flash-Lite' },
  { id: 'gemini-2.5-pro', label: 'Gemini 2.5 Pro' },
]

export const mapUiModelToApi = (id: UiModelId | string): string => {
  // tolerate the `models/` prefix the native Gemini API uses
  const bare = id.startsWith('models/') ? id.slice('models/'.length) : id
  switch (bare) {
    case 'gemini-flash':
      return 'gemini-2.5-flash'
    case 'gemini-flash-lite':
      return 'gemini-2.5-flash-lite'
    case 'gemini-pro':
      return 'gemini-2.5-pro'
    default:
      return bare
  }
}

export const modelLabel = (id: string): string => {
  const apiModel = mapUiModelToApi(id)
  return UI_MODELS.find(m => m.id === apiModel)?.label ?? apiModel
}
