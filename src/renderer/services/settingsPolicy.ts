import { MAX_TOKENS_RANGE, STUDIO_MAX_TOKENS_RANGE, TEMPERATURE_RANGE } from '@shared/constants'

export type SettingCheck = { ok: true } | { ok: false; reason: string }

const OK: SettingCheck = { ok: true }

export function checkTemperature(value: number): SettingCheck {
  if (value < TEMPERATURE_RANGE.min || value > TEMPERATURE_RANGE.max) {
    return { ok: false, reason: `Temperature must be between ${TEMPERATURE_RANGE.min} and ${TEMPERATURE_RANGE.max}` }
  }
  return OK
}

export function checkMaxTokens(value: number, screen: 'chat' | 'studio'): SettingCheck {
  const range = screen === 'studio' ? STUDIO_MAX_TOKENS_RANGE : MAX_TOKENS_RANGE
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    return { ok: false, reason: `Max tokens must be an integer between ${range.min} and ${range.max}` }
  }
  return OK
}

/** /models 输出：带序号，当前模型加标记 */
export function formatModelList(models: readonly string[], current: string): string[] {
  return models.map((model, index) => `${model === current ? '*' : ' '} ${index + 1}. ${model}`)
}
