import type { ModelProfile, ReasoningEffort } from '@shared/types/llm'

/** 附加到请求体顶层的上游可选字段 */
export type ExtraFields = Record<string, unknown>

interface ReasoningRule {
  name: 'effort' | 'toggle'
  matches: (model: string) => boolean
  build: (effort: ReasoningEffort) => ExtraFields
}

const OPENAI_REASONING_PREFIXES = ['openai/gpt-oss', 'openai/gpt-5']
const FAST_REASONING_PREFIXES = ['x-ai/grok-4-fast']

function includesAny(model: string, needles: readonly string[]): boolean {
  const normalized = model.toLowerCase()
  return needles.some((needle) => normalized.includes(needle))
}

/**
 * 推理字段规则，按优先级依次匹配，首个命中生效。
 * 未命中的模型不附加任何推理字段。
 */
export const REASONING_RULES: readonly ReasoningRule[] = [
  {
    name: 'effort',
    matches: (model) => includesAny(model, OPENAI_REASONING_PREFIXES),
    build: (effort) => ({ reasoning: { effort } }),
  },
  {
    name: 'toggle',
    matches: (model) => includesAny(model, FAST_REASONING_PREFIXES),
    // UI 上的 medium/high 视为开启推理
    build: (effort) => (effort === 'low' ? {} : { reasoning: { enabled: true } }),
  },
]

function findReasoningRule(model: string): ReasoningRule | undefined {
  return REASONING_RULES.find((rule) => rule.matches(model))
}

export function buildReasoningFields(model: string, effort: ReasoningEffort): ExtraFields {
  return findReasoningRule(model)?.build(effort) ?? {}
}

/** 是否为可直接输出图片的模型（如 gemini-2.5-flash-image-preview） */
function isImageOutputModel(model: string): boolean {
  return /[-/]image(?:[-:]|$)/i.test(model)
}

export function resolveModelProfile(model: string): ModelProfile {
  const rule = findReasoningRule(model)
  return {
    identifier: model,
    supportsReasoningEffort: rule?.name === 'effort',
    supportsReasoningToggle: rule?.name === 'toggle',
    supportsImageOutput: isImageOutputModel(model),
  }
}
