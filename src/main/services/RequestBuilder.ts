import { z } from 'zod'
import type {
  ChatMessage,
  ChatMessageContent,
  ConversationTurn,
  RequestDescriptor,
  RequestParams,
} from '@shared/types/llm'
import { API_KEY_ENV, DEFAULT_IMAGE_PROMPT, MAX_TOKENS_RANGE, TEMPERATURE_RANGE } from '@shared/constants'
import { ConfigurationError, ValidationError } from '../errors'
import { buildReasoningFields, resolveModelProfile, type ExtraFields } from './modelProfiles'

export interface BuildOptions {
  /** 非空时作为 system 消息放在最前 */
  instructions?: string
}

const DEFAULT_TOP_P = 1.0

const turnSchema = z.object({
  role: z.enum(['user', 'assistant']),
  content: z.string(),
  image: z.object({ url: z.string().min(1, 'Image data must not be empty') }).passthrough().optional(),
})

const historySchema = z
  .array(turnSchema)
  .min(1, 'Conversation history must not be empty')
  .refine((turns) => turns[turns.length - 1]?.role === 'user', {
    message: 'Conversation history must end with a user turn',
  })

const paramsSchema = z.object({
  temperature: z
    .number()
    .min(TEMPERATURE_RANGE.min, `temperature must be between ${TEMPERATURE_RANGE.min} and ${TEMPERATURE_RANGE.max}`)
    .max(TEMPERATURE_RANGE.max, `temperature must be between ${TEMPERATURE_RANGE.min} and ${TEMPERATURE_RANGE.max}`)
    .optional(),
  maxTokens: z
    .number()
    .int('max_tokens must be an integer')
    .min(MAX_TOKENS_RANGE.min, `max_tokens must be between ${MAX_TOKENS_RANGE.min} and ${MAX_TOKENS_RANGE.max}`)
    .max(MAX_TOKENS_RANGE.max, `max_tokens must be between ${MAX_TOKENS_RANGE.min} and ${MAX_TOKENS_RANGE.max}`),
  effort: z.enum(['low', 'medium', 'high']).optional(),
  topP: z.number().min(0).max(1).optional(),
})

const modelSchema = z.string().trim().min(1, 'Model identifier must not be empty')

function check<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid request')
  }
  return result.data
}

function validateInputs(history: readonly ConversationTurn[], model: string, params: RequestParams): void {
  check(historySchema, history)
  check(modelSchema, model)
  check(paramsSchema, params)
}

/** 请求前检查凭证，缺失时直接失败 */
export function assertCredential(apiKey: string | undefined): asserts apiKey is string {
  if (!apiKey || !apiKey.trim()) {
    throw new ConfigurationError(`${API_KEY_ENV} is not set`)
  }
}

/** 图片消息：文本在前，图片在后；没有文本时使用默认提示词 */
export function buildImageContent(prompt: string, imageUrl: string): ChatMessageContent[] {
  return [
    { type: 'text', text: prompt.trim() ? prompt : DEFAULT_IMAGE_PROMPT },
    { type: 'image_url', image_url: { url: imageUrl } },
  ]
}

export function buildConversationMessages(
  history: readonly ConversationTurn[],
  instructions?: string,
): ChatMessage[] {
  const messages: ChatMessage[] = []
  if (instructions?.trim()) {
    messages.push({ role: 'system', content: instructions })
  }

  for (const turn of history) {
    // 跳过流式回答的空占位
    if (turn.role === 'assistant' && turn.content === '') continue
    if (turn.role === 'user' && turn.image) {
      messages.push({ role: 'user', content: buildImageContent(turn.content, turn.image.url) })
      continue
    }
    messages.push({ role: turn.role, content: turn.content })
  }
  return messages
}

function freezeDescriptor(descriptor: RequestDescriptor): RequestDescriptor {
  for (const message of descriptor.messages) {
    Object.freeze(message)
  }
  Object.freeze(descriptor.messages)
  Object.freeze(descriptor.extra)
  return Object.freeze(descriptor)
}

/** 流式聊天请求，按模型附加推理字段 */
export function buildChatRequest(
  history: readonly ConversationTurn[],
  model: string,
  params: RequestParams,
  options: BuildOptions = {},
): RequestDescriptor {
  validateInputs(history, model, params)

  const extra: ExtraFields = params.effort ? buildReasoningFields(model, params.effort) : {}

  return freezeDescriptor({
    model,
    messages: buildConversationMessages(history, options.instructions),
    ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
    top_p: params.topP ?? DEFAULT_TOP_P,
    max_tokens: params.maxTokens,
    stream: true,
    extra,
  })
}

/**
 * 单次阻塞的分析请求。
 * 最新一轮没有图片且模型能输出图片时，请求同时返回图片和文本。
 */
export function buildAnalysisRequest(
  history: readonly ConversationTurn[],
  model: string,
  params: RequestParams,
  options: BuildOptions = {},
): RequestDescriptor {
  validateInputs(history, model, params)

  const latest = history[history.length - 1]
  const extra: ExtraFields = {}
  if (!latest?.image && resolveModelProfile(model).supportsImageOutput) {
    extra.modalities = ['image', 'text']
  }

  return freezeDescriptor({
    model,
    messages: buildConversationMessages(history, options.instructions),
    ...(params.temperature !== undefined ? { temperature: params.temperature } : {}),
    max_tokens: params.maxTokens,
    stream: false,
    extra,
  })
}
