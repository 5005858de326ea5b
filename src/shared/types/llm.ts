/** 上游 API 连接配置 */
export interface UpstreamConfig {
  baseURL: string
  apiKey: string
}

export type ChatRole = 'system' | 'user' | 'assistant'

/** 聊天消息（上游 chat-completions 格式） */
export interface ChatMessage {
  role: ChatRole
  content: string | ChatMessageContent[]
}

/** 多模态消息内容 */
export type ChatMessageContent =
  | { type: 'text'; text: string }
  | { type: 'image_url'; image_url: { url: string } }

/** 用户附加的图片，url 为 data URL */
export interface ImageAttachment {
  url: string
  /** 原始文件路径，仅用于展示 */
  source?: string
}

/** 会话历史中的一轮 */
export interface ConversationTurn {
  role: 'user' | 'assistant'
  content: string
  image?: ImageAttachment
}

export type ReasoningEffort = 'low' | 'medium' | 'high'

export const REASONING_EFFORTS: readonly ReasoningEffort[] = ['low', 'medium', 'high']

/** 根据模型 ID 推断出的能力 */
export interface ModelProfile {
  identifier: string
  supportsReasoningEffort: boolean
  supportsReasoningToggle: boolean
  supportsImageOutput: boolean
}

/** 用户可调的请求参数 */
export interface RequestParams {
  temperature?: number
  maxTokens: number
  effort?: ReasoningEffort
  topP?: number
}

/** 构建完成、只读的上游请求 */
export interface RequestDescriptor {
  readonly model: string
  readonly messages: readonly ChatMessage[]
  readonly temperature?: number
  readonly top_p?: number
  readonly max_tokens: number
  readonly stream: boolean
  /** 上游特定的可选字段，发送时展开到请求体顶层 */
  readonly extra: Readonly<Record<string, unknown>>
}

/** 流式响应的一个增量片段 */
export interface StreamFragment {
  content?: string
  reasoning?: string
  /** 内联生成的图片（data URL） */
  images?: string[]
}

export type StreamStatus = 'streaming' | 'done' | 'cancelled' | 'error'

/** 聚合后对 UI 可见的流状态快照 */
export interface StreamSnapshot {
  answer: string
  reasoning: string
  images: string[]
  status: StreamStatus
  error?: string
}

/** 非流式调用的结果 */
export interface CompletionResult {
  text: string
  images: string[]
}
