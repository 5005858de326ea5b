import type { ScreenFiles, ScreenId } from './types/config'
import type { ReasoningEffort } from './types/llm'

/** 应用名称 */
export const APP_NAME = 'router-chat'

/** 默认上游地址（包含版本路径，客户端只拼接 /chat/completions） */
export const DEFAULT_BASE_URL = 'https://openrouter.ai/api/v1'

/** 凭证所在环境变量 */
export const API_KEY_ENV = 'OPENROUTER_API_KEY'

/** 各界面读取的文本配置文件 */
export const SCREEN_FILES: Record<ScreenId, ScreenFiles> = {
  chat: { modelsFile: 'models.txt', systemPromptFile: 'system-prompt.txt' },
  studio: { modelsFile: 'models-image.txt', systemPromptFile: 'system-prompt-image.txt' },
}

/** 配置文件缺失时的内置模型列表 */
export const DEFAULT_CHAT_MODELS: readonly string[] = [
  'x-ai/grok-4-fast:free',
  'openai/gpt-oss-120b:free',
  'google/gemini-2.0-flash-exp:free',
  'meta-llama/llama-3.1-405b-instruct:free',
  'qwen/qwen3-235b-a22b:free',
]

export const DEFAULT_STUDIO_MODELS: readonly string[] = [
  'x-ai/grok-4-fast:free',
  'qwen/qwen2.5-vl-72b-instruct:free',
  'google/gemini-2.0-flash-exp:free',
  'meta-llama/llama-4-maverick:free',
  'meta-llama/llama-4-scout:free',
  'mistralai/mistral-small-3.2-24b-instruct:free',
  'moonshotai/kimi-vl-a3b-thinking:free',
  'google/gemma-3-27b-it:free',
  'google/gemini-2.5-flash-image-preview',
  'meta-llama/llama-3.2-90b-vision-instruct',
]

export const DEFAULT_CHAT_SYSTEM_PROMPT = 'You are a helpful assistant.'
export const DEFAULT_STUDIO_SYSTEM_PROMPT = 'You are a helpful multimodal AI assistant.'

/** 只上传图片时使用的提示词 */
export const DEFAULT_IMAGE_PROMPT = 'Describe this image in detail.'

/** 流式刷新间隔 */
export const FLUSH_INTERVAL_MS = 40

/** 模型没有返回推理过程时显示的占位文本 */
export const NO_REASONING_SENTINEL = '*This model does not expose reasoning traces.*'

/** 推理面板初始文本 */
export const REASONING_PLACEHOLDER = '*Reasoning will appear here...*'

/** 流式错误写入回答时的前缀 */
export const STREAM_ERROR_MARKER = '❌ An error occurred:'

/** 非流式调用失败时状态栏前缀 */
export const API_ERROR_MARKER = '❌ An API error occurred:'

/** 只生成了图片时的回答文本 */
export const IMAGE_ONLY_RESPONSE = 'Image generated successfully.'

export const TEMPERATURE_RANGE = { min: 0, max: 2 } as const
export const MAX_TOKENS_RANGE = { min: 100, max: 65535 } as const
export const STUDIO_MAX_TOKENS_RANGE = { min: 8192, max: 65535 } as const

/** 聊天界面默认参数 */
export const DEFAULT_CHAT_PARAMS: { temperature: number; maxTokens: number; effort: ReasoningEffort } = {
  temperature: 1.0,
  maxTokens: 8192,
  effort: 'medium',
}

export const DEFAULT_STUDIO_MAX_TOKENS = 32768

/** 旧日志保留天数 */
export const LOG_RETENTION_DAYS = 7
