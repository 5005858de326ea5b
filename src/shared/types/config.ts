import type { ReasoningEffort } from './llm'

export type ScreenId = 'chat' | 'studio'

/** 单个界面的文本配置文件 */
export interface ScreenFiles {
  modelsFile: string
  systemPromptFile: string
}

/** 单个界面加载完成后的配置 */
export interface ScreenConfig {
  models: string[]
  defaultModel: string
  systemPrompt: string
}

export interface LoggingConfig {
  dir: string
  level: 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly'
}

/** 应用配置（由环境变量解析） */
export interface AppConfig {
  apiKey: string
  baseURL: string
  configDir: string
  logging: LoggingConfig
}

/** 聊天界面可调参数 */
export interface ChatSettings {
  model: string
  instructions: string
  temperature: number
  maxTokens: number
  effort: ReasoningEffort
}

/** 图片工作室可调参数 */
export interface StudioSettings {
  model: string
  instructions: string
  maxTokens: number
}
