import { join, resolve } from 'path'
import { tmpdir } from 'os'
import dotenv from 'dotenv'
import type { AppConfig, LoggingConfig, ScreenConfig, ScreenId } from '@shared/types/config'
import {
  API_KEY_ENV,
  APP_NAME,
  DEFAULT_BASE_URL,
  DEFAULT_CHAT_MODELS,
  DEFAULT_CHAT_SYSTEM_PROMPT,
  DEFAULT_STUDIO_MODELS,
  DEFAULT_STUDIO_SYSTEM_PROMPT,
  SCREEN_FILES,
} from '@shared/constants'
import { hasErrorCode } from '../errors'
import { assertCredential } from '../services/RequestBuilder'
import { getLogger } from '../logger'
import { loadModels, loadSystemPrompt } from './loaders'

const log = getLogger('ConfigManager')

const LOG_LEVELS: ReadonlyArray<LoggingConfig['level']> = ['error', 'warn', 'info', 'verbose', 'debug', 'silly']

const RELOADABLE_KEYS = ['apiKey', 'baseURL'] as const

const SCREEN_FALLBACKS: Record<ScreenId, { models: readonly string[]; systemPrompt: string }> = {
  chat: { models: DEFAULT_CHAT_MODELS, systemPrompt: DEFAULT_CHAT_SYSTEM_PROMPT },
  studio: { models: DEFAULT_STUDIO_MODELS, systemPrompt: DEFAULT_STUDIO_SYSTEM_PROMPT },
}

type Env = Record<string, string | undefined>
type ChangeCallback<K extends keyof AppConfig> = (newValue: AppConfig[K], oldValue: AppConfig[K]) => void
type Listeners = { [K in keyof AppConfig]?: Set<ChangeCallback<K>> }

function parseLogLevel(value: string | undefined): LoggingConfig['level'] {
  const normalized = value?.trim().toLowerCase()
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info'
}

/** 从环境变量解析应用配置 */
export function resolveAppConfig(env: Env, cwd: string = process.cwd()): AppConfig {
  return {
    apiKey: env[API_KEY_ENV]?.trim() ?? '',
    baseURL: env.OPENROUTER_BASE_URL?.trim() || DEFAULT_BASE_URL,
    configDir: resolve(cwd, env.ROUTER_CHAT_CONFIG_DIR?.trim() || 'config'),
    logging: {
      dir: env.ROUTER_CHAT_LOG_DIR?.trim() || join(tmpdir(), APP_NAME, 'logs'),
      level: parseLogLevel(env.ROUTER_CHAT_LOG_LEVEL),
    },
  }
}

/** 加载 .env（存在时）；override 为 false 时已有的环境变量不会被覆盖 */
export function loadDotenv(path?: string, override = false): void {
  const result = dotenv.config({ ...(path ? { path } : {}), override })
  if (result.error && !hasErrorCode(result.error, 'ENOENT')) {
    log.warn('.env 加载失败', { error: result.error.message })
  }
}

export class ConfigManager {
  private config: AppConfig
  private listeners: Listeners = {}

  constructor(env: Env = process.env, private readonly cwd: string = process.cwd()) {
    this.config = resolveAppConfig(env, cwd)
    log.debug('配置已解析', { baseURL: this.config.baseURL, configDir: this.config.configDir })
  }

  /** 读取配置项 */
  get<K extends keyof AppConfig>(key: K): AppConfig[K] {
    return this.config[key]
  }

  /** 写入配置项并触发变更监听 */
  set<K extends keyof AppConfig>(key: K, value: AppConfig[K]): void {
    log.debug('配置更新', { key })
    const oldValue = this.config[key]
    const next = { ...this.config }
    next[key] = value
    this.config = next
    this.notifyListeners(key, value, oldValue)
  }

  /** 监听配置项变更，返回取消订阅函数 */
  onChanged<K extends keyof AppConfig>(key: K, callback: ChangeCallback<K>): () => void {
    const listeners: { [P in K]?: Set<ChangeCallback<P>> } = this.listeners
    const callbacks: Set<ChangeCallback<K>> = listeners[key] ?? new Set<ChangeCallback<K>>()
    listeners[key] = callbacks
    callbacks.add(callback)
    return () => {
      callbacks.delete(callback)
    }
  }

  /** 重新读取凭证与上游地址（修改 .env 后无需重启） */
  reload(env: Env = process.env): void {
    const next = resolveAppConfig(env, this.cwd)
    for (const key of RELOADABLE_KEYS) {
      if (next[key] !== this.config[key]) {
        this.set(key, next[key])
      }
    }
  }

  /** 发起任何请求前调用，凭证缺失时抛出 ConfigurationError */
  requireApiKey(): string {
    const apiKey = this.config.apiKey
    assertCredential(apiKey)
    return apiKey
  }

  hasApiKey(): boolean {
    return this.config.apiKey.length > 0
  }

  /** 读取某个界面的模型列表与 system prompt */
  async loadScreenConfig(screen: ScreenId): Promise<ScreenConfig> {
    const files = SCREEN_FILES[screen]
    const fallback = SCREEN_FALLBACKS[screen]
    const [models, systemPrompt] = await Promise.all([
      loadModels(join(this.config.configDir, files.modelsFile), fallback.models),
      loadSystemPrompt(join(this.config.configDir, files.systemPromptFile), fallback.systemPrompt),
    ])
    return { models, defaultModel: models[0] ?? fallback.models[0] ?? '', systemPrompt }
  }

  private notifyListeners<K extends keyof AppConfig>(key: K, newValue: AppConfig[K], oldValue: AppConfig[K]): void {
    const callbacks = this.listeners[key]
    if (callbacks) {
      for (const cb of callbacks) {
        try {
          cb(newValue, oldValue)
        } catch (err) {
          log.error('配置监听回调执行异常', { key, error: err })
        }
      }
    }
  }
}
