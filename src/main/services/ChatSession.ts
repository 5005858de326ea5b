import type { ChatSettings } from '@shared/types/config'
import type { ConversationTurn, RequestDescriptor, StreamFragment, StreamSnapshot } from '@shared/types/llm'
import { toErrorMessage } from '../errors'
import { getLogger } from '../logger'
import { buildChatRequest } from './RequestBuilder'
import { aggregateStream, type AggregateOptions } from './StreamAggregator'

const log = getLogger('ChatSession')

export interface ChatTransport {
  stream(descriptor: RequestDescriptor, signal?: AbortSignal): AsyncIterable<StreamFragment>
}

export interface DownloadStore {
  writeTextFile(content: string, suffix?: string): Promise<string>
}

export interface ChatSessionDeps {
  client: ChatTransport
  files: DownloadStore
  /** 返回凭证，缺失时抛出 ConfigurationError */
  getApiKey: () => string
  stream?: Pick<AggregateOptions, 'intervalMs' | 'now'>
}

export interface TurnResult {
  snapshot: StreamSnapshot
  /** 成功完成时回答的下载文件 */
  downloadPath: string | null
}

export type SnapshotListener = (snapshot: StreamSnapshot) => void

/**
 * 单个聊天会话：保存历史，同一时间只运行一个生成任务，
 * 后发起的消息排队等待前一个结束。
 */
export class ChatSession {
  private history: ConversationTurn[] = []
  private active: AbortController | null = null
  private queue: Promise<unknown> = Promise.resolve()
  private generation = 0

  constructor(private readonly deps: ChatSessionDeps) {}

  getHistory(): ConversationTurn[] {
    return this.history.map((turn) => ({ ...turn }))
  }

  isBusy(): boolean {
    return this.active !== null
  }

  send(message: string, settings: ChatSettings, onSnapshot?: SnapshotListener): Promise<TurnResult | null> {
    const run = this.queue.then(() => this.runTurn(message, settings, onSnapshot))
    // 队列本身不传播失败，错误由 run 交给调用方
    this.queue = run.catch(() => undefined)
    return run
  }

  /** 停止当前生成，已收到的内容保留 */
  stop(): void {
    if (this.active) {
      log.info('停止当前生成')
      this.active.abort()
    }
  }

  /** 清空历史并停止当前生成 */
  reset(): void {
    this.stop()
    this.history = []
    this.generation++
    log.info('会话已重置')
  }

  private async runTurn(
    message: string,
    settings: ChatSettings,
    onSnapshot?: SnapshotListener,
  ): Promise<TurnResult | null> {
    if (!message.trim()) return null

    // 凭证与参数校验都在发请求之前完成
    this.deps.getApiKey()
    const userTurn: ConversationTurn = { role: 'user', content: message }
    const descriptor = buildChatRequest(
      [...this.history, userTurn],
      settings.model,
      { temperature: settings.temperature, maxTokens: settings.maxTokens, effort: settings.effort },
      { instructions: settings.instructions },
    )

    const generation = this.generation
    const placeholder: ConversationTurn = { role: 'assistant', content: '' }
    this.history.push(userTurn, placeholder)

    const controller = new AbortController()
    this.active = controller
    log.info('开始新一轮对话', { model: settings.model, effort: settings.effort, turns: this.history.length })

    let last: StreamSnapshot | null = null
    try {
      const fragments = this.deps.client.stream(descriptor, controller.signal)
      for await (const snapshot of aggregateStream(fragments, { ...this.deps.stream, signal: controller.signal })) {
        placeholder.content = snapshot.answer
        last = snapshot
        onSnapshot?.(snapshot)
      }
    } finally {
      this.active = null
    }

    if (!last) {
      throw new Error('Stream ended without a final snapshot')
    }

    if (!placeholder.content) {
      this.history = this.history.filter((turn) => turn !== placeholder)
    }

    let downloadPath: string | null = null
    if (last.status === 'done' && last.answer && generation === this.generation) {
      try {
        downloadPath = await this.deps.files.writeTextFile(last.answer, '.md')
      } catch (err) {
        log.warn('写入下载文件失败', { error: toErrorMessage(err) })
      }
    }

    log.info('本轮对话结束', { status: last.status, length: last.answer.length })
    return { snapshot: last, downloadPath }
  }
}
