import type { StudioSettings } from '@shared/types/config'
import type { CompletionResult, ConversationTurn, RequestDescriptor } from '@shared/types/llm'
import { API_ERROR_MARKER, IMAGE_ONLY_RESPONSE } from '@shared/constants'
import { CancellationSignal, ValidationError, toErrorMessage } from '../errors'
import { getLogger } from '../logger'
import { buildAnalysisRequest } from './RequestBuilder'
import { decodeDataUrl, encodeImageAsDataUrl, extensionForMimeType } from './imageEncoding'

const log = getLogger('ImageStudio')

export interface CompletionTransport {
  complete(descriptor: RequestDescriptor, signal?: AbortSignal): Promise<CompletionResult>
}

export interface StudioFileStore {
  writeTextFile(content: string, suffix?: string): Promise<string>
  writeBinaryFile(data: Buffer, suffix: string): Promise<string>
}

export interface ImageStudioDeps {
  client: CompletionTransport
  files: StudioFileStore
  /** 返回凭证，缺失时抛出 ConfigurationError */
  getApiKey: () => string
}

export interface StudioRequest {
  prompt: string
  /** 图片文件路径或内容 */
  image?: string | Buffer
  settings: StudioSettings
}

export interface StudioResult {
  ok: boolean
  text: string
  /** 生成图片保存的文件 */
  imagePaths: string[]
  status: string
  /** 文本回答的下载文件 */
  downloadPath: string | null
}

const STOPPED_STATUS = '⏹️ Request stopped.'

function failure(status: string): StudioResult {
  return { ok: false, text: '', imagePaths: [], status, downloadPath: null }
}

/**
 * 图片分析/生成：单次阻塞调用。
 * 有图片时按视觉请求发送，只有文本时对可出图的模型请求图片输出。
 */
export class ImageStudio {
  private active: AbortController | null = null

  constructor(private readonly deps: ImageStudioDeps) {}

  isBusy(): boolean {
    return this.active !== null
  }

  stop(): void {
    this.active?.abort()
  }

  async run(request: StudioRequest): Promise<StudioResult> {
    const { prompt, image, settings } = request
    if (!prompt.trim() && !image) {
      throw new ValidationError('Please enter a prompt or upload an image.')
    }
    this.deps.getApiKey()

    // 编码图片期间也可以停止
    const controller = new AbortController()
    this.active = controller
    try {
      const turn: ConversationTurn = { role: 'user', content: prompt }
      if (image) {
        const url = await encodeImageAsDataUrl(image)
        turn.image = { url, ...(typeof image === 'string' ? { source: image } : {}) }
      }

      const descriptor = buildAnalysisRequest(
        [turn],
        settings.model,
        { maxTokens: settings.maxTokens },
        { instructions: settings.instructions },
      )

      if (controller.signal.aborted) {
        log.info('请求发出前已停止')
        return failure(STOPPED_STATUS)
      }
      log.info('开始图片工作室请求', { model: settings.model, withImage: Boolean(image) })
      return await this.complete(descriptor, settings.model, controller.signal)
    } finally {
      this.active = null
    }
  }

  private async complete(descriptor: RequestDescriptor, model: string, signal: AbortSignal): Promise<StudioResult> {
    try {
      const result = await this.deps.client.complete(descriptor, signal)
      return await this.saveResult(result, model)
    } catch (err) {
      if (err instanceof CancellationSignal || signal.aborted) {
        log.info('用户停止请求')
        return failure(STOPPED_STATUS)
      }
      const message = toErrorMessage(err)
      log.error('图片工作室请求失败', { model, error: message })
      return failure(`${API_ERROR_MARKER} ${message}`)
    }
  }

  private async saveResult(result: CompletionResult, model: string): Promise<StudioResult> {
    let text = result.text
    let downloadPath: string | null = null
    if (text) {
      downloadPath = await this.deps.files.writeTextFile(text, '.md')
    }

    const imagePaths: string[] = []
    for (const url of result.images) {
      const { mimeType, data } = decodeDataUrl(url)
      imagePaths.push(await this.deps.files.writeBinaryFile(data, extensionForMimeType(mimeType)))
    }

    if (imagePaths.length > 0) {
      if (!text.trim()) {
        text = IMAGE_ONLY_RESPONSE
      }
      return { ok: true, text, imagePaths, status: `✅ Success with ${model}.`, downloadPath }
    }
    return { ok: true, text, imagePaths, status: `✅ Text response received from ${model}.`, downloadPath }
  }
}
