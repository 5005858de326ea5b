import { z } from 'zod'
import type { CompletionResult, RequestDescriptor, StreamFragment, UpstreamConfig } from '@shared/types/llm'
import { APP_NAME } from '@shared/constants'
import { CancellationSignal, UpstreamError, toErrorMessage } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('ChatCompletionsClient')

const imagePartSchema = z.object({
  image_url: z.object({ url: z.string() }),
})

const errorSchema = z.object({
  message: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
})

const streamChunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            reasoning: z.string().nullish(),
            images: z.array(imagePartSchema).nullish(),
          })
          .nullish(),
      }),
    )
    .nullish(),
  error: errorSchema.nullish(),
})

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            images: z.array(imagePartSchema).nullish(),
          })
          .nullish(),
      }),
    )
    .nullish(),
  error: errorSchema.nullish(),
})

type SseEvent = { type: 'fragment'; fragment: StreamFragment } | { type: 'done' } | { type: 'skip' }

/** 请求体：extra 中的可选字段展开到顶层 */
export function serializeRequest(descriptor: RequestDescriptor): Record<string, unknown> {
  const { extra, ...fields } = descriptor
  return { ...fields, ...extra }
}

function describeUpstreamError(error: z.infer<typeof errorSchema>): string {
  const message = error.message?.trim() || 'Unknown upstream error'
  return error.code !== undefined ? `${message} (code ${error.code})` : message
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError')
}

/** 解析一行 SSE，忽略空行与注释行 */
export function parseSseLine(line: string): SseEvent {
  const trimmed = line.trim()
  if (!trimmed || trimmed.startsWith(':')) return { type: 'skip' }
  if (!trimmed.startsWith('data:')) return { type: 'skip' }

  const payload = trimmed.slice(5).trim()
  if (payload === '[DONE]') return { type: 'done' }

  let json: unknown
  try {
    json = JSON.parse(payload)
  } catch (err) {
    throw new UpstreamError(`Malformed stream fragment: ${payload.slice(0, 120)}`, { cause: err })
  }

  const parsed = streamChunkSchema.safeParse(json)
  if (!parsed.success) {
    throw new UpstreamError(`Unexpected stream fragment: ${payload.slice(0, 120)}`)
  }
  if (parsed.data.error) {
    throw new UpstreamError(describeUpstreamError(parsed.data.error))
  }

  const delta = parsed.data.choices?.[0]?.delta
  if (!delta) return { type: 'skip' }

  const fragment: StreamFragment = {}
  if (delta.content) fragment.content = delta.content
  if (delta.reasoning) fragment.reasoning = delta.reasoning
  if (delta.images?.length) fragment.images = delta.images.map((image) => image.image_url.url)

  return Object.keys(fragment).length > 0 ? { type: 'fragment', fragment } : { type: 'skip' }
}

export class ChatCompletionsClient {
  private config: UpstreamConfig

  constructor(config: UpstreamConfig) {
    this.config = { ...config }
  }

  updateConfig(config: Partial<UpstreamConfig>): void {
    log.info('上游配置更新')
    this.config = { ...this.config, ...config }
  }

  /** 流式请求，逐个产出增量片段 */
  async *stream(descriptor: RequestDescriptor, signal?: AbortSignal): AsyncGenerator<StreamFragment> {
    log.info('开始流式请求', { model: descriptor.model, messages: descriptor.messages.length })
    const response = await this.post(descriptor, signal)

    if (!response.body) {
      throw new UpstreamError('LLM API error: response body is null')
    }

    const reader = response.body.getReader()
    const decoder = new TextDecoder()
    let buffer = ''
    let finished = false

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) {
          finished = true
          break
        }

        buffer += decoder.decode(value, { stream: true })
        const lines = buffer.split('\n')
        // 最后一行可能不完整，留到下次
        buffer = lines.pop() ?? ''

        for (const line of lines) {
          const event = parseSseLine(line)
          if (event.type === 'done') {
            finished = true
            return
          }
          if (event.type === 'fragment') {
            yield event.fragment
          }
        }
      }

      // 处理缓冲区中剩余的数据
      buffer += decoder.decode()
      const event = parseSseLine(buffer)
      if (event.type === 'fragment') {
        yield event.fragment
      }
    } catch (err) {
      if (err instanceof UpstreamError || isAbortError(err)) throw err
      throw new UpstreamError(`LLM API stream failed: ${toErrorMessage(err)}`, { cause: err })
    } finally {
      if (!finished) {
        // 提前结束（停止或出错）时关闭连接
        await reader.cancel().catch((err: unknown) => {
          log.debug('关闭响应流失败', { error: toErrorMessage(err) })
        })
      }
      reader.releaseLock()
    }
  }

  /** 阻塞请求，返回完整回答 */
  async complete(descriptor: RequestDescriptor, signal?: AbortSignal): Promise<CompletionResult> {
    log.info('开始阻塞请求', { model: descriptor.model })
    const response = await this.post(descriptor, signal)

    let json: unknown
    try {
      json = await response.json()
    } catch (err) {
      if (isAbortError(err)) throw new CancellationSignal()
      throw new UpstreamError('LLM API error: response is not valid JSON', { cause: err })
    }

    const parsed = completionSchema.safeParse(json)
    if (!parsed.success) {
      throw new UpstreamError('LLM API error: unexpected response shape')
    }
    if (parsed.data.error) {
      throw new UpstreamError(describeUpstreamError(parsed.data.error))
    }

    const message = parsed.data.choices?.[0]?.message
    return {
      text: message?.content ?? '',
      images: (message?.images ?? []).map((image) => image.image_url.url),
    }
  }

  private async post(descriptor: RequestDescriptor, signal?: AbortSignal): Promise<Response> {
    const url = this.buildChatCompletionsUrl(this.config.baseURL)
    let response: Response
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
          'X-Title': APP_NAME,
        },
        body: JSON.stringify(serializeRequest(descriptor)),
        signal,
      })
    } catch (err) {
      if (isAbortError(err)) {
        if (descriptor.stream) throw err
        throw new CancellationSignal()
      }
      throw new UpstreamError(`LLM API request failed: ${toErrorMessage(err)}`, { cause: err })
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '')
      log.error('LLM API 请求失败', { status: response.status })
      throw new UpstreamError(`LLM API error: HTTP ${response.status}: ${text}`, { status: response.status })
    }

    return response
  }

  private buildChatCompletionsUrl(baseURL: string): string {
    const base = baseURL.replace(/\/+$/, '')
    const versioned = /\/v\d+$/i.test(base) ? base : `${base}/v1`
    return `${versioned}/chat/completions`
  }
}
