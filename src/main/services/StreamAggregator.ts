import type { StreamFragment, StreamSnapshot, StreamStatus } from '@shared/types/llm'
import { FLUSH_INTERVAL_MS, NO_REASONING_SENTINEL, STREAM_ERROR_MARKER } from '@shared/constants'
import { toErrorMessage } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('StreamAggregator')

export interface AggregateOptions {
  /** 两次快照之间的最小间隔 */
  intervalMs?: number
  now?: () => number
  /** 用户停止时中断消费 */
  signal?: AbortSignal
  /** 整个回答没有推理片段时，推理区显示的文本 */
  noReasoningText?: string
}

interface StreamState {
  answer: string
  reasoning: string
  images: string[]
  reasoningDeltas: number
  lastFlush: number
}

function snapshot(state: StreamState, status: StreamStatus, error?: string): StreamSnapshot {
  return {
    answer: state.answer,
    reasoning: state.reasoning,
    images: [...state.images],
    status,
    ...(error !== undefined ? { error } : {}),
  }
}

function applyFragment(state: StreamState, fragment: StreamFragment): void {
  if (fragment.content) {
    state.answer += fragment.content
  }
  if (fragment.reasoning) {
    state.reasoning += fragment.reasoning
    state.reasoningDeltas++
  }
  if (fragment.images?.length) {
    state.images.push(...fragment.images)
  }
}

/** 在已有回答后追加带标记的错误信息 */
export function appendErrorMarker(answer: string, message: string): string {
  const marked = `${STREAM_ERROR_MARKER} ${message}`
  return answer ? `${answer}\n\n${marked}` : marked
}

/**
 * 把上游片段折叠成回答/推理两个缓冲区，按固定间隔输出快照。
 * 最后一个快照总会输出，且不会抛出：上游错误写入回答，用户停止保留已收到的部分。
 */
export async function* aggregateStream(
  fragments: AsyncIterable<StreamFragment>,
  options: AggregateOptions = {},
): AsyncGenerator<StreamSnapshot> {
  const intervalMs = options.intervalMs ?? FLUSH_INTERVAL_MS
  const now = options.now ?? Date.now
  const signal = options.signal
  const noReasoningText = options.noReasoningText ?? NO_REASONING_SENTINEL

  const state: StreamState = {
    answer: '',
    reasoning: '',
    images: [],
    reasoningDeltas: 0,
    lastFlush: now(),
  }

  const finalize = (status: StreamStatus, error?: string): StreamSnapshot => {
    if (state.reasoningDeltas === 0) {
      state.reasoning = noReasoningText
    }
    if (status === 'error' && error !== undefined) {
      state.answer = appendErrorMarker(state.answer, error)
    }
    return snapshot(state, status, error)
  }

  const iterator = fragments[Symbol.asyncIterator]()
  let exhausted = false
  let released = false
  let finalStatus: StreamStatus = 'done'
  let errorMessage: string | undefined

  // 释放底层连接
  const release = async (): Promise<void> => {
    if (released || exhausted) return
    released = true
    try {
      await iterator.return?.()
    } catch (err) {
      log.warn('关闭上游流失败', { error: toErrorMessage(err) })
    }
  }

  try {
    try {
      while (true) {
        if (signal?.aborted) {
          finalStatus = 'cancelled'
          break
        }

        const next = await iterator.next()
        if (next.done) {
          exhausted = true
          break
        }

        // 停止后到达的片段不再计入
        if (signal?.aborted) {
          finalStatus = 'cancelled'
          break
        }

        applyFragment(state, next.value)

        const current = now()
        if (current - state.lastFlush >= intervalMs) {
          state.lastFlush = current
          yield snapshot(state, 'streaming')
        }
      }
    } catch (err) {
      // 抛错的迭代器已经结束，无需再关闭
      exhausted = true
      if (signal?.aborted) {
        finalStatus = 'cancelled'
      } else {
        finalStatus = 'error'
        errorMessage = toErrorMessage(err)
        log.error('流式响应中断', { error: errorMessage, received: state.answer.length })
      }
    }

    if (finalStatus === 'cancelled') {
      log.info('用户停止生成', { received: state.answer.length })
      await release()
    }

    yield finalize(finalStatus, errorMessage)
  } finally {
    // 调用方提前放弃消费时同样关闭上游
    await release()
  }
}
