import { describe, it, expect, vi } from 'vitest'
import type { ScreenConfig } from '@shared/types/config'
import type { StreamSnapshot } from '@shared/types/llm'
import { NO_REASONING_SENTINEL, REASONING_PLACEHOLDER } from '@shared/constants'
import type { TurnResult } from '@main/services/ChatSession'
import { ConfigurationError } from '@main/errors'
import { createChatStore, type ChatSessionLike } from '../chatStore'

const screen: ScreenConfig = {
  models: ['x-ai/grok-4-fast:free', 'openai/gpt-5-mini'],
  defaultModel: 'x-ai/grok-4-fast:free',
  systemPrompt: 'You are a helpful assistant.',
}

function done(answer: string, reasoning = NO_REASONING_SENTINEL): StreamSnapshot {
  return { answer, reasoning, images: [], status: 'done' }
}

type SendImpl = ChatSessionLike['send']

const echo: SendImpl = async (message) => ({ snapshot: done(`echo: ${message}`), downloadPath: '/tmp/answer.md' })

function makeSession(impl: SendImpl = echo) {
  return {
    send: vi.fn(impl),
    stop: vi.fn(),
    reset: vi.fn(),
  } satisfies ChatSessionLike
}

describe('chatStore', () => {
  it('should start from the screen config and default parameters', () => {
    const store = createChatStore({ session: makeSession(), screen })

    expect(store.getState().settings).toEqual({
      model: 'x-ai/grok-4-fast:free',
      instructions: 'You are a helpful assistant.',
      temperature: 1.0,
      maxTokens: 8192,
      effort: 'medium',
    })
    expect(store.getState().reasoning).toBe(REASONING_PLACEHOLDER)
  })

  it('should send a message and append the answer', async () => {
    const session = makeSession()
    const store = createChatStore({ session, screen })

    await store.getState().submit('Hi')

    const state = store.getState()
    expect(state.messages.map((m) => [m.role, m.content])).toEqual([
      ['user', 'Hi'],
      ['assistant', 'echo: Hi'],
    ])
    expect(state.isStreaming).toBe(false)
    expect(state.status).toBe('Ready')
    expect(state.reasoning).toBe(NO_REASONING_SENTINEL)
    expect(state.lastDownloadPath).toBe('/tmp/answer.md')
    expect(session.send).toHaveBeenCalledWith('Hi', state.settings, expect.any(Function))
  })

  it('should show streaming snapshots while the answer arrives', async () => {
    const seen: string[] = []
    const session = makeSession(async (_message, _settings, onSnapshot) => {
      onSnapshot?.({ answer: 'Hel', reasoning: 'thinking', images: [], status: 'streaming' })
      seen.push(store.getState().currentStreamText, store.getState().reasoning)
      return { snapshot: done('Hello', 'thinking'), downloadPath: null }
    })
    const store = createChatStore({ session, screen })

    await store.getState().submit('Hi')

    expect(seen).toEqual(['Hel', 'thinking'])
    expect(store.getState().currentStreamText).toBe('')
  })

  it('should withdraw the message when the request is rejected', async () => {
    const session = makeSession(async () => {
      throw new ConfigurationError('OPENROUTER_API_KEY is not set')
    })
    const store = createChatStore({ session, screen })

    await store.getState().submit('Hi')

    expect(store.getState().messages).toEqual([])
    expect(store.getState().isStreaming).toBe(false)
    expect(store.getState().status).toBe('⚠️ OPENROUTER_API_KEY is not set')
  })

  it('should keep a stopped answer and say so', async () => {
    const session = makeSession(async () => ({
      snapshot: { answer: 'partial', reasoning: NO_REASONING_SENTINEL, images: [], status: 'cancelled' },
      downloadPath: null,
    }))
    const store = createChatStore({ session, screen })

    await store.getState().submit('Hi')

    expect(store.getState().messages[1]?.content).toBe('partial')
    expect(store.getState().status).toBe('Stopped. The partial response was kept.')
  })

  it('should not start a second message while streaming', async () => {
    let finish: (result: TurnResult) => void = () => {}
    const session = makeSession(
      () =>
        new Promise<TurnResult>((resolve) => {
          finish = resolve
        }),
    )
    const store = createChatStore({ session, screen })

    const first = store.getState().submit('one')
    await store.getState().submit('two')

    expect(session.send).toHaveBeenCalledTimes(1)
    expect(store.getState().status).toBe('A response is still streaming. Press Esc to stop it first.')

    store.getState().stop()
    expect(session.stop).toHaveBeenCalledTimes(1)

    finish({ snapshot: done('ok'), downloadPath: null })
    await first
    expect(store.getState().isStreaming).toBe(false)
  })

  it('should ignore an answer that arrives after clear', async () => {
    let finish: (result: TurnResult) => void = () => {}
    const session = makeSession(
      () =>
        new Promise<TurnResult>((resolve) => {
          finish = resolve
        }),
    )
    const store = createChatStore({ session, screen })

    const pending = store.getState().submit('Hi')
    await store.getState().submit('/clear')
    finish({ snapshot: done('late'), downloadPath: '/tmp/late.md' })
    await pending

    expect(session.reset).toHaveBeenCalledTimes(1)
    expect(store.getState().messages).toEqual([])
    expect(store.getState().lastDownloadPath).toBeNull()
    expect(store.getState().status).toBe('Conversation cleared.')
  })

  it('should validate setting commands', async () => {
    const store = createChatStore({ session: makeSession(), screen })

    await store.getState().submit('/temp 3')
    expect(store.getState().status).toBe('Temperature must be between 0 and 2')
    expect(store.getState().settings.temperature).toBe(1.0)

    await store.getState().submit('/temp 0.5')
    await store.getState().submit('/max 2048')
    await store.getState().submit('/effort low')
    await store.getState().submit('/model 2')
    await store.getState().submit('/system Be brief.')

    expect(store.getState().settings).toEqual({
      model: 'openai/gpt-5-mini',
      instructions: 'Be brief.',
      temperature: 0.5,
      maxTokens: 2048,
      effort: 'low',
    })
  })

  it('should list models and help as notices', async () => {
    const store = createChatStore({ session: makeSession(), screen })

    await store.getState().submit('/models')
    expect(store.getState().notice).toEqual(['* 1. x-ai/grok-4-fast:free', '  2. openai/gpt-5-mini'])

    await store.getState().submit('/help')
    expect(store.getState().notice[0]?.startsWith('/model <id|number>')).toBe(true)
  })

  it('should point image commands to the studio', async () => {
    const session = makeSession()
    const store = createChatStore({ session, screen })

    await store.getState().submit('/image cat.png')

    expect(store.getState().status).toBe('Images are handled by the studio screen (npm run studio).')
    expect(session.send).not.toHaveBeenCalled()
  })

  it('should report the last download on /save', async () => {
    const store = createChatStore({ session: makeSession(), screen })

    await store.getState().submit('/save')
    expect(store.getState().status).toBe('No response to download yet.')

    await store.getState().submit('Hi')
    await store.getState().submit('/save')
    expect(store.getState().status).toBe('Last response saved at /tmp/answer.md')
  })

  it('should call reload and quit hooks', async () => {
    const reload = vi.fn(() => false)
    const onQuit = vi.fn()
    const store = createChatStore({ session: makeSession(), screen, reload, onQuit })

    await store.getState().submit('/reload')
    await store.getState().submit('/quit')

    expect(reload).toHaveBeenCalledTimes(1)
    expect(store.getState().status).toBe('Configuration reloaded, but no API key is set.')
    expect(onQuit).toHaveBeenCalledTimes(1)
  })

  it('should stop the streaming turn before quitting', async () => {
    let finish: (result: TurnResult) => void = () => {}
    const session = makeSession(
      () =>
        new Promise<TurnResult>((resolve) => {
          finish = resolve
        }),
    )
    const onQuit = vi.fn()
    const store = createChatStore({ session, screen, onQuit })

    const pending = store.getState().submit('Hi')
    await store.getState().submit('/quit')

    expect(session.reset).toHaveBeenCalledTimes(1)
    expect(onQuit).toHaveBeenCalledTimes(1)
    expect(session.reset.mock.invocationCallOrder[0]).toBeLessThan(onQuit.mock.invocationCallOrder[0] ?? 0)
    expect(store.getState().isStreaming).toBe(false)

    finish({ snapshot: { ...done('partial'), status: 'cancelled' }, downloadPath: null })
    await pending
    expect(store.getState().messages.map((m) => m.role)).toEqual(['user'])
  })
})
