import { createStore, type StoreApi } from 'zustand/vanilla'
import type { ChatSettings, ScreenConfig } from '@shared/types/config'
import type { ReasoningEffort, StreamSnapshot } from '@shared/types/llm'
import { DEFAULT_CHAT_PARAMS, REASONING_PLACEHOLDER } from '@shared/constants'
import type { TurnResult, SnapshotListener } from '@main/services/ChatSession'
import { toErrorMessage } from '@main/errors'
import { COMMAND_HELP, parseCommand, resolveModelChoice } from '../services/commandParser'
import { checkMaxTokens, checkTemperature, formatModelList } from '../services/settingsPolicy'
import { getLogger } from '../utils/logger'

const log = getLogger('chatStore')

export interface ChatMessageView {
  id: string
  role: 'user' | 'assistant'
  content: string
  timestamp: number
}

export interface ChatSessionLike {
  send(message: string, settings: ChatSettings, onSnapshot?: SnapshotListener): Promise<TurnResult | null>
  stop(): void
  reset(): void
}

export interface ChatStoreDeps {
  session: ChatSessionLike
  screen: ScreenConfig
  /** 重新读取环境配置，返回是否已有凭证 */
  reload?: () => boolean
  onQuit?: () => void
}

export interface ChatState {
  settings: ChatSettings
  models: string[]
  messages: ChatMessageView[]
  isStreaming: boolean
  currentStreamText: string
  reasoning: string
  status: string
  notice: string[]
  lastDownloadPath: string | null

  submit: (input: string) => Promise<void>
  sendMessage: (content: string) => Promise<void>
  stop: () => void
  /** 停止当前生成并退出界面 */
  quit: () => void
  clear: () => void
  setModel: (model: string) => void
  setEffort: (effort: ReasoningEffort) => void
  setTemperature: (value: number) => void
  setMaxTokens: (value: number) => void
  setInstructions: (text: string) => void
}

export type ChatStore = StoreApi<ChatState>

const STATUS_BY_RESULT: Record<StreamSnapshot['status'], string> = {
  streaming: 'Streaming...',
  done: 'Ready',
  cancelled: 'Stopped. The partial response was kept.',
  error: 'The request failed. See the response for details.',
}

export function createChatStore(deps: ChatStoreDeps): ChatStore {
  let msgId = 0
  // clear 之后回来的旧回答不再写入界面
  let epoch = 0

  const nextId = (): string => `msg-${++msgId}`

  return createStore<ChatState>()((set, get) => ({
    settings: {
      model: deps.screen.defaultModel,
      instructions: deps.screen.systemPrompt,
      temperature: DEFAULT_CHAT_PARAMS.temperature,
      maxTokens: DEFAULT_CHAT_PARAMS.maxTokens,
      effort: DEFAULT_CHAT_PARAMS.effort,
    },
    models: [...deps.screen.models],
    messages: [],
    isStreaming: false,
    currentStreamText: '',
    reasoning: REASONING_PLACEHOLDER,
    status: 'Ready',
    notice: [],
    lastDownloadPath: null,

    submit: async (input) => {
      const command = parseCommand(input)
      set({ notice: [] })
      const state = get()

      switch (command.type) {
        case 'message':
          await state.sendMessage(command.text)
          return
        case 'model':
          state.setModel(resolveModelChoice(command.model, state.models))
          return
        case 'models':
          set({ notice: formatModelList(state.models, state.settings.model) })
          return
        case 'effort':
          state.setEffort(command.effort)
          return
        case 'temperature':
          state.setTemperature(command.value)
          return
        case 'maxTokens':
          state.setMaxTokens(command.value)
          return
        case 'system':
          state.setInstructions(command.text)
          return
        case 'image':
          set({ status: 'Images are handled by the studio screen (npm run studio).' })
          return
        case 'clear':
          state.clear()
          return
        case 'stop':
          state.stop()
          return
        case 'save':
          set({
            status: state.lastDownloadPath
              ? `Last response saved at ${state.lastDownloadPath}`
              : 'No response to download yet.',
          })
          return
        case 'reload': {
          const hasKey = deps.reload?.() ?? false
          set({ status: hasKey ? 'Configuration reloaded.' : 'Configuration reloaded, but no API key is set.' })
          return
        }
        case 'help':
          set({ notice: COMMAND_HELP.map(([usage, text]) => `${usage.padEnd(28)} ${text}`) })
          return
        case 'quit':
          state.quit()
          return
        case 'invalid':
          set({ status: command.reason })
          return
      }
    },

    sendMessage: async (content) => {
      if (!content.trim()) return
      if (get().isStreaming) {
        set({ status: 'A response is still streaming. Press Esc to stop it first.' })
        return
      }

      const currentEpoch = epoch
      const userMessage: ChatMessageView = { id: nextId(), role: 'user', content, timestamp: Date.now() }
      set((state) => ({
        messages: [...state.messages, userMessage],
        isStreaming: true,
        currentStreamText: '',
        reasoning: REASONING_PLACEHOLDER,
        status: STATUS_BY_RESULT.streaming,
        lastDownloadPath: null,
      }))

      try {
        const result = await deps.session.send(content, get().settings, (snapshot) => {
          if (currentEpoch !== epoch) return
          set({ currentStreamText: snapshot.answer, reasoning: snapshot.reasoning })
        })
        if (currentEpoch !== epoch) return

        if (!result) {
          set({ isStreaming: false, currentStreamText: '', status: 'Ready' })
          return
        }

        const { snapshot, downloadPath } = result
        set((state) => ({
          messages: snapshot.answer
            ? [
                ...state.messages,
                { id: nextId(), role: 'assistant', content: snapshot.answer, timestamp: Date.now() },
              ]
            : state.messages,
          isStreaming: false,
          currentStreamText: '',
          reasoning: snapshot.reasoning,
          status: STATUS_BY_RESULT[snapshot.status],
          lastDownloadPath: downloadPath,
        }))
      } catch (err) {
        // 配置/校验错误：请求未发出，撤回刚加入的消息
        log.error('发送消息失败', err)
        if (currentEpoch !== epoch) return
        set((state) => ({
          messages: state.messages.filter((message) => message.id !== userMessage.id),
          isStreaming: false,
          currentStreamText: '',
          status: `⚠️ ${toErrorMessage(err)}`,
        }))
      }
    },

    stop: () => {
      if (!get().isStreaming) return
      deps.session.stop()
    },

    quit: () => {
      epoch++
      deps.session.reset()
      set({ isStreaming: false, currentStreamText: '' })
      deps.onQuit?.()
    },

    clear: () => {
      epoch++
      deps.session.reset()
      set({
        messages: [],
        isStreaming: false,
        currentStreamText: '',
        reasoning: REASONING_PLACEHOLDER,
        status: 'Conversation cleared.',
        lastDownloadPath: null,
      })
    },

    setModel: (model) => {
      set((state) => ({ settings: { ...state.settings, model }, status: `Model: ${model}` }))
    },

    setEffort: (effort) => {
      set((state) => ({ settings: { ...state.settings, effort }, status: `Reasoning effort: ${effort}` }))
    },

    setTemperature: (value) => {
      const check = checkTemperature(value)
      if (!check.ok) {
        set({ status: check.reason })
        return
      }
      set((state) => ({ settings: { ...state.settings, temperature: value }, status: `Temperature: ${value}` }))
    },

    setMaxTokens: (value) => {
      const check = checkMaxTokens(value, 'chat')
      if (!check.ok) {
        set({ status: check.reason })
        return
      }
      set((state) => ({ settings: { ...state.settings, maxTokens: value }, status: `Max tokens: ${value}` }))
    },

    setInstructions: (text) => {
      set((state) => ({
        settings: { ...state.settings, instructions: text },
        status: text.trim() ? 'System instructions updated.' : 'System instructions cleared.',
      }))
    },
  }))
}
