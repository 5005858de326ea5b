import { createStore, type StoreApi } from 'zustand/vanilla'
import type { ScreenConfig, StudioSettings } from '@shared/types/config'
import { DEFAULT_STUDIO_MAX_TOKENS } from '@shared/constants'
import type { StudioRequest, StudioResult } from '@main/services/ImageStudio'
import { toErrorMessage } from '@main/errors'
import { COMMAND_HELP, parseCommand, resolveModelChoice } from '../services/commandParser'
import { checkMaxTokens, formatModelList } from '../services/settingsPolicy'
import { getLogger } from '../utils/logger'

const log = getLogger('studioStore')

export interface ImageStudioLike {
  run(request: StudioRequest): Promise<StudioResult>
  stop(): void
}

export interface StudioStoreDeps {
  studio: ImageStudioLike
  screen: ScreenConfig
  reload?: () => boolean
  onQuit?: () => void
}

export interface StudioState {
  settings: StudioSettings
  models: string[]
  /** 待发送的图片路径 */
  imagePath: string | null
  lastPrompt: string
  isRunning: boolean
  result: StudioResult | null
  status: string
  notice: string[]

  submit: (input: string) => Promise<void>
  run: (prompt: string) => Promise<void>
  stop: () => void
  /** 停止进行中的请求并退出界面 */
  quit: () => void
  clear: () => void
  attachImage: (path: string | null) => void
  setModel: (model: string) => void
  setMaxTokens: (value: number) => void
  setInstructions: (text: string) => void
}

export type StudioStore = StoreApi<StudioState>

const CHAT_ONLY = 'Only available on the chat screen.'

export function createStudioStore(deps: StudioStoreDeps): StudioStore {
  return createStore<StudioState>()((set, get) => ({
    settings: {
      model: deps.screen.defaultModel,
      instructions: deps.screen.systemPrompt,
      maxTokens: DEFAULT_STUDIO_MAX_TOKENS,
    },
    models: [...deps.screen.models],
    imagePath: null,
    lastPrompt: '',
    isRunning: false,
    result: null,
    status: 'Ready',
    notice: [],

    submit: async (input) => {
      const command = parseCommand(input)
      set({ notice: [] })
      const state = get()

      switch (command.type) {
        case 'message':
          await state.run(command.text)
          return
        case 'model':
          state.setModel(resolveModelChoice(command.model, state.models))
          return
        case 'models':
          set({ notice: formatModelList(state.models, state.settings.model) })
          return
        case 'maxTokens':
          state.setMaxTokens(command.value)
          return
        case 'system':
          state.setInstructions(command.text)
          return
        case 'image':
          state.attachImage(command.path)
          return
        case 'effort':
        case 'temperature':
          set({ status: CHAT_ONLY })
          return
        case 'clear':
          state.clear()
          return
        case 'stop':
          state.stop()
          return
        case 'save': {
          const paths = [state.result?.downloadPath, ...(state.result?.imagePaths ?? [])].filter(
            (path): path is string => Boolean(path),
          )
          if (paths.length === 0) {
            set({ status: 'No result to download yet.' })
          } else {
            set({ notice: paths, status: 'Saved files:' })
          }
          return
        }
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

    run: async (prompt) => {
      const { isRunning, imagePath, settings } = get()
      if (isRunning) {
        set({ status: 'A request is already running. Press Esc to stop it.' })
        return
      }

      set({ isRunning: true, lastPrompt: prompt, status: 'Processing...' })
      try {
        const result = await deps.studio.run({
          prompt,
          ...(imagePath ? { image: imagePath } : {}),
          settings,
        })
        set({ isRunning: false, result, status: result.status })
      } catch (err) {
        log.error('图片工作室请求未发出', err)
        set({ isRunning: false, status: `⚠️ ${toErrorMessage(err)}` })
      }
    },

    stop: () => {
      if (!get().isRunning) return
      deps.studio.stop()
    },

    quit: () => {
      deps.studio.stop()
      deps.onQuit?.()
    },

    clear: () => {
      set({ result: null, imagePath: null, lastPrompt: '', status: 'Cleared.' })
    },

    attachImage: (path) => {
      set({ imagePath: path, status: path ? `Image attached: ${path}` : 'Image detached.' })
    },

    setModel: (model) => {
      set((state) => ({ settings: { ...state.settings, model }, status: `Model: ${model}` }))
    },

    setMaxTokens: (value) => {
      const check = checkMaxTokens(value, 'studio')
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
