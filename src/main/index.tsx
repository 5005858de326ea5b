import { render } from 'ink'
import type { ScreenId } from '@shared/types/config'
import App, { type AppScreen } from '@renderer/App'
import { createChatStore } from '@renderer/stores/chatStore'
import { createStudioStore } from '@renderer/stores/studioStore'
import { ConfigManager, loadDotenv } from './config/ConfigManager'
import { TempFileRegistry } from './files/TempFileRegistry'
import { ChatCompletionsClient } from './services/ChatCompletionsClient'
import { ChatSession } from './services/ChatSession'
import { ImageStudio } from './services/ImageStudio'
import { initializeLogger, getLogger } from './logger'
import { toErrorMessage } from './errors'

const log = getLogger('App')

function parseScreen(argv: string[]): ScreenId {
  const arg = argv[2]?.trim().toLowerCase()
  if (arg === undefined || arg === 'chat') return 'chat'
  if (arg === 'studio') return 'studio'
  throw new Error(`Unknown screen "${arg}". Use "chat" or "studio".`)
}

function quitScreen(props: AppScreen): void {
  if (props.screen === 'chat') {
    props.store.getState().quit()
  } else {
    props.store.getState().quit()
  }
}

async function bootstrap(): Promise<void> {
  const screenId = parseScreen(process.argv)

  loadDotenv()
  const configManager = new ConfigManager()
  initializeLogger({ ...configManager.get('logging'), console: false })
  log.info('应用启动', { screen: screenId, hasApiKey: configManager.hasApiKey() })

  const files = new TempFileRegistry()
  files.installExitHook()

  const client = new ChatCompletionsClient({
    apiKey: configManager.get('apiKey'),
    baseURL: configManager.get('baseURL'),
  })
  configManager.onChanged('apiKey', (apiKey) => client.updateConfig({ apiKey }))
  configManager.onChanged('baseURL', (baseURL) => client.updateConfig({ baseURL }))

  const getApiKey = () => configManager.requireApiKey()
  const reload = () => {
    loadDotenv(undefined, true)
    configManager.reload()
    return configManager.hasApiKey()
  }

  const screen = await configManager.loadScreenConfig(screenId)
  let onQuit = () => {}
  const props: AppScreen =
    screenId === 'chat'
      ? {
          screen: 'chat',
          store: createChatStore({
            session: new ChatSession({ client, files, getApiKey }),
            screen,
            reload,
            onQuit: () => onQuit(),
          }),
        }
      : {
          screen: 'studio',
          store: createStudioStore({
            studio: new ImageStudio({ client, files, getApiKey }),
            screen,
            reload,
            onQuit: () => onQuit(),
          }),
        }

  // Ctrl+C 由输入框处理，和 /quit、SIGTERM 一样先停止进行中的请求
  const instance = render(<App {...props} />, { exitOnCtrlC: false })
  onQuit = () => instance.unmount()
  process.once('SIGTERM', () => quitScreen(props))

  await instance.waitUntilExit()
  log.info('应用退出', { tempFiles: files.list().length })
}

bootstrap().catch((err: unknown) => {
  log.error('启动失败', err)
  process.stderr.write(`${toErrorMessage(err)}\n`)
  process.exitCode = 1
})
