import { Box, Text } from 'ink'
import { useStore } from 'zustand'
import type { StudioStore } from '../../stores/studioStore'
import { theme } from '../../styles/theme'
import StatusBar from '../Common/StatusBar'
import PromptInput from '../Common/PromptInput'
import NoticeList from '../Common/NoticeList'

export default function StudioApp({ store }: { store: StudioStore }) {
  const settings = useStore(store, (s) => s.settings)
  const imagePath = useStore(store, (s) => s.imagePath)
  const lastPrompt = useStore(store, (s) => s.lastPrompt)
  const isRunning = useStore(store, (s) => s.isRunning)
  const result = useStore(store, (s) => s.result)
  const status = useStore(store, (s) => s.status)
  const notice = useStore(store, (s) => s.notice)

  return (
    <Box flexDirection="column">
      <Text bold color={theme.role.user}>
        router-chat studio · /image &lt;path&gt; to attach, /help for commands
      </Text>
      <Box paddingX={1}>
        <Text color={theme.text.muted}>Image: {imagePath ?? 'none'}</Text>
      </Box>
      {lastPrompt && (
        <Box paddingX={1}>
          <Text color={theme.role.user}>Prompt: </Text>
          <Text>{lastPrompt}</Text>
        </Box>
      )}
      {result?.ok && (
        <Box flexDirection="column" paddingX={1} marginY={1}>
          <Text color={theme.text.primary}>{result.text}</Text>
          {result.imagePaths.map((path) => (
            <Text key={path} color={theme.status.success}>
              🖼 {path}
            </Text>
          ))}
        </Box>
      )}
      <NoticeList lines={notice} />
      <StatusBar model={settings.model} status={status} busy={isRunning} details={`max ${settings.maxTokens}`} />
      <PromptInput
        placeholder="Describe the image to analyze or generate"
        busy={isRunning}
        onSubmit={(value) => void store.getState().submit(value)}
        onStop={() => store.getState().stop()}
        onQuit={() => store.getState().quit()}
      />
    </Box>
  )
}
