import { Box, Text } from 'ink'
import { useStore } from 'zustand'
import type { ChatStore } from '../../stores/chatStore'
import { theme } from '../../styles/theme'
import MessageList from './MessageList'
import ReasoningPanel from './ReasoningPanel'
import StatusBar from '../Common/StatusBar'
import PromptInput from '../Common/PromptInput'
import NoticeList from '../Common/NoticeList'

export default function ChatApp({ store }: { store: ChatStore }) {
  const messages = useStore(store, (s) => s.messages)
  const isStreaming = useStore(store, (s) => s.isStreaming)
  const currentStreamText = useStore(store, (s) => s.currentStreamText)
  const reasoning = useStore(store, (s) => s.reasoning)
  const status = useStore(store, (s) => s.status)
  const notice = useStore(store, (s) => s.notice)
  const settings = useStore(store, (s) => s.settings)

  return (
    <Box flexDirection="column">
      <Text bold color={theme.role.user}>
        router-chat · type /help for commands
      </Text>
      <MessageList messages={messages} streaming={isStreaming ? currentStreamText : null} />
      <ReasoningPanel reasoning={reasoning} />
      <NoticeList lines={notice} />
      <StatusBar
        model={settings.model}
        status={status}
        busy={isStreaming}
        details={`effort ${settings.effort} · temp ${settings.temperature} · max ${settings.maxTokens}`}
      />
      <PromptInput
        placeholder="Message, or /command"
        busy={isStreaming}
        onSubmit={(value) => void store.getState().submit(value)}
        onStop={() => store.getState().stop()}
        onQuit={() => store.getState().quit()}
      />
    </Box>
  )
}
