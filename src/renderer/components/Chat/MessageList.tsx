import { Box, Text } from 'ink'
import type { ChatMessageView } from '../../stores/chatStore'
import { theme } from '../../styles/theme'

interface MessageListProps {
  messages: ChatMessageView[]
  /** 正在流式输出的回答 */
  streaming: string | null
}

function MessageBubble({ role, content }: Pick<ChatMessageView, 'role' | 'content'>) {
  const isUser = role === 'user'
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text bold color={isUser ? theme.role.user : theme.role.assistant}>
        {isUser ? 'You' : 'Assistant'}
      </Text>
      <Text color={theme.text.primary}>{content}</Text>
    </Box>
  )
}

export default function MessageList({ messages, streaming }: MessageListProps) {
  return (
    <Box flexDirection="column" paddingX={1}>
      {messages.map((message) => (
        <MessageBubble key={message.id} role={message.role} content={message.content} />
      ))}
      {streaming !== null && <MessageBubble role="assistant" content={streaming || '…'} />}
    </Box>
  )
}
