import { Box, Text } from 'ink'
import { theme } from '../../styles/theme'

export default function NoticeList({ lines }: { lines: string[] }) {
  if (lines.length === 0) return null
  return (
    <Box flexDirection="column" paddingX={1}>
      {lines.map((line, index) => (
        <Text key={index} color={theme.text.secondary}>
          {line}
        </Text>
      ))}
    </Box>
  )
}
