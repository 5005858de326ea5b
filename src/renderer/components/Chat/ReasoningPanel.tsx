import { Box, Text } from 'ink'
import { theme } from '../../styles/theme'

export default function ReasoningPanel({ reasoning }: { reasoning: string }) {
  return (
    <Box flexDirection="column" borderStyle="single" borderColor={theme.border.default} paddingX={1}>
      <Text bold color={theme.role.reasoning}>
        Reasoning
      </Text>
      <Text color={theme.role.reasoning} dimColor>
        {reasoning}
      </Text>
    </Box>
  )
}
