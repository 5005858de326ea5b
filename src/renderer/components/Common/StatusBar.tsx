import { Box, Text } from 'ink'
import { statusColor, theme } from '../../styles/theme'

interface StatusBarProps {
  model: string
  status: string
  busy: boolean
  /** 额外的设置摘要，例如 effort/temperature */
  details?: string
}

export default function StatusBar({ model, status, busy, details }: StatusBarProps) {
  return (
    <Box justifyContent="space-between" borderStyle="single" borderColor={theme.border.default} paddingX={1}>
      <Text color={statusColor(status)}>
        {busy ? '● ' : ''}
        {status}
      </Text>
      <Text color={theme.text.muted}>
        {model}
        {details ? ` · ${details}` : ''}
      </Text>
    </Box>
  )
}
