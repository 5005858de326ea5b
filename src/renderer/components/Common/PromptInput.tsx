import { useState } from 'react'
import { Box, Text, useInput } from 'ink'
import TextInput from 'ink-text-input'
import { theme } from '../../styles/theme'

interface PromptInputProps {
  placeholder: string
  busy: boolean
  onSubmit: (value: string) => void
  onStop: () => void
  onQuit: () => void
}

/** 单行输入框：Enter 提交，Esc 停止当前生成，Ctrl+C 退出 */
export default function PromptInput({ placeholder, busy, onSubmit, onStop, onQuit }: PromptInputProps) {
  const [value, setValue] = useState('')

  useInput((input, key) => {
    if (key.ctrl && input === 'c') {
      onQuit()
      return
    }
    if (key.escape && busy) onStop()
  })

  const handleSubmit = (text: string) => {
    if (!text.trim()) return
    setValue('')
    onSubmit(text)
  }

  return (
    <Box borderStyle="round" borderColor={busy ? theme.border.default : theme.border.focus} paddingX={1}>
      <Text color={theme.role.user}>{'> '}</Text>
      <TextInput value={value} onChange={setValue} onSubmit={handleSubmit} placeholder={placeholder} />
    </Box>
  )
}
