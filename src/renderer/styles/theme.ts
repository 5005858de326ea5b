/** 终端主题颜色 */

export const theme = {
  // 文字色
  text: {
    primary: '#e4e6ed',
    secondary: '#9ca0ae',
    muted: '#6b7084',
  },
  // 边框色
  border: {
    default: '#2e3347',
    focus: '#5b8def',
  },
  // 角色色
  role: {
    user: '#5b8def',
    assistant: '#34d399',
    reasoning: '#9ca0ae',
  },
  // 状态色
  status: {
    success: '#34d399',
    error: '#f87171',
    info: '#60a5fa',
    warning: '#fbbf24',
  },
} as const

/** 按状态文本的前缀选择颜色 */
export function statusColor(status: string): string {
  if (status.startsWith('❌') || status.startsWith('⚠️')) return theme.status.error
  if (status.startsWith('✅')) return theme.status.success
  if (status.startsWith('⏹️') || status.startsWith('Stopped')) return theme.status.warning
  return theme.status.info
}
