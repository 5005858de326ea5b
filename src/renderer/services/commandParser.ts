import type { ReasoningEffort } from '@shared/types/llm'
import { REASONING_EFFORTS } from '@shared/types/llm'

export type Command =
  | { type: 'message'; text: string }
  | { type: 'model'; model: string }
  | { type: 'models' }
  | { type: 'effort'; effort: ReasoningEffort }
  | { type: 'temperature'; value: number }
  | { type: 'maxTokens'; value: number }
  | { type: 'system'; text: string }
  | { type: 'image'; path: string | null }
  | { type: 'clear' }
  | { type: 'stop' }
  | { type: 'save' }
  | { type: 'reload' }
  | { type: 'help' }
  | { type: 'quit' }
  | { type: 'invalid'; reason: string }

export const COMMAND_HELP: ReadonlyArray<[string, string]> = [
  ['/model <id|number>', 'switch model'],
  ['/models', 'list configured models'],
  ['/effort <low|medium|high>', 'reasoning effort'],
  ['/temp <0-2>', 'temperature'],
  ['/max <tokens>', 'max tokens'],
  ['/system <text>', 'replace system instructions'],
  ['/image [path]', 'attach an image (no path detaches)'],
  ['/clear', 'clear the conversation'],
  ['/stop', 'stop the current response (Esc)'],
  ['/save', 'show the download file of the last answer'],
  ['/reload', 'reload API key and base URL from the environment'],
  ['/quit', 'exit'],
]

function findEffort(value: string): ReasoningEffort | undefined {
  return REASONING_EFFORTS.find((effort) => effort === value)
}

function parseNumber(raw: string): number | null {
  if (!raw.trim()) return null
  const value = Number(raw)
  return Number.isFinite(value) ? value : null
}

/** 解析输入框内容：以 / 开头的是命令，其余作为消息发送 */
export function parseCommand(input: string): Command {
  const trimmed = input.trim()
  if (!trimmed.startsWith('/')) {
    return { type: 'message', text: input }
  }

  const spaceIndex = trimmed.search(/\s/)
  const name = (spaceIndex === -1 ? trimmed.slice(1) : trimmed.slice(1, spaceIndex)).toLowerCase()
  const arg = spaceIndex === -1 ? '' : trimmed.slice(spaceIndex + 1).trim()

  switch (name) {
    case 'model':
      return arg ? { type: 'model', model: arg } : { type: 'invalid', reason: 'Usage: /model <id|number>' }
    case 'models':
      return { type: 'models' }
    case 'effort': {
      const effort = findEffort(arg.toLowerCase())
      return effort ? { type: 'effort', effort } : { type: 'invalid', reason: 'Effort must be low, medium or high' }
    }
    case 'temp':
    case 'temperature': {
      const value = parseNumber(arg)
      return value === null
        ? { type: 'invalid', reason: 'Usage: /temp <number>' }
        : { type: 'temperature', value }
    }
    case 'max': {
      const value = parseNumber(arg)
      return value === null || !Number.isInteger(value)
        ? { type: 'invalid', reason: 'Usage: /max <integer>' }
        : { type: 'maxTokens', value }
    }
    case 'system':
      return { type: 'system', text: arg }
    case 'image':
      return { type: 'image', path: arg || null }
    case 'clear':
      return { type: 'clear' }
    case 'stop':
      return { type: 'stop' }
    case 'save':
      return { type: 'save' }
    case 'reload':
      return { type: 'reload' }
    case 'help':
      return { type: 'help' }
    case 'quit':
    case 'exit':
      return { type: 'quit' }
    default:
      return { type: 'invalid', reason: `Unknown command: /${name}` }
  }
}

/** /model 支持按列表序号（从 1 开始）选择 */
export function resolveModelChoice(choice: string, models: readonly string[]): string {
  if (/^\d+$/.test(choice)) {
    const index = Number(choice) - 1
    return models[index] ?? choice
  }
  return choice
}
