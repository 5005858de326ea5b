import { readFile } from 'fs/promises'
import { hasErrorCode, toErrorMessage } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('ConfigLoader')

async function readTextFile(filepath: string): Promise<string | null> {
  try {
    return await readFile(filepath, 'utf-8')
  } catch (err) {
    if (hasErrorCode(err, 'ENOENT')) {
      return null
    }
    log.warn('读取配置文件失败', { filepath, error: toErrorMessage(err) })
    return null
  }
}

/** 读取模型列表：每行一个，忽略空行，首行为默认模型 */
export async function loadModels(filepath: string, fallback: readonly string[]): Promise<string[]> {
  const content = await readTextFile(filepath)
  if (content === null) {
    log.warn('模型列表文件不存在，使用内置列表', { filepath })
    return [...fallback]
  }

  const models = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
  if (models.length === 0) {
    log.warn('模型列表文件为空，使用内置列表', { filepath })
    return [...fallback]
  }
  return models
}

/** 读取 system prompt，文件不存在或为空时使用默认值 */
export async function loadSystemPrompt(filepath: string, fallback: string): Promise<string> {
  const content = await readTextFile(filepath)
  if (content === null) {
    log.warn('System prompt 文件不存在，使用默认值', { filepath })
    return fallback
  }
  const prompt = content.trim()
  return prompt || fallback
}
