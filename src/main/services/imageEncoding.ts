import sharp from 'sharp'
import { UpstreamError, ValidationError, toErrorMessage } from '../errors'

/** 上传前统一转换的格式，透明通道不保留 */
export const UPLOAD_MIME_TYPE = 'image/jpeg'

const DATA_URL_PATTERN = /^data:([\w.+-]+\/[\w.+-]+);base64,([A-Za-z0-9+/=\s]+)$/

const EXTENSIONS: Record<string, string> = {
  'image/png': '.png',
  'image/jpeg': '.jpg',
  'image/webp': '.webp',
  'image/gif': '.gif',
}

/**
 * 将任意 sharp 可读的图片转成 JPEG data URL。
 * 透明区域铺白底，EXIF 方向先校正。
 */
export async function encodeImageAsDataUrl(input: Buffer | string): Promise<string> {
  let jpeg: Buffer
  try {
    jpeg = await sharp(input).rotate().flatten({ background: '#ffffff' }).jpeg({ quality: 90 }).toBuffer()
  } catch (err) {
    throw new ValidationError(`Unsupported or unreadable image: ${toErrorMessage(err)}`)
  }
  return `data:${UPLOAD_MIME_TYPE};base64,${jpeg.toString('base64')}`
}

/** 解析上游返回的 base64 data URL */
export function decodeDataUrl(url: string): { mimeType: string; data: Buffer } {
  const match = DATA_URL_PATTERN.exec(url.trim())
  if (!match) {
    throw new UpstreamError('Unsupported image reference in response')
  }
  const [, mimeType, payload] = match
  return { mimeType, data: Buffer.from(payload.replace(/\s+/g, ''), 'base64') }
}

export function extensionForMimeType(mimeType: string): string {
  return EXTENSIONS[mimeType.toLowerCase()] ?? '.bin'
}
