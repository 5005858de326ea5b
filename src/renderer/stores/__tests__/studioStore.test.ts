import { describe, it, expect, vi } from 'vitest'
import type { ScreenConfig } from '@shared/types/config'
import type { StudioResult } from '@main/services/ImageStudio'
import { ValidationError } from '@main/errors'
import { createStudioStore, type ImageStudioLike } from '../studioStore'

const screen: ScreenConfig = {
  models: ['google/gemini-2.5-flash-image-preview', 'google/gemini-2.0-flash-exp:free'],
  defaultModel: 'google/gemini-2.5-flash-image-preview',
  systemPrompt: 'You are a helpful multimodal AI assistant.',
}

const success: StudioResult = {
  ok: true,
  text: 'Image generated successfully.',
  imagePaths: ['/tmp/studio/1.png'],
  status: '✅ Success with google/gemini-2.5-flash-image-preview.',
  downloadPath: null,
}

type RunImpl = ImageStudioLike['run']

function makeStudio(impl: RunImpl = async () => success) {
  return {
    run: vi.fn(impl),
    stop: vi.fn(),
  } satisfies ImageStudioLike
}

describe('studioStore', () => {
  it('should start from the screen config', () => {
    const store = createStudioStore({ studio: makeStudio(), screen })

    expect(store.getState().settings).toEqual({
      model: 'google/gemini-2.5-flash-image-preview',
      instructions: 'You are a helpful multimodal AI assistant.',
      maxTokens: 32768,
    })
    expect(store.getState().imagePath).toBeNull()
  })

  it('should run a prompt and keep the result', async () => {
    const studio = makeStudio()
    const store = createStudioStore({ studio, screen })

    await store.getState().submit('Draw a lighthouse')

    expect(studio.run).toHaveBeenCalledWith({ prompt: 'Draw a lighthouse', settings: store.getState().settings })
    expect(store.getState().result).toEqual(success)
    expect(store.getState().status).toBe('✅ Success with google/gemini-2.5-flash-image-preview.')
    expect(store.getState().lastPrompt).toBe('Draw a lighthouse')
    expect(store.getState().isRunning).toBe(false)
  })

  it('should send the attached image', async () => {
    const studio = makeStudio()
    const store = createStudioStore({ studio, screen })

    await store.getState().submit('/image ./photo.jpg')
    expect(store.getState().status).toBe('Image attached: ./photo.jpg')
    await store.getState().submit('What is this?')

    expect(studio.run).toHaveBeenCalledWith({
      prompt: 'What is this?',
      image: './photo.jpg',
      settings: store.getState().settings,
    })

    await store.getState().submit('/image')
    expect(store.getState().imagePath).toBeNull()
  })

  it('should show rejected requests in the status', async () => {
    const studio = makeStudio(async () => {
      throw new ValidationError('Please enter a prompt or upload an image.')
    })
    const store = createStudioStore({ studio, screen })

    await store.getState().submit('   ')

    expect(store.getState().status).toBe('⚠️ Please enter a prompt or upload an image.')
    expect(store.getState().isRunning).toBe(false)
  })

  it('should enforce the studio token range', async () => {
    const store = createStudioStore({ studio: makeStudio(), screen })

    await store.getState().submit('/max 2048')
    expect(store.getState().status).toBe('Max tokens must be an integer between 8192 and 65535')
    expect(store.getState().settings.maxTokens).toBe(32768)

    await store.getState().submit('/max 16384')
    expect(store.getState().settings.maxTokens).toBe(16384)
  })

  it('should keep chat-only settings out of the studio', async () => {
    const store = createStudioStore({ studio: makeStudio(), screen })

    await store.getState().submit('/effort high')

    expect(store.getState().status).toBe('Only available on the chat screen.')
  })

  it('should stop a running request', async () => {
    let finish: (result: StudioResult) => void = () => {}
    const studio = makeStudio(
      () =>
        new Promise<StudioResult>((resolve) => {
          finish = resolve
        }),
    )
    const store = createStudioStore({ studio, screen })

    const pending = store.getState().submit('Draw')
    await store.getState().submit('/stop')
    expect(studio.stop).toHaveBeenCalledTimes(1)

    finish({ ok: false, text: '', imagePaths: [], status: '⏹️ Request stopped.', downloadPath: null })
    await pending
    expect(store.getState().status).toBe('⏹️ Request stopped.')
  })

  it('should list saved files on /save', async () => {
    const studio = makeStudio(async () => ({ ...success, downloadPath: '/tmp/studio/2.md' }))
    const store = createStudioStore({ studio, screen })

    await store.getState().submit('/save')
    expect(store.getState().status).toBe('No result to download yet.')

    await store.getState().submit('Draw')
    await store.getState().submit('/save')
    expect(store.getState().notice).toEqual(['/tmp/studio/2.md', '/tmp/studio/1.png'])
  })

  it('should reset the result and image on clear', async () => {
    const store = createStudioStore({ studio: makeStudio(), screen })
    await store.getState().submit('/image a.png')
    await store.getState().submit('Draw')

    await store.getState().submit('/clear')

    expect(store.getState().result).toBeNull()
    expect(store.getState().imagePath).toBeNull()
    expect(store.getState().lastPrompt).toBe('')
  })

  it('should stop a running request before quitting', async () => {
    let finish: (result: StudioResult) => void = () => {}
    const studio = makeStudio(
      () =>
        new Promise<StudioResult>((resolve) => {
          finish = resolve
        }),
    )
    const onQuit = vi.fn()
    const store = createStudioStore({ studio, screen, onQuit })

    const pending = store.getState().submit('Draw')
    await store.getState().submit('/quit')

    expect(studio.stop).toHaveBeenCalledTimes(1)
    expect(onQuit).toHaveBeenCalledTimes(1)
    expect(studio.stop.mock.invocationCallOrder[0]).toBeLessThan(onQuit.mock.invocationCallOrder[0] ?? 0)

    finish({ ok: false, text: '', imagePaths: [], status: '⏹️ Request stopped.', downloadPath: null })
    await pending
    expect(store.getState().isRunning).toBe(false)
  })
})
