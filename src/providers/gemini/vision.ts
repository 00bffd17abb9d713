/**
 * Gemini Vision
 *
 * Sends one image inline with the structured description prompt.
 */

import { buildVisionPrompt } from '../../content/vision'
import { fromApiError } from '../../errors'
import type { ImageData, ImageDescription, VisionProvider } from '../../types/providers'
import { GeminiClient, type GeminiClientConfig } from './client'

export class GeminiVision implements VisionProvider {
  private readonly client: GeminiClient

  constructor(config: GeminiClientConfig | GeminiClient) {
    this.client = config instanceof GeminiClient ? config : new GeminiClient(config)
  }

  async describeImage(image: ImageData, model: string, caption?: string): Promise<ImageDescription> {
    const result = await this.client.generateContent(model, {
      contents: [
        {
          role: 'user',
          parts: [
            { text: buildVisionPrompt(caption) },
            { inlineData: { mimeType: image.mimeType, data: Buffer.from(image.bytes).toString('base64') } }
          ]
        }
      ]
    })
    if (!result.ok) throw fromApiError(result.error, 'Describe image')
    return { text: result.value.text, usage: result.value.usage }
  }
}
