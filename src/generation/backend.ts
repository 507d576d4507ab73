import { createOpenAI } from '@ai-sdk/openai'
import { generateText, experimental_generateImage as generateImage } from 'ai'
import type { DirectorConfig } from '../config.js'
import type { ImageResult } from './types.js'

export interface TextCall {
  prompt: string
  temperature: number
  maxTokens: number
  model: string
}

export interface ImageCall {
  prompt: string
  model: string
}

/**
 * The one seam to the external model service. Implementations make a single
 * attempt per call; the orchestrator owns retries.
 */
export interface GenerationBackend {
  generateText(call: TextCall): Promise<string>
  generateImage(call: ImageCall): Promise<ImageResult>
}

export function createLLMProvider(config: DirectorConfig['llm']) {
  // OpenAI, Cerebras, Ollama and OpenRouter all speak the OpenAI format
  if (config.provider === 'anthropic') {
    throw new Error('Anthropic provider not yet implemented: install @ai-sdk/anthropic when needed')
  }

  const openai = createOpenAI({
    // Ollama ignores the key but the client insists on one
    apiKey: config.apiKey || (config.provider === 'ollama' ? 'ollama' : undefined),
    baseURL: config.baseUrl || 'https://api.openai.com/v1',
    name: config.provider
  })

  // chat() rather than the default Responses API, which only OpenAI serves
  return {
    text: (modelId: string) => openai.chat(modelId),
    image: (modelId: string) => openai.image(modelId)
  }
}

export class AiSdkBackend implements GenerationBackend {
  private provider: ReturnType<typeof createLLMProvider>

  constructor(config: DirectorConfig['llm']) {
    this.provider = createLLMProvider(config)
  }

  async generateText(call: TextCall): Promise<string> {
    const { text } = await generateText({
      model: this.provider.text(call.model),
      prompt: call.prompt,
      temperature: call.temperature,
      maxOutputTokens: call.maxTokens,
      maxRetries: 0
    })
    return text
  }

  async generateImage(call: ImageCall): Promise<ImageResult> {
    const { image } = await generateImage({
      model: this.provider.image(call.model),
      prompt: call.prompt,
      maxRetries: 0
    })
    return { base64: image.base64, mediaType: image.mediaType }
  }
}
