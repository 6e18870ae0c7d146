import OpenAI from 'openai';

export interface VisionPrompt {
  prompt: string;
  imageBase64: string;
  mimeType: string;
  temperature: number;
}

/**
 * Minimal surface of a chat-completions endpoint that accepts images.
 */
export interface VisionModelClient {
  listModels(): Promise<string[]>;
  complete(model: string, request: VisionPrompt): Promise<string>;
}

export interface OpenAIVisionModelClientOptions {
  baseURL: string;
  apiKey?: string;
}

export class OpenAIVisionModelClient implements VisionModelClient {
  private readonly openai: OpenAI;

  constructor(options: OpenAIVisionModelClientOptions) {
    // Local runtimes such as Ollama ignore the key but the SDK requires one
    this.openai = new OpenAI({
      apiKey: options.apiKey || 'ollama',
      baseURL: options.baseURL,
    });
  }

  async listModels(): Promise<string[]> {
    const page = await this.openai.models.list();
    return page.data.map((model) => model.id);
  }

  async complete(model: string, request: VisionPrompt): Promise<string> {
    const completion = await this.openai.chat.completions.create({
      model,
      temperature: request.temperature,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: request.prompt },
            {
              type: 'image_url',
              image_url: {
                url: `data:${request.mimeType};base64,${request.imageBase64}`,
              },
            },
          ],
        },
      ],
    });

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error('No valid response from vision model');
    }
    return content;
  }
}
