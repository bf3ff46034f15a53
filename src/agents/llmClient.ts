import { GoogleGenerativeAI } from '@google/generative-ai';

export interface LlmRequest {
  prompt: string;
  maxOutputTokens: number;
}

export interface LlmResponse {
  text: string;
  finishReason?: string;
  inputTokens?: number;
  outputTokens?: number;
}

/** Black-box text generation; tests substitute a scripted implementation. */
export interface LlmClient {
  readonly provider: string;
  readonly model: string;
  generate(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse>;
}

export class GeminiClient implements LlmClient {
  readonly provider = 'gemini';
  private readonly genAI: GoogleGenerativeAI;

  constructor(apiKey: string, readonly model: string) {
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY environment variable is not set');
    }
    this.genAI = new GoogleGenerativeAI(apiKey);
  }

  async generate(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse> {
    const model = this.genAI.getGenerativeModel({ model: this.model });
    const result = await model.generateContent(
      {
        contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
        generationConfig: {
          maxOutputTokens: request.maxOutputTokens,
          temperature: 0.0,
          responseMimeType: 'application/json',
        },
      },
      { signal }
    );
    const usage = result.response.usageMetadata;
    return {
      text: result.response.text(),
      finishReason: result.response.candidates?.[0]?.finishReason,
      inputTokens: usage?.promptTokenCount,
      outputTokens: usage?.candidatesTokenCount,
    };
  }
}
