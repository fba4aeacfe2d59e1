import {
  BadGatewayException,
  Inject,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from '@nestjs/common';
import {
  GoogleGenerativeAI,
  TaskType,
  type GenerativeModel,
} from '@google/generative-ai';
import { APP_CONFIG, type AppConfig } from '../config/app-config';
import { errorMessage } from '../lib/errors';

type GeminiModels = {
  embedding: GenerativeModel;
  chat: GenerativeModel;
};

@Injectable()
export class GeminiService {
  private readonly logger = new Logger(GeminiService.name);
  private readonly models: GeminiModels | null;

  constructor(@Inject(APP_CONFIG) private readonly config: AppConfig) {
    const { apiKey, embeddingModel, chatModel, embeddingTimeoutMs, rankingTimeoutMs } =
      config.gemini;
    if (!apiKey) {
      this.logger.warn('GEMINI_KEY is not set; embedding and ranking are unavailable');
      this.models = null;
      return;
    }

    const client = new GoogleGenerativeAI(apiKey);
    this.models = {
      embedding: client.getGenerativeModel(
        { model: embeddingModel },
        { timeout: embeddingTimeoutMs },
      ),
      chat: client.getGenerativeModel(
        {
          model: chatModel,
          generationConfig: { responseMimeType: 'application/json' },
        },
        { timeout: rankingTimeoutMs },
      ),
    };
  }

  isConfigured(): boolean {
    return this.models !== null;
  }

  /**
   * Embed search text with the query task type. Catalog documents were embedded
   * with RETRIEVAL_DOCUMENT by the same model; mixing models or task types
   * degrades the neighbours.
   */
  async embedQuery(text: string): Promise<number[]> {
    const models = this.requireModels();
    const expected = this.config.gemini.embeddingDimension;

    let values: unknown;
    try {
      const res = await models.embedding.embedContent({
        content: { role: 'user', parts: [{ text }] },
        taskType: TaskType.RETRIEVAL_QUERY,
      });
      values = res.embedding?.values;
    } catch (err) {
      throw new BadGatewayException(
        `Gemini embedContent failed: ${errorMessage(err)}`,
      );
    }

    if (!Array.isArray(values) || !values.every((v) => typeof v === 'number')) {
      throw new BadGatewayException('Gemini embedContent returned no vector');
    }
    if (values.length !== expected) {
      throw new BadGatewayException(
        `Gemini embedContent returned ${values.length} dimensions (expected ${expected})`,
      );
    }
    return values;
  }

  /** Single-turn generation in JSON response mode; returns the raw text. */
  async generateJson(prompt: string): Promise<string> {
    const models = this.requireModels();
    try {
      const result = await models.chat.generateContent(prompt);
      return result.response.text();
    } catch (err) {
      throw new BadGatewayException(
        `Gemini generateContent failed: ${errorMessage(err)}`,
      );
    }
  }

  private requireModels(): GeminiModels {
    if (!this.models) {
      throw new ServiceUnavailableException('GEMINI_KEY is not configured');
    }
    return this.models;
  }
}
