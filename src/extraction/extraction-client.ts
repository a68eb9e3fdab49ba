import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import type { Config } from '../types/index.js';
import { SYSTEM_INSTRUCTION } from '../extractors/base-extractor.js';
import { ExtractionServiceError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/** Low temperature keeps extraction consistent between runs */
export const EXTRACTION_TEMPERATURE = 0.1;
export const MAX_OUTPUT_TOKENS = 1000;

export interface StructuredExtractor {
  extract(windowText: string, prompt: string): Promise<string>;
}

export function buildUserMessage(windowText: string, prompt: string): string {
  return `${prompt}\n\nPage content:\n\n${windowText}`;
}

/**
 * One non-streaming Gemini request per item. No retries here: a failure is
 * reported to the caller as ExtractionServiceError.
 */
export class ExtractionClient implements StructuredExtractor {
  private readonly model: GenerativeModel;
  private readonly modelName: string;

  constructor(config: Config['gemini']) {
    const genAI = new GoogleGenerativeAI(config.apiKey);
    this.modelName = config.model;
    this.model = genAI.getGenerativeModel({
      model: config.model,
      systemInstruction: SYSTEM_INSTRUCTION,
      generationConfig: {
        temperature: EXTRACTION_TEMPERATURE,
        maxOutputTokens: MAX_OUTPUT_TOKENS,
        responseMimeType: 'application/json',
      },
    });
  }

  async extract(windowText: string, prompt: string): Promise<string> {
    logger.debug('Requesting structured extraction', {
      model: this.modelName,
      windowLength: windowText.length,
    });

    let text: string;
    try {
      const result = await this.model.generateContent(buildUserMessage(windowText, prompt));
      text = result.response.text();
    } catch (error) {
      throw new ExtractionServiceError(`LLM extraction failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const trimmed = text.trim();
    if (!trimmed) {
      throw new ExtractionServiceError('LLM extraction failed: empty response');
    }

    return trimmed;
  }
}
