import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import OpenAI from 'openai';

import { BackendUnavailableError } from '../common/errors/parking.errors';

/**
 * Free-form text generation. `generate` throws BackendUnavailableError when
 * the backend is not configured, unreachable or returns nothing.
 */
export abstract class TextGenerator {
  abstract readonly available: boolean;

  abstract generate(prompt: string): Promise<string>;
}

@Injectable()
export class OpenAiTextGenerator extends TextGenerator {
  private readonly logger = new Logger(OpenAiTextGenerator.name);
  private readonly openai: OpenAI | null;
  private readonly responseModel: string;

  constructor(private readonly configService: ConfigService) {
    super();
    const apiKey = this.configService.get<string>('OPENAI_API_KEY');
    this.responseModel =
      this.configService.get<string>('OPENAI_RESPONSE_MODEL') ?? 'gpt-4o-mini';

    if (!apiKey) {
      this.logger.warn('OPENAI_API_KEY is not configured. The parking assistant is unavailable.');
      this.openai = null;
      return;
    }

    this.openai = new OpenAI({ apiKey });
  }

  get available(): boolean {
    return this.openai !== null;
  }

  async generate(prompt: string): Promise<string> {
    if (!this.openai) {
      throw new BackendUnavailableError('Generative backend is not configured');
    }

    let output: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.responseModel,
        messages: [
          {
            role: 'user',
            content: prompt,
          },
        ],
        temperature: 0.3,
      });
      output = response.choices[0]?.message?.content;
    } catch (error) {
      this.logger.error(
        'OpenAI completion failed',
        error instanceof Error ? error.stack : String(error),
      );
      throw new BackendUnavailableError('Generative backend request failed', error);
    }

    if (!output) {
      throw new BackendUnavailableError('No output from OpenAI');
    }
    return output.trim();
  }
}
