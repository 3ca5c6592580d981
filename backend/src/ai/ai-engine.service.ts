import { Injectable, Logger } from '@nestjs/common';

import { ParkingError } from '../common/errors/parking.errors';
import { LoggingService } from '../logging/logging.service';
import { ChatAnswer, IntentClassification } from './ai.types';
import { DataRetrieverService, ToolCall } from './data.retriever';
import { IntentService } from './intent.service';
import {
  ASSISTANT_UNAVAILABLE_MESSAGE,
  GENERAL_CONTEXT,
  ResponseGeneratorService,
} from './response.generator';

export const EMPTY_QUERY_REPLY = 'Please ask me something about visitors or parking.';

type Plan =
  | { kind: 'reply'; answer: string }
  | { kind: 'context'; context: string }
  | { kind: 'tool'; call: ToolCall };

/**
 * Answers chat queries: classify, run the matching read-only tool, compose.
 * Holds no per-request state, so one instance serves every request. Never
 * throws; failures come back as an apologetic answer.
 */
@Injectable()
export class AiEngineService {
  private readonly logger = new Logger(AiEngineService.name);

  constructor(
    private readonly intentService: IntentService,
    private readonly dataRetriever: DataRetrieverService,
    private readonly responseGenerator: ResponseGeneratorService,
    private readonly loggingService: LoggingService,
  ) {}

  async processQuery(query: string): Promise<ChatAnswer> {
    const trimmed = typeof query === 'string' ? query.trim() : '';
    if (!trimmed) {
      return { intent: 'general', answer: EMPTY_QUERY_REPLY };
    }

    let classification: IntentClassification = { intent: 'general' };
    let usedModel = false;

    try {
      classification = this.intentService.classify(trimmed);
      this.logger.debug(
        `Intent classified as ${classification.intent}${
          classification.parameter ? ` (${classification.parameter})` : ''
        }`,
      );

      const plan = this.plan(classification, trimmed);
      let answer: string;

      if (plan.kind === 'reply') {
        answer = plan.answer;
      } else if (!this.responseGenerator.modelAvailable) {
        answer = ASSISTANT_UNAVAILABLE_MESSAGE;
      } else {
        const context =
          plan.kind === 'context' ? plan.context : (await this.dataRetriever.dispatch(plan.call)).text;
        usedModel = true;
        answer = await this.responseGenerator.compose(trimmed, context);
      }

      this.loggingService.logChatQuery({
        query: trimmed,
        intent: classification.intent,
        parameter: classification.parameter,
        usedModel,
      });
      return { intent: classification.intent, answer };
    } catch (error) {
      this.logger.error(
        `Chat query failed for intent ${classification.intent}: ${
          error instanceof Error ? error.message : String(error)
        }`,
      );
      this.loggingService.logChatQuery({
        query: trimmed,
        intent: classification.intent,
        parameter: classification.parameter,
        usedModel,
        failed: true,
      });
      return { intent: classification.intent, answer: this.apology(error) };
    }
  }

  private plan(classification: IntentClassification, query: string): Plan {
    const { intent, parameter } = classification;

    const templated = this.responseGenerator.templateReply(intent, query);
    if (templated !== null) {
      return { kind: 'reply', answer: templated };
    }

    switch (intent) {
      case 'search':
        return parameter
          ? { kind: 'tool', call: { tool: 'search', name: parameter } }
          : { kind: 'reply', answer: this.responseGenerator.missingParameterReply('search') };
      case 'unit':
        return parameter
          ? { kind: 'tool', call: { tool: 'unit', unitNumber: parameter } }
          : { kind: 'reply', answer: this.responseGenerator.missingParameterReply('unit') };
      case 'stats':
      case 'summary':
      case 'list':
        return { kind: 'tool', call: { tool: intent } };
      default:
        return { kind: 'context', context: GENERAL_CONTEXT };
    }
  }

  private apology(error: unknown): string {
    const detail =
      error instanceof ParkingError ? ` ${error.message}` : ' Please try again in a moment.';
    return `Sorry, I couldn't answer that right now.${detail}`;
  }
}

