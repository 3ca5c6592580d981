import { Injectable, Logger } from '@nestjs/common';

import { ChatIntent } from './ai.types';
import { TextGenerator } from './text.generator';

export const ASSISTANT_UNAVAILABLE_MESSAGE =
  'The parking assistant is unavailable right now. Please check that OPENAI_API_KEY is configured.';

export const GENERAL_CONTEXT =
  'I can help with visitor info, parking stats, and searching. Please ask about visitors, parking availability, or specific units.';

const GREETING_REPLY = `Hello! I'm your parking assistant. I can help you with:
- Checking parking availability
- Finding specific visitors
- Viewing visitor lists
- Searching by unit number

What would you like to know?`;

const HELP_REPLY = `How I can help you:

Check statistics:
- "How many visitors are parked?"
- "What's the parking status?"
- "How many spots available?"

Search visitors:
- "Find visitor John"
- "Search for visitor named Alice"
- "Is there a visitor called Mike?"

View lists:
- "Show all visitors"
- "List all parked cars"

Search by unit:
- "Show visitors for unit B-1-01"
- "Who visited unit A-74?"

Just ask naturally!`;

const HOW_TO_SEARCH_REPLY = `How to search for visitors:

1. By name: ask me "Find visitor [Name]" or "Search for [Name]".
   Example: "Find visitor John"
2. By license plate: open the visitor list and use its search bar.
3. By unit number: ask me "Show visitors for unit [Unit#]".
   Example: "Show visitors for unit B-1-01"`;

const HOW_TO_UNIT_REPLY = `How to find visitors by unit:

1. Ask me directly: "Show visitors for unit [Unit Number]".
   Example: "Show visitors for unit B-1-01"
   Example: "Who visited unit A-74?"
2. Open the visitor list and filter by unit number.

I'll show the name, license plate and status of every visitor for that unit.`;

const HOW_TO_GENERAL_REPLY = `I can help you with:
- Searching visitors: ask "How can I search for visitors?"
- Finding by unit: ask "How to find visitors by unit?"
- Checking availability: ask "How many spots are available?"
- Viewing lists: just say "Show all visitors"

What would you like to know?`;

const MISSING_NAME_REPLY = "Please specify a visitor name. Example: 'Find visitor John'";

const MISSING_UNIT_REPLY =
  "Please specify a unit number. Example: 'Show visitors for unit B-1-01'";

/**
 * Turns dispatcher output into the user-facing answer: canned replies for
 * greeting, help and how-to questions, one model call for everything else.
 */
@Injectable()
export class ResponseGeneratorService {
  private readonly logger = new Logger(ResponseGeneratorService.name);

  constructor(private readonly textGenerator: TextGenerator) {}

  get modelAvailable(): boolean {
    return this.textGenerator.available;
  }

  /** Returns null for intents that need data and a model call. */
  templateReply(intent: ChatIntent, query: string): string | null {
    switch (intent) {
      case 'greeting':
        return GREETING_REPLY;
      case 'help':
        return HELP_REPLY;
      case 'how_to':
        return this.howToReply(query);
      default:
        return null;
    }
  }

  missingParameterReply(intent: 'search' | 'unit'): string {
    return intent === 'search' ? MISSING_NAME_REPLY : MISSING_UNIT_REPLY;
  }

  async compose(query: string, context: string): Promise<string> {
    if (!this.textGenerator.available) {
      return ASSISTANT_UNAVAILABLE_MESSAGE;
    }

    this.logger.debug(`Composing answer with ${context.length} characters of context`);
    return this.textGenerator.generate(this.buildPrompt(query, context));
  }

  buildPrompt(query: string, context: string): string {
    return `You are a friendly parking management assistant. Respond naturally and helpfully.

IMPORTANT: When you have visitor data, you MUST display it completely. Never summarize or say "followed by..." - always show the full list.

Context/Data: ${context}

User Question: ${query}

Instructions:
- If context contains visitor information, display ALL of it in a clear, readable format
- Use bullet points or numbered lists for multiple visitors
- Include all details provided (name, IC, plate, unit, status)
- Be concise but COMPLETE - never truncate or summarize the data
- If no data is available, say so clearly

Provide your response:`;
  }

  private howToReply(query: string): string {
    const normalized = query.toLowerCase();
    if (normalized.includes('search') || normalized.includes('find')) {
      return HOW_TO_SEARCH_REPLY;
    }
    if (normalized.includes('unit')) {
      return HOW_TO_UNIT_REPLY;
    }
    return HOW_TO_GENERAL_REPLY;
  }
}
