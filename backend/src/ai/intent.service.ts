import { Injectable } from '@nestjs/common';

import { ChatIntent, IntentClassification } from './ai.types';

interface IntentRule {
  intent: ChatIntent;
  triggers: readonly string[];
  extract?: (query: string) => string | undefined;
}

export const SEARCH_STOP_WORDS: ReadonlySet<string> = new Set([
  'search',
  'find',
  'for',
  'visitor',
  'named',
  'called',
  'the',
  'a',
  'an',
  'is',
  'there',
  'where',
  'who',
  'locate',
  'how',
  'can',
  'i',
  'do',
  'to',
  'tell',
  'me',
  'explain',
  'show',
]);

const UNIT_PATTERN = /[A-Z]-?\d+-?\d*/;

function tokens(query: string): string[] {
  return query.split(/\s+/).filter((token) => token.length > 0);
}

function stripPunctuation(token: string): string {
  return token.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/** First token that looks like a name; the first qualifying token wins. */
export function extractVisitorName(query: string): string | undefined {
  const name = tokens(query)
    .map(stripPunctuation)
    .find(
      (word) => word.length > 2 && !SEARCH_STOP_WORDS.has(word.toLowerCase()) && !/^\d+$/.test(word),
    );
  return name ? capitalize(name) : undefined;
}

/** Unit codes such as B-1-01, A-74 or B1-09, else any token mixing letters and digits. */
export function extractUnitNumber(query: string): string | undefined {
  const match = query.toUpperCase().match(UNIT_PATTERN);
  if (match) {
    return match[0];
  }

  const unit = tokens(query).find((word) => /\d/.test(word) && /\p{L}/u.test(word));
  return unit?.toUpperCase();
}

/**
 * Evaluated top to bottom, first match wins. how_to sits above search and
 * unit so that "how can I search for a visitor" gets instructions instead
 * of a search.
 */
export const INTENT_RULES: readonly IntentRule[] = [
  {
    intent: 'how_to',
    triggers: [
      'how can i',
      'how do i',
      'how to',
      'what are the ways',
      'tell me how',
      'explain how',
      'show me how',
    ],
  },
  {
    intent: 'stats',
    triggers: [
      'how many',
      'count',
      'stats',
      'statistics',
      'occupancy',
      'available',
      'free',
      'spots',
      'capacity',
    ],
  },
  {
    intent: 'summary',
    triggers: ['status', 'summary', 'overview', 'situation', 'full', 'busy'],
  },
  {
    intent: 'search',
    triggers: [
      'search for',
      'find visitor',
      'locate visitor',
      'look for visitor',
      'where is',
      'is there a visitor',
    ],
    extract: extractVisitorName,
  },
  {
    intent: 'unit',
    triggers: ['unit', 'apartment', 'flat'],
    extract: extractUnitNumber,
  },
  {
    intent: 'list',
    triggers: ['list', 'show all', 'display', 'view all', 'see all', 'visitors'],
  },
  {
    intent: 'greeting',
    triggers: ['hello', 'hi', 'hey', 'greetings'],
  },
  {
    intent: 'help',
    triggers: ['help', 'what can you', 'how to use'],
  },
];

@Injectable()
export class IntentService {
  classify(query: string): IntentClassification {
    const normalized = query.toLowerCase();
    const rule = INTENT_RULES.find((candidate) =>
      candidate.triggers.some((trigger) => normalized.includes(trigger)),
    );

    if (!rule) {
      return { intent: 'general' };
    }

    const parameter = rule.extract?.(query);
    return parameter ? { intent: rule.intent, parameter } : { intent: rule.intent };
  }
}
