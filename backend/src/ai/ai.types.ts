export type ChatIntent =
  | 'how_to'
  | 'stats'
  | 'summary'
  | 'search'
  | 'unit'
  | 'list'
  | 'greeting'
  | 'help'
  | 'general';

export interface IntentClassification {
  intent: ChatIntent;
  parameter?: string;
}

export interface ChatAnswer {
  intent: ChatIntent;
  answer: string;
}
