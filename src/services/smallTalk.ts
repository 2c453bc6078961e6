import lexicon from '../data/lexicon.json';
import { containsPhrase } from './queryAnalysis';

export const SMALL_TALK_REPLIES = {
  greeting: "Hello! I'm your autonomous customer support agent. How can I help you today?",
  howAreYou: "I'm functioning well, thank you! I'm here to help you with any questions using my available tools.",
  morning: 'Good morning! What can I assist you with today?',
  goodbye: 'Goodbye! Thank you for chatting with me. Have a great day!',
  fallback: "I'm here to help! How can I assist you today?"
} as const;

const { conversational, goodbye, greeting, morning } = lexicon.smallTalk;

function containsAny(text: string, phrases: string[]): boolean {
  return phrases.some(phrase => containsPhrase(text, phrase));
}

export function isConversational(message: string): boolean {
  return containsAny(message, conversational);
}

export function isGoodbye(message: string): boolean {
  return containsAny(message, goodbye);
}

/**
 * Canned reply for greetings and goodbyes, answered without the model.
 * Returns null when the message is not small talk.
 */
export function handleConversationalQuery(message: string): string | null {
  if (!isConversational(message) && !isGoodbye(message)) {
    return null;
  }

  if (containsAny(message, greeting)) {
    return SMALL_TALK_REPLIES.greeting;
  }
  if (containsPhrase(message, 'how are you')) {
    return SMALL_TALK_REPLIES.howAreYou;
  }
  if (containsAny(message, morning)) {
    return SMALL_TALK_REPLIES.morning;
  }
  if (isGoodbye(message)) {
    return SMALL_TALK_REPLIES.goodbye;
  }
  return SMALL_TALK_REPLIES.fallback;
}
