/** Texts the relay sends to users on its own behalf. */
export const USER_MESSAGES = {
  maintenance:
    'This WhatsApp service is down for maintenance. Please try again later.',
  registrationFailed: "Sorry, we couldn't register your account. Please try again later.",
  registrationUnavailable:
    "Sorry, we couldn't register you to our database. Please try again later.",
  historyUnavailable:
    "Sorry, we're having trouble accessing your chat history. Please try again later.",
  threadCreationFailed:
    'An unexpected error occurred while creating a new chat session. Please try again later.',
  processingFailed: 'An error occurred while processing your message. Please try again later.',
  emptyResponse: "Sorry, we couldn't process your message. Please try again later.",
  unexpectedFailure:
    'An unexpected error occurred while processing your message. Please try again later.',
} as const;

const GENERIC_MEDIA_TYPES = new Set(['errors', 'unsupported']);

/** `image` → "images"; Meta's catch-all kinds read as "this media type". */
export function unsupportedMediaMessage(messageType: string): string {
  const noun = GENERIC_MEDIA_TYPES.has(messageType)
    ? 'this media type'
    : messageType.endsWith('s')
      ? messageType
      : `${messageType}s`;

  return `Sorry, I can't process ${noun} yet. Please send me a text message.`;
}
