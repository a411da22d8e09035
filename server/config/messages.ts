/**
 * User-facing Messages
 *
 * Every string the bot posts on its own behalf (as opposed to collaborator
 * output). Templates take their values through the small helpers below.
 */

export const USER_MESSAGES = {
  processing: "Processing your request, please wait...",
  noQuery: "Please provide a query after mentioning the bot.",
  processingError: "Sorry, an error occurred while processing your request. Please try again later.",
  deliveryError: "Sorry, I couldn't post the full response here. Please try again later.",
  llmQuota: "I can't process this right now: the AI service quota has been exceeded. Please contact an admin.",
  llmAuth: "I can't process this right now: there's an issue with the AI service configuration. Please contact an admin.",
} as const;

const NOTICE_PATTERNS: readonly RegExp[] = [
  /^Please wait \d+(?:\.\d+)? seconds before making another request\.$/,
  /^You've reached the maximum number of requests per minute\./,
  /^Number of hours must be between 1 and \d+/,
];

/**
 * Whether the bot posted this text as a status or failure notice rather
 * than as an answer. Notices are kept out of thread history.
 */
export function isBotNotice(content: string): boolean {
  return Object.values(USER_MESSAGES).some((notice) => notice === content)
    || NOTICE_PATTERNS.some((pattern) => pattern.test(content));
}

export function rateLimitCooldownMessage(waitSeconds: number): string {
  return `Please wait ${waitSeconds.toFixed(1)} seconds before making another request.`;
}

export function rateLimitWindowMessage(waitSeconds: number): string {
  return `You've reached the maximum number of requests per minute. Please try again in ${waitSeconds.toFixed(1)} seconds.`;
}

export function invalidHoursMessage(maxHours: number): string {
  return `Number of hours must be between 1 and ${maxHours} (7 days).`;
}

export function noMessagesFoundMessage(hours: number): string {
  return `No messages found in this channel for the past ${hours} hours.`;
}

export function postedInMessage(destinationId: string): string {
  return `Response posted in <#${destinationId}>`;
}
