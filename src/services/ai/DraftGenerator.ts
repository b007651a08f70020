export const TWEET_MAX_LENGTH = 280;

/**
 * Text-generation backend for tweet drafts. One blocking call per draft; no
 * retries or streaming.
 */
export interface DraftGenerator {
  name: string;
  isConfigured(): boolean;
  generate(topic: string): Promise<string>;
  generateVariations(topic: string, count?: number): Promise<string[]>;
}

export function buildTweetPrompt(topic: string, style: string): string {
  return `Write a single tweet about the following topic. The tweet should be:
- Under ${TWEET_MAX_LENGTH} characters
- ${style} in tone
- Engaging and shareable
- Include 1-2 relevant hashtags if appropriate

Topic: ${topic}

Respond with ONLY the tweet text, nothing else.`;
}

export function buildVariationsPrompt(topic: string, count: number): string {
  const format = Array.from({ length: count }, (_, index) => `${index + 1}. [tweet ${index + 1}]`).join('\n');

  return `Write ${count} different tweet variations about the following topic. Each tweet should be:
- Under ${TWEET_MAX_LENGTH} characters
- Varied in tone (one professional, one casual, one provocative/engaging)
- Shareable and engaging
- Include 1-2 relevant hashtags where appropriate

Topic: ${topic}

Format your response as:
${format}`;
}

/**
 * Pull the entries out of a numbered list ("1. first", "2. second"). Lines
 * that do not start with a digit are ignored.
 */
export function parseNumberedList(response: string): string[] {
  const entries: string[] = [];
  for (const rawLine of response.split('\n')) {
    const line = rawLine.trim();
    const dot = line.indexOf('.');
    if (line && /^\d/.test(line) && dot >= 0) {
      entries.push(line.slice(dot + 1).trim());
    }
  }
  return entries;
}
