import Anthropic from '@anthropic-ai/sdk';

/**
 * Create an Anthropic client. Retries are disabled because the resolver
 * owns the retry policy for every provider.
 */
export function createAnthropicClient(apiKey: string): Anthropic {
  return new Anthropic({ apiKey, maxRetries: 0 });
}

/**
 * Concatenate the text blocks of an Anthropic API response.
 * Returns an empty string if no text block is found.
 */
export function extractResponseText(response: Anthropic.Message): string {
  let text = '';
  for (const block of response.content) {
    if (block.type === 'text') text += block.text;
  }
  return text;
}
