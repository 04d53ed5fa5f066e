/**
 * LLM Prompts
 *
 * Prompt-building helpers shared by the extraction, ranking and
 * generation stages.
 */

export interface PromptSection {
  heading: string;
  body: string;
}

/**
 * Build a prompt from a task line, labelled sections and numbered
 * instructions. Empty sections are skipped.
 */
export function buildStructuredPrompt(
  task: string,
  sections: PromptSection[],
  instructions: string[] = []
): string {
  let prompt = `${task}\n\n`;

  for (const section of sections) {
    const body = normalizePromptText(section.body);
    if (body.length > 0) {
      prompt += `${section.heading.toUpperCase()}:\n${body}\n\n`;
    }
  }

  if (instructions.length > 0) {
    prompt += 'INSTRUCTIONS:\n';
    prompt += formatList(instructions, true);
    prompt += '\n';
  }

  return prompt.trimEnd();
}

/**
 * Re-prompt sent after an answer failed decoding or validation
 */
export function buildFeedbackPrompt(problems: string[]): string {
  return [
    'Your previous answer could not be accepted:',
    formatList(problems),
    '',
    'Reply again with the complete JSON object only, fixing every problem listed above.'
  ].join('\n');
}

/**
 * Normalize line endings and trim
 */
export function normalizePromptText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .trim();
}

/**
 * Truncate text to a maximum length while preserving word boundaries
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }

  const truncated = text.substring(0, maxLength);
  const lastSpace = truncated.lastIndexOf(' ');

  if (lastSpace > 0) {
    return truncated.substring(0, lastSpace) + '...';
  }

  return truncated + '...';
}

/**
 * Format a list of items for inclusion in a prompt
 */
export function formatList(items: readonly string[], numbered: boolean = false): string {
  if (numbered) {
    return items.map((item, i) => `${i + 1}. ${item}`).join('\n');
  }
  return items.map(item => `- ${item}`).join('\n');
}
