/**
 * Prompt Composer
 *
 * Builds the system prompt that grounds the model in retrieved context.
 * Pure and deterministic: the same inputs always produce the same bytes.
 *
 * Layout:
 * ```
 * {PERSONA_INSTRUCTIONS}
 *
 * Here is the context available for you:
 * Document Information:
 * ===
 * {chunk 1}
 *
 * {chunk 2}
 * ===
 *
 * Web Search Results:
 * ===
 * **{title}**: {snippet}
 * ===
 *
 * {INSUFFICIENT_CONTEXT_INSTRUCTION}
 * ```
 *
 * A section whose source list is empty is left out entirely.
 */

export const PERSONA_INSTRUCTIONS =
  'These are very important instructions: You are "Ragline", a professional but friendly AI assistant helping the user. ' +
  'Your task is to answer the user based on the information provided below. ' +
  'Answer informally, directly, and concisely, including all relevant details. ' +
  'Use Markdown for formatting (e.g., **bold**, *italic*, lists) and $$ for LaTeX where appropriate. ' +
  'Organize your answer into sections if needed. ' +
  'Do not include raw IDs or sensitive information.';

export const CONTEXT_INTRO = 'Here is the context available for you:';

export const INSUFFICIENT_CONTEXT_INSTRUCTION =
  'If the context is missing or insufficient, please indicate that the available information might be incomplete. ' +
  'END SYSTEM INSTRUCTIONS';

export const DOCUMENT_SECTION_TITLE = 'Document Information';
export const WEB_SECTION_TITLE = 'Web Search Results';

/** Delimiter line wrapped around each section body */
export const SECTION_DELIMITER = '===';

const BLANK_LINE = '\n\n';

function section(title: string, entries: readonly string[]): string {
  return `${title}:\n${SECTION_DELIMITER}\n${entries.join(BLANK_LINE)}\n${SECTION_DELIMITER}`;
}

/**
 * Compose the grounding prompt from retrieved chunks and web results.
 */
export function composePrompt(
  chunks: readonly string[],
  webResults: readonly string[]
): string {
  const sections: string[] = [];

  if (chunks.length > 0) {
    sections.push(section(DOCUMENT_SECTION_TITLE, chunks));
  }
  if (webResults.length > 0) {
    sections.push(section(WEB_SECTION_TITLE, webResults));
  }

  return `${PERSONA_INSTRUCTIONS}

${CONTEXT_INTRO}
${sections.join(BLANK_LINE)}

${INSUFFICIENT_CONTEXT_INSTRUCTION}`;
}
