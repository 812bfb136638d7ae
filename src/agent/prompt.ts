/**
 * Prompt Construction
 *
 * The system prompt is produced by a template function from the formatted
 * sources; history and the current question follow it unchanged.
 */

import { ValidationError } from '../errors/index.js';
import type { ConversationTurn, PromptMessage, PromptTemplate } from './types.js';

/** Placeholder replaced by the formatted sources in string templates */
export const SOURCES_PLACEHOLDER = '{sources}';

/**
 * Default grounded-answer instructions. `{sources}` marks where the
 * sources block goes.
 */
export const DEFAULT_SYSTEM_PROMPT = `You are an intelligent assistant helping users with questions based on the provided documents.
Answer ONLY with the facts listed in the sources below. If there isn't enough information below, say you don't know.
Do not generate answers that don't use the sources below. If asking a clarifying question would help, ask the question.

For tabular information return it as an html table. Do not return markdown format for tables.
Each source has a name followed by colon and the actual information, always include the source name for each fact you use in the response.
Use square brackets to reference the source, for example [source1.pdf]. Don't combine sources, list each source separately, for example [source1.pdf][source2.pdf].

${SOURCES_PLACEHOLDER}
`;

/** System prompt for chats that skip retrieval */
export const DIRECT_SYSTEM_PROMPT = 'You are a helpful AI assistant.';

/**
 * Build a template from text containing `{sources}`.
 *
 * Every occurrence is replaced literally, so braces inside the sources
 * are left alone.
 *
 * @throws ValidationError if the text has no placeholder
 */
export function templateFromString(text: string): PromptTemplate {
  const parts = text.split(SOURCES_PLACEHOLDER);
  if (parts.length < 2) {
    throw new ValidationError('System prompt template must contain {sources}', [
      `Add ${SOURCES_PLACEHOLDER} where the retrieved documents should appear`,
    ]);
  }
  return ({ sources }) => parts.join(sources);
}

export const defaultTemplate: PromptTemplate = templateFromString(DEFAULT_SYSTEM_PROMPT);

function copyTurns(history: readonly ConversationTurn[]): PromptMessage[] {
  return history.map((turn) => ({ role: turn.role, content: turn.content }));
}

/**
 * `[system] + history + [user]`. History is neither trimmed, deduplicated
 * nor reordered.
 */
export function buildMessages(
  query: string,
  formattedSources: string,
  history: readonly ConversationTurn[] = [],
  template: PromptTemplate = defaultTemplate
): PromptMessage[] {
  return [
    { role: 'system', content: template({ sources: formattedSources }) },
    ...copyTurns(history),
    { role: 'user', content: query },
  ];
}

/**
 * Messages for a chat without retrieval. An empty system prompt falls
 * back to DIRECT_SYSTEM_PROMPT.
 */
export function buildDirectMessages(
  message: string,
  history: readonly ConversationTurn[] = [],
  systemPrompt = ''
): PromptMessage[] {
  return [
    { role: 'system', content: systemPrompt || DIRECT_SYSTEM_PROMPT },
    ...copyTurns(history),
    { role: 'user', content: message },
  ];
}
