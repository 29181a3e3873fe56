/**
 * Prompts for simple mode
 */

import type { OperationType } from './types';

const OPERATION_DESCRIPTIONS: Record<OperationType, string> = {
  none: 'reply only, no document change',
  generate_outline: 'an outline for the document',
  expand_content: 'an expanded version of the selected or given passage',
  summarize: 'a summary',
  style_transfer: 'the passage rewritten in the requested style',
  grammar_check: 'the passage with grammar and spelling corrected',
  insert_text: 'text to insert at the selection',
  replace_text: 'text that replaces the selection',
  delete_text: 'the text to delete',
};

export const SIMPLE_SYSTEM_PROMPT = [
  'You are a writing assistant that helps the user draft and improve documents.',
  '',
  '## Reply format',
  'Reply with a single JSON object and nothing else:',
  '{"message": "<explanation for the user>", "operation": {"type": "<operation type>", "content": "<text>"}}',
  '',
  '## Operation types',
  ...Object.entries(OPERATION_DESCRIPTIONS).map(([type, description]) => `- ${type}: ${description}`),
  '',
  'Use "none" with empty content when the user only asks a question.',
].join('\n');

export interface SimplePromptContext {
  documentContent?: string;
  documentPreviewLength: number;
  selectedText?: string;
  ragContext?: string;
}

export function buildSimpleSystemPrompt(context: SimplePromptContext): string {
  const parts = [SIMPLE_SYSTEM_PROMPT];

  if (context.ragContext) {
    parts.push(`## Knowledge base\nAnswer from these sources where they apply:\n${context.ragContext}`);
  }
  if (context.documentContent) {
    parts.push(`## Current document\n${context.documentContent.slice(0, context.documentPreviewLength)}`);
  }
  if (context.selectedText) {
    parts.push(`## Selected text\n${context.selectedText}`);
  }

  return parts.join('\n\n');
}
