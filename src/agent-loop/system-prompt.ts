/**
 * Agent System Prompt
 *
 * Base instructions, the tool catalogue and the request's context, in that order.
 */

export const DEFAULT_AGENT_PROMPT = [
  'You are a writing assistant working on the user\'s document.',
  'Use the tools to read, search and change the document. Read before you edit and use',
  'search_document to find character positions; offsets are 0-based and end positions are exclusive.',
  'generate_outline, expand_content and summarize only describe a task: write the resulting text',
  'yourself in your next reply.',
  'When the work is done, reply with a short explanation of what you changed.',
].join('\n');

export interface AgentPromptContext {
  basePrompt: string;
  toolsPrompt: string;
  documentContent?: string;
  documentPreviewLength: number;
  selectedText?: string;
  ragContext?: string;
}

export function buildAgentSystemPrompt(context: AgentPromptContext): string {
  const parts = [context.basePrompt, context.toolsPrompt];

  if (context.documentContent) {
    const preview = context.documentContent.slice(0, context.documentPreviewLength);
    const truncated = preview.length < context.documentContent.length;
    parts.push(
      `## Current document (${context.documentContent.length} characters${truncated ? ', truncated' : ''})\n${preview}`
    );
  }
  if (context.selectedText) {
    parts.push(`## Selected text\n${context.selectedText}`);
  }
  if (context.ragContext) {
    parts.push(`## Knowledge base\n${context.ragContext}`);
  }

  return parts.filter(part => part.trim() !== '').join('\n\n');
}
