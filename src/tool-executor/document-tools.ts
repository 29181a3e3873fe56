/**
 * Document Tools
 *
 * The fixed catalogue the agent works with. Four tools read or change the
 * request's document buffer. generate_outline, expand_content and
 * summarize only return a request marker: the model writes the actual
 * text in its next turn.
 */

import type { Tool, ToolDefinition, ToolHandler, ToolResult } from './types';
import type { DocumentProvider } from './document-provider';
import { createErrorResult, createSuccessResult } from './context';

export const DOCUMENT_TOOL_NAMES = [
  'read_document',
  'write_document',
  'edit_document',
  'search_document',
  'generate_outline',
  'expand_content',
  'summarize',
] as const;

export type DocumentToolName = typeof DOCUMENT_TOOL_NAMES[number];

export type EditAction = 'insert' | 'replace' | 'delete';

const SEARCH_CONTEXT_CHARS = 50;

// ============================================================================
// Parameter access
// ============================================================================

function readString(params: Record<string, unknown>, key: string, fallback: string = ''): string {
  const value = params[key];
  return typeof value === 'string' ? value : fallback;
}

function readNumber(params: Record<string, unknown>, key: string): number | undefined {
  const value = params[key];
  return typeof value === 'number' ? value : undefined;
}

function readStringArray(params: Record<string, unknown>, key: string): string[] {
  const value = params[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function isEditAction(value: string): value is EditAction {
  return value === 'insert' || value === 'replace' || value === 'delete';
}

function notFound(id: string): ToolResult {
  return createErrorResult('DOCUMENT_NOT_FOUND', `Document not found: ${id || '(current)'}`);
}

// ============================================================================
// Definitions
// ============================================================================

const documentIdParam = {
  type: 'string',
  description: 'Document id; leave empty for the document being edited'
} as const;

export const readDocumentDefinition: ToolDefinition = {
  name: 'read_document',
  description: 'Read the full text of a document. Read the document before changing it.',
  parameters: {
    type: 'object',
    properties: {
      document_id: documentIdParam
    }
  },
  metadata: { category: 'document' }
};

export const writeDocumentDefinition: ToolDefinition = {
  name: 'write_document',
  description: 'Replace the whole document. Only for rewrites; use edit_document for local changes.',
  parameters: {
    type: 'object',
    properties: {
      document_id: documentIdParam,
      content: { type: 'string', description: 'Complete new document text' }
    },
    required: ['content']
  },
  metadata: { category: 'document', mutates: true }
};

export const editDocumentDefinition: ToolDefinition = {
  name: 'edit_document',
  description: [
    'Edit part of a document at character offsets:',
    '- insert: insert content at position',
    '- replace: replace [position, end_position) with content',
    '- delete: delete [position, end_position)',
    'Use search_document to find positions.'
  ].join('\n'),
  parameters: {
    type: 'object',
    properties: {
      document_id: documentIdParam,
      action: { type: 'string', enum: ['insert', 'replace', 'delete'], description: 'Edit action' },
      position: { type: 'integer', description: 'Start offset (character index)' },
      end_position: { type: 'integer', description: 'End offset, exclusive (replace and delete)' },
      content: { type: 'string', description: 'Text to insert or to replace with' }
    },
    required: ['action', 'position']
  },
  metadata: { category: 'document', mutates: true }
};

export const searchDocumentDefinition: ToolDefinition = {
  name: 'search_document',
  description: 'Find text in a document (case-insensitive). Returns match positions with surrounding context.',
  parameters: {
    type: 'object',
    properties: {
      document_id: documentIdParam,
      query: { type: 'string', minLength: 1, description: 'Text to find' },
      max_results: { type: 'integer', minimum: 1, default: 5, description: 'Maximum number of results' }
    },
    required: ['query']
  },
  metadata: { category: 'document' }
};

export const generateOutlineDefinition: ToolDefinition = {
  name: 'generate_outline',
  description: 'Plan a document outline for a topic. Write the outline yourself in the next reply.',
  parameters: {
    type: 'object',
    properties: {
      topic: { type: 'string', minLength: 1, description: 'Document topic' },
      requirements: { type: 'string', default: '', description: 'Constraints and requirements' },
      depth: { type: 'integer', minimum: 1, default: 3, description: 'Heading depth' }
    },
    required: ['topic']
  },
  metadata: { category: 'generation' }
};

export const expandContentDefinition: ToolDefinition = {
  name: 'expand_content',
  description: 'Expand a passage by a length ratio and focus. Write the expansion yourself in the next reply.',
  parameters: {
    type: 'object',
    properties: {
      content: { type: 'string', minLength: 1, description: 'Passage to expand' },
      ratio: { type: 'number', default: 2, description: 'Target length as a multiple of the original' },
      focus: { type: 'string', default: '', description: 'What to elaborate on' }
    },
    required: ['content']
  },
  metadata: { category: 'generation' }
};

export const summarizeDefinition: ToolDefinition = {
  name: 'summarize',
  description: 'Summarise a passage within a length limit. Write the summary yourself in the next reply.',
  parameters: {
    type: 'object',
    properties: {
      content: { type: 'string', minLength: 1, description: 'Passage to summarise' },
      max_length: { type: 'integer', minimum: 1, default: 200, description: 'Maximum summary length in characters' },
      focus_points: { type: 'array', items: { type: 'string' }, default: [], description: 'Aspects to cover' }
    },
    required: ['content']
  },
  metadata: { category: 'generation' }
};

// ============================================================================
// Handlers
// ============================================================================

function readDocument(document: DocumentProvider): ToolHandler {
  return (params) => {
    const id = readString(params, 'document_id');
    const content = document.getDocument(id);
    if (content === null) return notFound(id);

    return createSuccessResult({ content, length: content.length });
  };
}

function writeDocument(document: DocumentProvider): ToolHandler {
  return (params) => {
    const id = readString(params, 'document_id');
    const content = readString(params, 'content');
    if (!document.writeDocument(id, content)) return notFound(id);

    document.recordEdit({ kind: 'write', documentId: id || document.documentId, position: 0, endPosition: 0, content });
    return createSuccessResult({
      document_id: id || document.documentId,
      length: content.length,
      message: 'Document saved'
    });
  };
}

function editDocument(document: DocumentProvider): ToolHandler {
  return (params) => {
    const id = readString(params, 'document_id');
    const action = readString(params, 'action');
    const content = readString(params, 'content');
    const position = readNumber(params, 'position') ?? 0;

    const original = document.getDocument(id);
    if (original === null) return notFound(id);

    if (!isEditAction(action)) {
      return createErrorResult('INVALID_ACTION', `Unknown action: ${action}`);
    }

    const length = original.length;
    if (position < 0 || position > length) {
      return createErrorResult('INVALID_POSITION', `Position ${position} is outside [0, ${length}]`);
    }

    const end = readNumber(params, 'end_position') ?? defaultEnd(action, position, content, length);
    if (end < position || end > length) {
      return createErrorResult('INVALID_POSITION', `End position ${end} must be within [${position}, ${length}]`);
    }

    const updated = applyEdit(original, action, position, end, content);
    document.writeDocument(id, updated);
    document.recordEdit({
      kind: action,
      documentId: id || document.documentId,
      position,
      endPosition: action === 'insert' ? position : end,
      content: action === 'delete' ? '' : content
    });

    return createSuccessResult({
      action,
      position,
      end_position: action === 'insert' ? position : end,
      length: updated.length,
      message: `Applied ${action} at ${position}`
    });
  };
}

function applyEdit(text: string, action: EditAction, position: number, end: number, content: string): string {
  switch (action) {
    case 'insert':
      return text.slice(0, position) + content + text.slice(position);
    case 'replace':
      return text.slice(0, position) + content + text.slice(end);
    case 'delete':
      return text.slice(0, position) + text.slice(end);
  }
}

function defaultEnd(action: EditAction, position: number, content: string, length: number): number {
  if (action === 'replace') return Math.min(position + content.length, length);
  return position;
}

function searchDocument(document: DocumentProvider): ToolHandler {
  return (params) => {
    const id = readString(params, 'document_id');
    const query = readString(params, 'query');
    const maxResults = readNumber(params, 'max_results') ?? 5;

    const content = document.getDocument(id);
    if (content === null) return notFound(id);

    const haystack = content.toLowerCase();
    const needle = query.toLowerCase();
    const results: Array<{ position: number; match: string; context: string }> = [];
    let matches = 0;

    // Step by one so overlapping matches count
    for (let pos = haystack.indexOf(needle); pos !== -1 && needle !== ''; pos = haystack.indexOf(needle, pos + 1)) {
      matches++;
      if (results.length < maxResults) {
        results.push({
          position: pos,
          match: content.slice(pos, pos + query.length),
          context: content.slice(
            Math.max(0, pos - SEARCH_CONTEXT_CHARS),
            Math.min(content.length, pos + query.length + SEARCH_CONTEXT_CHARS)
          )
        });
      }
    }

    return createSuccessResult({ matches, results });
  };
}

const generateOutline: ToolHandler = (params) =>
  createSuccessResult({
    type: 'outline_request',
    topic: readString(params, 'topic'),
    requirements: readString(params, 'requirements'),
    depth: readNumber(params, 'depth') ?? 3,
    message: 'Write the outline for these parameters in your reply'
  });

const expandContent: ToolHandler = (params) =>
  createSuccessResult({
    type: 'expand_request',
    content: readString(params, 'content'),
    ratio: readNumber(params, 'ratio') ?? 2,
    focus: readString(params, 'focus'),
    message: 'Write the expanded passage in your reply'
  });

const summarize: ToolHandler = (params) =>
  createSuccessResult({
    type: 'summarize_request',
    content: readString(params, 'content'),
    max_length: readNumber(params, 'max_length') ?? 200,
    focus_points: readStringArray(params, 'focus_points'),
    message: 'Write the summary in your reply'
  });

// ============================================================================
// Catalogue
// ============================================================================

/**
 * The seven document tools, bound to one request's buffer
 */
export function createDocumentTools(document: DocumentProvider): Tool[] {
  return [
    { definition: readDocumentDefinition, handler: readDocument(document) },
    { definition: writeDocumentDefinition, handler: writeDocument(document) },
    { definition: editDocumentDefinition, handler: editDocument(document) },
    { definition: searchDocumentDefinition, handler: searchDocument(document) },
    { definition: generateOutlineDefinition, handler: generateOutline },
    { definition: expandContentDefinition, handler: expandContent },
    { definition: summarizeDefinition, handler: summarize },
  ];
}
