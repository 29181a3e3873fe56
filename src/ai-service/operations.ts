/**
 * Operation mapping
 *
 * Turns agent edits and marker tool calls, or a parsed simple-mode reply,
 * into operations for the caller.
 */

import type { AgentResult } from '../agent-loop/types';
import type { DocumentEdit } from '../tool-executor/document-provider';
import type { Operation, OperationType, SelectionRange } from './types';
import type { ParsedReply } from './response-parser';

const MARKER_OPERATIONS: Record<string, OperationType> = {
  generate_outline: 'generate_outline',
  expand_content: 'expand_content',
  summarize: 'summarize',
};

/**
 * One operation per recorded edit, in order, followed by one per marker
 * tool call carrying the final answer as its content
 */
export function operationsFromAgent(result: AgentResult, documentId: string | null, originalLength: number): Operation[] {
  const operations: Operation[] = [];
  let length = originalLength;

  for (const edit of result.edits) {
    operations.push(editToOperation(edit, documentId, length));
    length = lengthAfter(edit, length);
  }

  if (result.success) {
    for (const call of result.toolCalls) {
      const operationType = MARKER_OPERATIONS[call.name];
      if (operationType === undefined || call.status !== 'completed') continue;

      operations.push({
        operationType,
        targetFile: documentId,
        content: result.message,
        position: null,
        metadata: { tool: call.name, arguments: call.arguments },
      });
    }
  }

  return operations;
}

function editToOperation(edit: DocumentEdit, documentId: string | null, currentLength: number): Operation {
  const targetFile = edit.documentId ?? documentId;

  switch (edit.kind) {
    case 'write':
      return {
        operationType: 'replace_text',
        targetFile,
        content: edit.content,
        position: { start: 0, end: currentLength },
        metadata: { tool: 'write_document', wholeDocument: true },
      };
    case 'insert':
      return {
        operationType: 'insert_text',
        targetFile,
        content: edit.content,
        position: { start: edit.position, end: edit.position },
        metadata: { tool: 'edit_document' },
      };
    case 'replace':
      return {
        operationType: 'replace_text',
        targetFile,
        content: edit.content,
        position: { start: edit.position, end: edit.endPosition },
        metadata: { tool: 'edit_document' },
      };
    case 'delete':
      return {
        operationType: 'delete_text',
        targetFile,
        content: '',
        position: { start: edit.position, end: edit.endPosition },
        metadata: { tool: 'edit_document' },
      };
  }
}

function lengthAfter(edit: DocumentEdit, length: number): number {
  switch (edit.kind) {
    case 'write':
      return edit.content.length;
    case 'insert':
      return length + edit.content.length;
    case 'replace':
      return length - (edit.endPosition - edit.position) + edit.content.length;
    case 'delete':
      return length - (edit.endPosition - edit.position);
  }
}

/**
 * At most one operation from a simple-mode reply
 */
export function operationFromReply(
  reply: ParsedReply,
  documentId: string | null,
  selection: SelectionRange | null
): Operation[] {
  if (reply.operationType === 'none' || reply.content === '') {
    return [];
  }

  return [{
    operationType: reply.operationType,
    targetFile: documentId,
    content: reply.content,
    position: selection,
    metadata: {},
  }];
}
