/**
 * Response Parser
 *
 * Reads the `{message, operation: {type, content}}` reply simple mode asks
 * for. Models wrap it in fences, surround it with prose or emit broken
 * JSON; anything unreadable becomes a plain reply.
 */

import { OPERATION_TYPES, type OperationType } from './types';

export interface ParsedReply {
  message: string;
  operationType: OperationType;
  content: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toOperationType(value: unknown): OperationType {
  return OPERATION_TYPES.find(type => type === value) ?? 'none';
}

export function parseAIResponse(raw: string): ParsedReply {
  let cleaned = raw.trim();

  if (cleaned.startsWith('```')) {
    const first = cleaned.indexOf('{');
    const last = cleaned.lastIndexOf('}');
    if (first !== -1 && last > first) {
      cleaned = cleaned.slice(first, last + 1);
    }
  }

  const embedded = /\{[\s\S]*\}/.exec(cleaned);
  if (embedded) {
    const parsed = tryParse(embedded[0]);
    if (isRecord(parsed) && ('message' in parsed || 'operation' in parsed)) {
      const operation = isRecord(parsed.operation) ? parsed.operation : {};
      return {
        message: typeof parsed.message === 'string' ? parsed.message : raw,
        operationType: toOperationType(operation.type),
        content: typeof operation.content === 'string' ? operation.content : '',
      };
    }
  }

  // Broken JSON: pick the fields out one by one
  const message = /"message"\s*:\s*"((?:[^"\\]|\\.)*)"/s.exec(cleaned);
  const type = /"type"\s*:\s*"((?:[^"\\]|\\.)*)"/s.exec(cleaned);
  if (message && type) {
    const content = /"content"\s*:\s*"((?:[^"\\]|\\.)*)"/s.exec(cleaned);
    return {
      message: unescape(message[1]).trim(),
      operationType: toOperationType(unescape(type[1]).trim()),
      content: content ? unescape(content[1]) : '',
    };
  }

  return { message: raw, operationType: 'none', content: '' };
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function unescape(value: string): string {
  const parsed = tryParse(`"${value}"`);
  return typeof parsed === 'string' ? parsed : value;
}
