/**
 * Run ID Generator
 *
 * Sortable, URL-safe ids for agent runs and chat sessions.
 */

import { customAlphabet } from 'nanoid';

const RANDOM_LENGTH = 8;
const ALPHABET = '0123456789abcdefghijklmnopqrstuvwxyz';

const nanoid = customAlphabet(ALPHABET, RANDOM_LENGTH);

const ID_PATTERN = new RegExp(`^(run|session)_(\\d+)_([${ALPHABET}]{${RANDOM_LENGTH}})$`);

export function generateRunId(): string {
  return `run_${Date.now()}_${nanoid()}`;
}

export function generateSessionId(): string {
  return `session_${Date.now()}_${nanoid()}`;
}

/**
 * Split an id into its creation time and random part
 */
export function parseId(id: string): { kind: 'run' | 'session'; timestamp: number; random: string } | null {
  const match = ID_PATTERN.exec(id);
  if (!match) return null;

  const kind = match[1] === 'run' ? 'run' : 'session';
  return { kind, timestamp: parseInt(match[2], 10), random: match[3] };
}

export function isValidRunId(id: string): boolean {
  return parseId(id)?.kind === 'run';
}
