/**
 * Turns a free-form utterance ("add buy milk", "mark done 3") into an Intent.
 * Total and stateless: any input yields an Intent, unknown text included.
 * Selectors are classified here but resolved against the store at execution.
 */

import type { Intent, Selector } from '../types/intent.js';

export type VerbAction = 'add' | 'complete' | 'delete' | 'list';

export interface Verb {
  readonly phrase: string;
  readonly action: VerbAction;
}

const VERBS: readonly Verb[] = [
  { phrase: 'add', action: 'add' },
  { phrase: 'create', action: 'add' },
  { phrase: 'complete', action: 'complete' },
  { phrase: 'mark done', action: 'complete' },
  { phrase: 'delete', action: 'delete' },
  { phrase: 'remove', action: 'delete' },
  { phrase: 'list tasks', action: 'list' },
  { phrase: 'show tasks', action: 'list' },
];

// Longest phrase first so multi-word verbs win over any shorter prefix
const VERBS_BY_LENGTH = [...VERBS].sort((a, b) => b.phrase.length - a.phrase.length);

const TASK_ID_RE = /^\d+$/;

/** Trim, lowercase and collapse runs of whitespace */
export function normalizeUtterance(rawText: string): string {
  return rawText.trim().toLowerCase().replace(/\s+/g, ' ');
}

/** Split a normalized utterance into its verb and the rest, on whole words only */
export function splitVerb(normalized: string): { verb: Verb; remainder: string } | null {
  for (const verb of VERBS_BY_LENGTH) {
    if (normalized === verb.phrase) return { verb, remainder: '' };
    if (normalized.startsWith(`${verb.phrase} `)) {
      return { verb, remainder: normalized.slice(verb.phrase.length + 1).trim() };
    }
  }
  return null;
}

/** A remainder made only of digits names a task id; anything else is description text */
export function parseSelector(remainder: string): Selector | null {
  if (remainder.length === 0) return null;
  if (TASK_ID_RE.test(remainder)) {
    const id = Number(remainder);
    if (Number.isSafeInteger(id)) return { kind: 'by-id', id };
  }
  return { kind: 'by-description', text: remainder };
}

export function interpretCommand(rawText: string): Intent {
  const unrecognized: Intent = { type: 'unrecognized', rawText };
  const split = splitVerb(normalizeUtterance(rawText));
  if (!split) return unrecognized;

  const { verb, remainder } = split;
  switch (verb.action) {
    case 'add':
      return remainder ? { type: 'add-task', description: remainder } : unrecognized;
    case 'complete': {
      const selector = parseSelector(remainder);
      return selector ? { type: 'complete-task', selector } : unrecognized;
    }
    case 'delete': {
      const selector = parseSelector(remainder);
      return selector ? { type: 'delete-task', selector } : unrecognized;
    }
    case 'list':
      return remainder ? unrecognized : { type: 'list-tasks' };
  }
}
