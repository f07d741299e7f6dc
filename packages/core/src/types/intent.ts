import type { TaskId } from './task.js';

/** How a command names its target task */
export type Selector =
  | { readonly kind: 'by-id'; readonly id: TaskId }
  | { readonly kind: 'by-description'; readonly text: string };

export type Intent =
  | { readonly type: 'add-task'; readonly description: string }
  | { readonly type: 'complete-task'; readonly selector: Selector }
  | { readonly type: 'delete-task'; readonly selector: Selector }
  | { readonly type: 'list-tasks' }
  | { readonly type: 'unrecognized'; readonly rawText: string };

export type IntentType = Intent['type'];

