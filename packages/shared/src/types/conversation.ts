import type { Stage } from './artifacts';

export interface ConversationEntry {
  round: number;
  stage: Stage | 'validate';
  hint?: string;
  /** Short outcome label, e.g. `ok`, `FAIL2FAIL/build_error`, `generation_failed` */
  outcome: string;
}

export interface ConversationState {
  round: number;
  history: ConversationEntry[];
}
