export type NoticeLevel = 'warning' | 'error';

/**
 * A way of asking the operator for a path. Graphical and line-based prompts
 * both implement this; the resolver picks the first available one.
 */
export interface PathPrompter {
  isAvailable(): Promise<boolean>;
  /** Resolves to `null` when the operator dismissed the prompt. */
  ask(question: string): Promise<string | null>;
  confirm(question: string): Promise<boolean>;
  notify(level: NoticeLevel, message: string): Promise<void>;
  close(): void;
}
