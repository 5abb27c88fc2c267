/**
 * Prompt seam shared by the branch resolver, conflict resolution, the
 * uncommitted-change guard and the CLI pickers.
 */

export interface PromptChoice<T extends string = string> {
  /** Label shown in the picker */
  name: string;
  value: T;
}

export interface Prompter {
  /** False when no terminal is attached; confirm/select then throw instead of blocking */
  readonly interactive: boolean;
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
  input(message: string): Promise<string>;
  select<T extends string>(message: string, choices: PromptChoice<T>[]): Promise<T>;
}

/**
 * Answers every confirmation with yes (`--yes`). Text input and selection go
 * to the wrapped prompter.
 */
export class AutoConfirmPrompter implements Prompter {
  constructor(private readonly inner: Prompter) {}

  get interactive(): boolean {
    return this.inner.interactive;
  }

  async confirm(_message: string, _defaultValue: boolean): Promise<boolean> {
    return true;
  }

  input(message: string): Promise<string> {
    return this.inner.input(message);
  }

  select<T extends string>(message: string, choices: PromptChoice<T>[]): Promise<T> {
    return this.inner.select(message, choices);
  }
}
