export interface Choice<T> {
  label: string;
  value: T;
}

export interface TextOptions {
  /** Returned for an empty answer */
  default?: string;
  /** Ask again, showing this message, until the answer is not blank */
  required?: string;
}

/**
 * Line-oriented questions for the interactive wizards.
 */
export interface Prompter {
  text(message: string, options?: TextOptions): Promise<string>;
  select<T>(message: string, choices: readonly Choice<T>[]): Promise<T>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  close(): void;
}
