/**
 * Terminal prompts for the interactive shell. Every method resolves to
 * `undefined` when the operator cancels (Ctrl+C / Esc).
 */

import prompts from "prompts";

export interface Choice<T extends string> {
  title: string;
  value: T;
  description?: string;
}

export interface Prompter {
  select<T extends string>(
    message: string,
    choices: Choice<T>[],
    initial?: T,
  ): Promise<T | undefined>;
  text(message: string, initial?: string): Promise<string | undefined>;
  password(message: string): Promise<string | undefined>;
  confirm(message: string, initial?: boolean): Promise<boolean | undefined>;
}

export class PromptsPrompter implements Prompter {
  async select<T extends string>(
    message: string,
    choices: Choice<T>[],
    initial?: T,
  ): Promise<T | undefined> {
    const initialIndex = initial
      ? Math.max(0, choices.findIndex((c) => c.value === initial))
      : 0;
    const { value } = await prompts({
      type: "select",
      name: "value",
      message,
      choices,
      initial: initialIndex,
    });
    return choices.find((c) => c.value === value)?.value;
  }

  async text(message: string, initial?: string): Promise<string | undefined> {
    const { value } = await prompts({
      type: "text",
      name: "value",
      message,
      initial,
    });
    return typeof value === "string" ? value : undefined;
  }

  async password(message: string): Promise<string | undefined> {
    const { value } = await prompts({
      type: "password",
      name: "value",
      message,
    });
    return typeof value === "string" ? value : undefined;
  }

  async confirm(
    message: string,
    initial = false,
  ): Promise<boolean | undefined> {
    const { value } = await prompts({
      type: "confirm",
      name: "value",
      message,
      initial,
    });
    return typeof value === "boolean" ? value : undefined;
  }
}
