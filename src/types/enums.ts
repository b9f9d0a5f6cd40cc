export enum PromptType {
  Input = "input",
  Number = "number",
  Confirm = "confirm",
}

export const COMPLETION_SHELLS = ["bash", "zsh", "fish", "powershell", "elvish"] as const;

export type CompletionShell = (typeof COMPLETION_SHELLS)[number];
