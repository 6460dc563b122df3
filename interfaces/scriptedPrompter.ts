import { PromptClosedError } from "./consolePrompter.js";
import type { AskOptions, Prompter } from "./consolePrompter.js";

/** Prompter that answers from a fixed script; used to drive menus without a terminal. */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly askOptions: Array<AskOptions | undefined> = [];
  private readonly written: string[] = [];
  private readonly answers: Array<string | Error>;

  constructor(answers: ReadonlyArray<string | Error>) {
    this.answers = [...answers];
  }

  get output(): string {
    return this.written.join("");
  }

  get remaining(): number {
    return this.answers.length;
  }

  ask(question: string, options?: AskOptions): Promise<string> {
    this.questions.push(question);
    this.askOptions.push(options);

    const next = this.answers.shift();
    if (next === undefined) {
      return Promise.reject(new PromptClosedError());
    }
    return next instanceof Error ? Promise.reject(next) : Promise.resolve(next);
  }

  write(text: string): void {
    this.written.push(text);
  }
}
