import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { InterruptSignal } from "../orchestration/errors.js";

export interface AskOptions {
  readonly signal?: AbortSignal;
  /** Ctrl+C rejects this question with InterruptSignal instead of ending the session. */
  readonly interruptible?: boolean;
}

/** The "ask(question) -> answer" capability the menus and decision prompt rely on. */
export interface Prompter {
  ask(question: string, options?: AskOptions): Promise<string>;
  write(text: string): void;
}

export interface ConsolePrompterOptions {
  readonly input?: Readable;
  readonly output?: Writable;
  readonly onInterrupt?: () => void;
}

interface PendingQuestion {
  readonly question: string;
  readonly interruptible: boolean;
  readonly resolve: (answer: string) => void;
  readonly reject: (error: unknown) => void;
  readonly detach: () => void;
}

export class PromptClosedError extends Error {
  constructor() {
    super("Input stream closed");
    this.name = "PromptClosedError";
  }
}

/**
 * Readline-backed prompter. Each input line answers the most recently asked
 * question, so an alarm's decision prompt takes over from a menu prompt that
 * is still waiting; the menu prompt is shown again once the decision settles.
 */
export class ConsolePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private readonly output: Writable;
  private readonly onInterrupt: () => void;
  private readonly pending: PendingQuestion[] = [];
  private closed = false;

  constructor(options?: ConsolePrompterOptions) {
    this.output = options?.output ?? process.stdout;
    this.onInterrupt = options?.onInterrupt ?? (() => this.close());
    this.rl = readline.createInterface({
      input: options?.input ?? process.stdin,
      output: this.output,
    });

    this.rl.on("line", (line) => this.handleLine(line));
    this.rl.on("SIGINT", () => this.handleInterrupt());
    this.rl.on("close", () => this.handleClose());
  }

  ask(question: string, options?: AskOptions): Promise<string> {
    if (this.closed) {
      return Promise.reject(new PromptClosedError());
    }
    const signal = options?.signal;
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    return new Promise<string>((resolve, reject) => {
      const onAbort = (): void => {
        this.discard(entry);
        reject(abortReason(signal));
        this.repromptTop();
      };

      const entry: PendingQuestion = {
        question,
        interruptible: options?.interruptible ?? false,
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.pending.push(entry);
      this.showPrompt(question);
    });
  }

  write(text: string): void {
    this.output.write(text);
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }

  private handleLine(line: string): void {
    const top = this.pending.pop();
    if (!top) return;

    top.detach();
    top.resolve(line);
    if (top.interruptible) {
      this.repromptTop();
    }
  }

  private handleInterrupt(): void {
    const top = this.pending.at(-1);
    if (top?.interruptible) {
      this.discard(top);
      top.reject(new InterruptSignal());
      this.repromptTop();
      return;
    }
    this.onInterrupt();
  }

  private handleClose(): void {
    this.closed = true;
    const waiting = this.pending.splice(0, this.pending.length);
    for (const entry of waiting) {
      entry.detach();
      entry.reject(new PromptClosedError());
    }
  }

  private discard(entry: PendingQuestion): void {
    const index = this.pending.indexOf(entry);
    if (index !== -1) {
      this.pending.splice(index, 1);
    }
    entry.detach();
  }

  private repromptTop(): void {
    const top = this.pending.at(-1);
    if (top && !this.closed) {
      this.showPrompt(top.question);
    }
  }

  private showPrompt(question: string): void {
    this.rl.setPrompt(question);
    this.rl.prompt();
  }
}

function abortReason(signal: AbortSignal | undefined): unknown {
  return signal?.reason ?? new Error("Question aborted");
}
