import { createInterface } from "node:readline";

/** Standard input ended while a prompt was waiting. */
export class InputClosedError extends Error {
  constructor() {
    super("Input closed");
    this.name = "InputClosedError";
  }
}

export type Prompter = {
  /** Resolves to the entered line; rejects with InputClosedError once input ends. */
  ask(question: string): Promise<string>;
  close(): void;
};

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  const lines = rl[Symbol.asyncIterator]();
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    async ask(question) {
      // Lines typed ahead are still delivered after input closes
      if (!closed) {
        rl.setPrompt(question);
        rl.prompt();
      }
      const next = await lines.next();
      if (next.done) {
        throw new InputClosedError();
      }
      return next.value;
    },
    close() {
      rl.close();
    },
  };
}
