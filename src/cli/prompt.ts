import { createInterface } from "node:readline/promises";
import { Writable } from "node:stream";

export interface PromptStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

const TERMINAL: PromptStreams = { input: process.stdin, output: process.stdout };

/**
 * Asks one question on the terminal and returns the trimmed answer.
 */
export async function ask(
  question: string,
  streams: PromptStreams = TERMINAL,
): Promise<string> {
  const rl = createInterface(streams);
  try {
    return (await rl.question(question)).trim();
  } finally {
    rl.close();
  }
}

/**
 * Like `ask`, but nothing typed after the question is echoed.
 */
export async function askSecret(
  question: string,
  streams: PromptStreams = TERMINAL,
): Promise<string> {
  let muted = false;
  const output = new Writable({
    write(chunk, encoding, callback) {
      if (!muted) {
        streams.output.write(chunk, encoding);
      }
      callback();
    },
  });
  const rl = createInterface({ input: streams.input, output, terminal: true });
  try {
    // The prompt is written synchronously; muting starts after it.
    const answer = rl.question(question);
    muted = true;
    return (await answer).trim();
  } finally {
    rl.close();
    streams.output.write("\n");
  }
}

/**
 * Numbered pick from a list. Returns null on anything that is not a valid
 * number.
 */
export async function choose<T>(
  question: string,
  items: readonly T[],
  label: (item: T) => string,
): Promise<T | null> {
  items.forEach((item, index) => {
    console.log(`  [${index + 1}] ${label(item)}`);
  });
  const answer = Number.parseInt(await ask(question), 10);
  if (!Number.isInteger(answer) || answer < 1 || answer > items.length) {
    return null;
  }
  return items[answer - 1];
}
