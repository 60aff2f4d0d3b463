/**
 * Chat Archiver — Chat Command Classifier
 *
 * Counts the controller inputs embedded in a chat message ("up a+b
 * start"). The projection only needs the shape of the result, so any
 * classifier with the same signature can be plugged in.
 */

export interface CommandClassification {
  /** One input sequence per simultaneous lane. */
  parallel: string[][];
  /** True when every word of the message was an input. */
  pure: boolean;
}

export type CommandClassifier = (text: string) => CommandClassification;

export const INPUT_VOCABULARY: ReadonlySet<string> = new Set([
  'up', 'down', 'left', 'right',
  'a', 'b', 'x', 'y', 'l', 'r',
  'start', 'select', 'wait',
]);

// An input may carry a single repeat digit: "up3"
const INPUT_PATTERN = /^([a-z]+)([1-9])?$/;

function isInput(token: string): boolean {
  const match = INPUT_PATTERN.exec(token);
  return match !== null && INPUT_VOCABULARY.has(match[1]);
}

/**
 * Split on whitespace, then each word on `+` into simultaneous inputs.
 * Lane *i* collects the *i*-th input of every fully recognized word.
 */
export function classifyCommands(text: string): CommandClassification {
  const words = text.trim().split(/\s+/).filter((w) => w.length > 0);
  const parallel: string[][] = [];
  let pure = words.length > 0;

  for (const word of words) {
    const inputs = word.toLowerCase().split('+');
    if (!inputs.every(isInput)) {
      pure = false;
      continue;
    }
    inputs.forEach((input, lane) => {
      if (!parallel[lane]) parallel[lane] = [];
      parallel[lane].push(input);
    });
  }

  return { parallel, pure };
}
