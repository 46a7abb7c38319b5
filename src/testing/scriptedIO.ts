import { ShellIO } from "../cli/helpers";

/**
 * ShellIO that replays canned answers and records everything shown.
 * Once the answers run out, `ask` reports end of input.
 */
export function scriptedIO(answers: string[]) {
  const queue = [...answers];
  const questions: string[] = [];
  const logs: string[] = [];

  const io: ShellIO = {
    ask: async (question) => {
      questions.push(question);
      return queue.shift() ?? null;
    },
    log: (message) => {
      logs.push(message);
    },
  };

  return { io, questions, logs };
}
