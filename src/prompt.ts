import readline from 'node:readline/promises';

export function isYes(answer: string, defaultYes: boolean): boolean {
  const trimmed = answer.trim();
  if (!trimmed) return defaultYes;
  return /^[Yy]$/.test(trimmed);
}

export type PromptStreams = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
};

export async function confirmOnTerminal(
  question: string,
  defaultYes = true,
  streams: PromptStreams = { input: process.stdin, output: process.stdout }
): Promise<boolean> {
  const rl = readline.createInterface({ input: streams.input, output: streams.output });
  try {
    const answer = await rl.question(`\n${question} ${defaultYes ? '[Y/n]' : '[y/N]'}: `);
    return isYes(answer, defaultYes);
  } finally {
    rl.close();
  }
}
