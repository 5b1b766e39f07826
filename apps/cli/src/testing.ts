import { TerminalPrompts } from './prompts.js';
import type { AskLine } from './prompts.js';

/** Prompts that answer from a fixed script and record what was asked and shown. */
export function scriptedPrompts(answers: string[]) {
  const questions: string[] = [];
  const lines: string[] = [];
  const ask: AskLine = async (question) => {
    questions.push(question);
    const next = answers.shift();
    if (next === undefined) throw new Error(`No scripted answer for: ${question}`);
    return next;
  };
  return { prompts: new TerminalPrompts(ask, (line) => lines.push(line)), questions, lines };
}
