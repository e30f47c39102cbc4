/**
 * Interactive confirmation on the controlling terminal
 */

import { createInterface } from 'node:readline/promises';

const AFFIRMATIVE = new Set(['y', 'yes']);

export function isAffirmative(answer: string): boolean {
  return AFFIRMATIVE.has(answer.trim().toLowerCase());
}

export async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return isAffirmative(await rl.question(question));
  } finally {
    rl.close();
  }
}
