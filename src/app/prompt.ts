import { createInterface } from 'node:readline/promises';
import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { MalformedInputError } from '../errors';

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}

export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): Prompter {
  const rl = createInterface({ input, output });
  return {
    ask: (question) => rl.question(question),
    close: () => rl.close(),
  };
}

const NUMBERED_CASE = /^test_case_(\d+)\.json$/;

function caseRank(name: string): [number, number, string] {
  if (name === 'base_case.json') return [0, 1, name];
  const m = NUMBERED_CASE.exec(name);
  if (m) return [1, Number(m[1]), name];
  return [2, 0, name];
}

/**
 * JSON files under `casesDir`: the base case first, numbered test cases in
 * numeric order, then anything else by name. A missing directory lists
 * nothing.
 */
export function listCases(casesDir: string): string[] {
  if (!existsSync(casesDir)) return [];
  return readdirSync(casesDir)
    .filter((name) => name.endsWith('.json'))
    .sort((a, b) => {
      const [ga, na, sa] = caseRank(a);
      const [gb, nb, sb] = caseRank(b);
      return ga - gb || na - nb || (sa < sb ? -1 : sa > sb ? 1 : 0);
    });
}

export function caseMenu(cases: readonly string[]): string[] {
  if (cases.length === 0) return ['No test cases found.'];
  return ['Available test cases:', ...cases.map((name, i) => `${i + 1}. ${name}`)];
}

export function casePrompt(cases: readonly string[]): string {
  return cases.length === 0
    ? 'Enter the input filename: '
    : `Enter the test case number (1-${cases.length}) or filename: `;
}

/**
 * A number picks from `cases` (as listed by {@link listCases}) under
 * `casesDir`; anything else is taken as a literal filename.
 */
export function resolveCaseChoice(
  choice: string,
  casesDir: string,
  cases: readonly string[],
): string {
  const trimmed = choice.trim();
  if (/^\d+$/.test(trimmed)) {
    const name = cases[Number(trimmed) - 1];
    if (name === undefined) {
      throw new MalformedInputError(`No test case numbered ${trimmed}`);
    }
    return join(casesDir, name);
  }
  return trimmed;
}

export async function askYesNo(prompter: Prompter, question: string): Promise<boolean> {
  const answer = await prompter.ask(`${question} (y/n): `);
  return answer.trim().toLowerCase() === 'y';
}
