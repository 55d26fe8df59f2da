import { Command } from 'commander';
import { fileURLToPath } from 'node:url';
import { runSimulation, type RunSimulationResult } from './app/runSimulation';
import {
  askYesNo,
  caseMenu,
  casePrompt,
  createReadlinePrompter,
  listCases,
  resolveCaseChoice,
  type Prompter,
} from './app/prompt';
import { isSimulationError, UnknownAgentError } from './errors';
import { formatReport } from './io/emit';
import { emitTopPerformerCsv } from './io/emitCsv';
import { emitHtml } from './io/emitHtml';
import { renderRoute } from './io/emitRoute';
import { expandOutputPath, writeOutput } from './io/paths';

interface SimulateCliOptions {
  input?: string;
  delays?: boolean;
  midDayJoin?: boolean;
  joinAfterAssignment?: boolean;
  seed?: string;
  out: string;
  csv?: string | boolean;
  html?: string;
  visualize?: string;
  verbose?: boolean;
  interactive?: boolean;
  casesDir: string;
}

const DEFAULT_CSV = 'top_performer.csv';

/** Print the route for `agentId`; unknown ids print a message instead. */
function visualize(result: RunSimulationResult, agentId: string): boolean {
  try {
    console.log(renderRoute(result.run.fleet, agentId));
    return true;
  } catch (err) {
    if (err instanceof UnknownAgentError) {
      console.log(`Agent ${err.agentId} not found!`);
      return false;
    }
    throw err;
  }
}

async function promptVisualization(
  prompter: Prompter,
  result: RunSimulationResult,
): Promise<void> {
  for (;;) {
    const answer = (
      await prompter.ask("Visualize routes for an agent? (enter agent ID or 'n'): ")
    ).trim();
    if (answer === '' || answer.toLowerCase() === 'n') return;
    if (visualize(result, answer)) return;
  }
}

async function simulate(
  opts: SimulateCliOptions,
  prompter: Prompter | undefined,
): Promise<void> {
  let inputPath = opts.input;
  if (!inputPath) {
    if (!prompter) throw new Error('No input file given');
    const cases = listCases(opts.casesDir);
    console.log(caseMenu(cases).join('\n'));
    const choice = await prompter.ask(casePrompt(cases));
    inputPath = resolveCaseChoice(choice, opts.casesDir, cases);
  }

  const enableDelays =
    opts.delays ??
    (prompter ? await askYesNo(prompter, 'Enable random delivery delays?') : undefined);
  const newAgentMidDay =
    opts.midDayJoin ??
    (prompter
      ? await askYesNo(prompter, 'Simulate new agent joining mid-day?')
      : undefined);

  console.log(`Loading data from ${inputPath}...`);
  const result = runSimulation({
    inputPath,
    enableDelays,
    newAgentMidDay,
    midDayJoin: opts.joinAfterAssignment ? 'after-assignment' : undefined,
    seed: opts.seed,
    verbose: opts.verbose,
  });
  console.log(formatReport(result.report).join('\n'));

  const timestamp = new Date().toISOString();
  const tokens = { timestamp, seed: result.config.seed };
  writeOutput(expandOutputPath(opts.out, tokens), result.json);

  if (opts.html) {
    const html = emitHtml(result.report, result.run.fleet.agents(), timestamp, {
      seed: result.config.seed,
    });
    writeOutput(expandOutputPath(opts.html, tokens), html);
  }

  if (opts.visualize) {
    visualize(result, opts.visualize);
  } else if (prompter) {
    await promptVisualization(prompter, result);
  }

  let csvPath: string | undefined;
  if (opts.csv !== undefined) {
    csvPath = typeof opts.csv === 'string' ? opts.csv : DEFAULT_CSV;
  } else if (prompter && (await askYesNo(prompter, 'Export top performer to CSV?'))) {
    csvPath = DEFAULT_CSV;
  }
  if (csvPath) {
    const csv = emitTopPerformerCsv(result.report, timestamp);
    if (csv === undefined) {
      console.log('No best agent found!');
    } else {
      writeOutput(expandOutputPath(csvPath, tokens), csv);
    }
  }

  console.log('Simulation completed successfully!');
}

export function buildProgram(
  createPrompter: () => Prompter = () => createReadlinePrompter(),
): Command {
  const program = new Command();

  program
    .name('delivery-sim')
    .description('Simulate a day of package deliveries with nearest-agent assignment')
    .version('0.1.0')
    .showHelpAfterError();

  program
    .command('simulate', { isDefault: true })
    .option('--input <file>', 'Path to simulation input JSON file')
    .option('--delays', 'Enable random delivery delays')
    .option('--mid-day-join', 'Add a new agent at a random location mid-day')
    .option(
      '--join-after-assignment',
      'Let the mid-day agent join only after packages are assigned',
    )
    .option('--seed <seed>', 'Random seed')
    .option('--out <file>', 'Write report JSON to this path (overwrite)', 'report.json')
    .option('--csv [file]', 'Write top performer CSV to this path')
    .option('--html <file>', 'Write HTML report to this path')
    .option('--visualize <agentId>', 'Print the route of this agent')
    .option('--verbose', 'Print every leg as it is simulated')
    .option('--interactive', 'Prompt for input file and features')
    .option('--cases-dir <dir>', 'Directory holding the numbered test cases', 'cases')
    .action(async (opts: SimulateCliOptions) => {
      const prompter =
        opts.interactive || !opts.input ? createPrompter() : undefined;
      try {
        await simulate(opts, prompter);
      } catch (err) {
        if (!isSimulationError(err)) throw err;
        console.error(`Error: ${err.message}`);
        process.exitCode = 1;
      } finally {
        prompter?.close();
      }
    });

  return program;
}

export const program = buildProgram();

export async function run(
  argv: readonly string[] = process.argv,
  cli: Command = program,
): Promise<Command> {
  return cli.parseAsync([...argv]);
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  run().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
}
