import { readFileSync } from 'node:fs';
import { formatPoint } from '../distance';
import { MalformedInputError } from '../errors';
import { emitReportJson, formatRunSummary } from '../io/emit';
import { parseSimulationInput } from '../io/parse';
import type { LegObserver } from '../simulate';
import type { MidDayJoinPhase, Report, SimulationInput } from '../types';
import { SimulationRun } from './simulationRun';

export interface RunSimulationOptions {
  inputPath: string;
  enableDelays?: boolean;
  newAgentMidDay?: boolean;
  midDayJoin?: MidDayJoinPhase;
  seed?: number | string;
  verbose?: boolean;
}

export interface ResolvedConfig {
  enableDelays: boolean;
  newAgentMidDay: boolean;
  midDayJoin: MidDayJoinPhase;
  seed?: number | string;
}

export interface RunSimulationResult {
  run: SimulationRun;
  report: Report;
  json: string;
  config: ResolvedConfig;
}

export function loadSimulationInput(path: string): SimulationInput {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (err) {
    throw new MalformedInputError(`Unable to read input file ${path}`, {
      cause: err,
    });
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new MalformedInputError(`Invalid JSON format in ${path}`, {
      cause: err,
    });
  }
  return parseSimulationInput(json);
}

/** Flags win over the input file's config block, which wins over defaults. */
export function resolveConfig(
  opts: Omit<RunSimulationOptions, 'inputPath'>,
  input: SimulationInput,
): ResolvedConfig {
  return {
    enableDelays: opts.enableDelays ?? input.config.enableDelays ?? false,
    newAgentMidDay: opts.newAgentMidDay ?? input.config.newAgentMidDay ?? false,
    midDayJoin:
      opts.midDayJoin ?? input.config.midDayJoin ?? 'before-assignment',
    seed: opts.seed ?? input.config.seed,
  };
}

const logLeg: LegObserver = (agent, leg, index) => {
  console.log(
    `leg ${agent.id}#${index + 1} ${leg.kind} ${leg.packageId} ${formatPoint(
      leg.from,
    )} -> ${formatPoint(leg.to)} dist=${leg.distance.toFixed(2)} x${leg.multiplier.toFixed(3)}`,
  );
};

export function runSimulation(opts: RunSimulationOptions): RunSimulationResult {
  const input = loadSimulationInput(opts.inputPath);
  const config = resolveConfig(opts, input);
  const run = new SimulationRun(input, {
    ...config,
    onLeg: opts.verbose ? logLeg : undefined,
    onJoin: (agent) =>
      console.warn(
        `New agent ${agent.id} joined at location ${formatPoint(agent.origin)} (${config.midDayJoin})`,
      ),
  });
  const report = run.run();

  console.log(formatRunSummary(report));
  if (report.packagesDelivered !== report.totalPackages) {
    console.warn(
      `Warning: delivered ${report.packagesDelivered} of ${report.totalPackages} packages`,
    );
  }
  return { run, report, json: emitReportJson(report), config };
}
