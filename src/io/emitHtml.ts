import { readFileSync } from 'node:fs';
import Mustache from 'mustache';
import { formatPoint, round2 } from '../distance';
import type { Agent, Report } from '../types';

const defaultTemplate = readFileSync(
  new URL('./templates/report.mustache', import.meta.url),
  'utf8',
);
const defaultPartials = {
  agent: readFileSync(new URL('./templates/agent.mustache', import.meta.url), 'utf8'),
};

export interface EmitHtmlOptions {
  /** Override the base template */
  template?: string;
  /** Override or add partials */
  partials?: Record<string, string>;
  seed?: number | string;
}

interface ViewModel {
  generatedAt: string;
  seed?: string;
  bestAgent: string | null;
  totalPackages: number;
  packagesDelivered: number;
  agents: {
    id: string;
    packagesDelivered: number;
    totalDistance: string;
    efficiency: string;
    legs: {
      kind: string;
      packageId: string;
      from: string;
      to: string;
      distance: string;
    }[];
  }[];
}

export function emitHtml(
  report: Report,
  agents: readonly Agent[],
  generatedAt: string,
  opts: EmitHtmlOptions = {},
): string {
  const byId = new Map(agents.map((a) => [a.id, a]));
  const view: ViewModel = {
    generatedAt,
    seed: opts.seed !== undefined ? String(opts.seed) : undefined,
    bestAgent: report.bestAgent,
    totalPackages: report.totalPackages,
    packagesDelivered: report.packagesDelivered,
    agents: report.agents.map((m) => ({
      id: m.agentId,
      packagesDelivered: m.packagesDelivered,
      totalDistance: round2(m.totalDistance).toFixed(2),
      efficiency: round2(m.efficiency).toFixed(2),
      legs: (byId.get(m.agentId)?.legs ?? []).map((leg) => ({
        kind: leg.kind,
        packageId: leg.packageId,
        from: formatPoint(leg.from),
        to: formatPoint(leg.to),
        distance: leg.distance.toFixed(2),
      })),
    })),
  };
  const template = opts.template ?? defaultTemplate;
  const partials = opts.partials ?? defaultPartials;
  return Mustache.render(template, view, partials);
}

export default emitHtml;
