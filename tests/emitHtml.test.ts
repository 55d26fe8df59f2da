import { describe, it, expect } from 'vitest';
import { SimulationRun } from '../src/app/simulationRun';
import { emitHtml } from '../src/io/emitHtml';
import { parseSimulationInput } from '../src/io/parse';

function simulated(): SimulationRun {
  const run = new SimulationRun(
    parseSimulationInput({
      warehouses: [{ id: 'W1', x: 0, y: 0 }],
      agents: [
        { id: 'A1', x: 5, y: 5 },
        { id: 'A2', x: 90, y: 90 },
      ],
      packages: [{ id: 'P1', warehouse_id: 'W1', dest_x: 30, dest_y: 40 }],
    }),
  );
  run.run();
  return run;
}

describe('emitHtml', () => {
  it('renders the report using the default template', () => {
    const run = simulated();
    const html = emitHtml(run.report(), run.fleet.agents(), '2024-01-01T00:00:00Z', {
      seed: 42,
    });
    expect(html).toContain('<strong>A1</strong>');
    expect(html).toContain('Generated 2024-01-01T00:00:00Z');
    expect(html).toContain('seed 42');
    expect(html).toContain('Packages delivered: 1 of 1');
    const tbody = html.split('<tbody>')[1].split('</tbody>')[0];
    expect(tbody.match(/<tr>/g)?.length).toBe(2);
    expect(tbody).toContain('<td>A1</td><td>1</td><td>57.07</td><td>57.07</td>');
    expect(html.match(/<li class="/g)?.length).toBe(2);
    expect(html).toContain('<li class="deliver">deliver P1: (0, 0) &rarr; (30, 40) (50.00)</li>');
  });

  it('accepts a custom template', () => {
    const run = simulated();
    const html = emitHtml(run.report(), run.fleet.agents(), 'ts', {
      template: '{{bestAgent}}|{{#agents}}{{id}};{{/agents}}',
    });
    expect(html).toBe('A1|A1;A2;');
  });
});
