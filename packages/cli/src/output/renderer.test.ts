import { describe, it, expect } from 'vitest';
import pc from 'picocolors';
import { OutputRenderer } from './renderer';
import { captureSink } from '../../test/helpers';

describe('OutputRenderer', () => {
  it('renders JSON output when json mode is enabled', () => {
    const sink = captureSink();
    const renderer = new OutputRenderer(true, sink);

    renderer.render({ scenario: 'demo' }, 'human report');

    expect(sink.out).toEqual(['{\n  "scenario": "demo"\n}']);
  });

  it('renders the human report otherwise', () => {
    const sink = captureSink();
    new OutputRenderer(false, sink).render({ scenario: 'demo' }, 'human report');

    expect(sink.out).toEqual(['human report']);
  });

  it('prints heading fields followed by a blank line', () => {
    const sink = captureSink();
    new OutputRenderer(false, sink).heading({ Mode: 'baseline', 'Project directory': '/tmp/p' });

    expect(sink.out).toEqual(['Mode: baseline', 'Project directory: /tmp/p', '']);
  });

  it('stays silent for headings and saved notices in json mode', () => {
    const sink = captureSink();
    const renderer = new OutputRenderer(true, sink);

    renderer.heading({ Mode: 'baseline' });
    renderer.saved('Results', '/tmp/out.json');

    expect(sink.out).toEqual([]);
  });

  it('reports where a file was saved', () => {
    const sink = captureSink();
    new OutputRenderer(false, sink).saved('Results', '/tmp/out.json');

    expect(sink.out).toEqual([`\nResults saved to: ${pc.cyan('/tmp/out.json')}`]);
  });

  it('prints progress notes in gray and drops them in json mode', () => {
    const human = captureSink();
    const json = captureSink();

    new OutputRenderer(false, human).log('Session finished in 3s');
    new OutputRenderer(true, json).log('Session finished in 3s');

    expect(human.out).toEqual([pc.gray('Session finished in 3s')]);
    expect(json.out).toEqual([]);
  });

  it('leaves the saved path uncolored when color is off', () => {
    const sink = captureSink();
    new OutputRenderer(false, sink, { color: false }).saved('Results', '/tmp/out.json');

    expect(sink.out).toEqual(['\nResults saved to: /tmp/out.json']);
  });
});
