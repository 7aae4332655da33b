import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { displayHelp, helpTopics } from '../src/help';

describe('displayHelp', () => {
  let output: string[];

  beforeEach(() => {
    output = [];
    vi.spyOn(console, 'log').mockImplementation((...parts: unknown[]) => {
      output.push(parts.map(String).join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists every topic without an argument', () => {
    displayHelp(undefined, 'bucket-relay');

    for (const topic of ['config', 'process', 'sweep']) {
      expect(output.some((line) => line.includes(topic))).toBe(true);
    }
  });

  it('prints the content of a topic', () => {
    displayHelp('sweep', 'bucket-relay');

    expect(output).toContain(helpTopics.sweep.content);
  });

  it('reports an unknown topic', () => {
    displayHelp('nope', 'bucket-relay');

    expect(output).toContain('Available topics: config, process, sweep');
  });
});
