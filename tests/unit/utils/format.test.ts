import { describe, expect, it } from 'vitest';

import { CommandDetailsBuilder } from '../../../src/core/command-details.js';
import { formatCommandLine, formatDetails } from '../../../src/utils/format.js';

describe('formatCommandLine', () => {
  it('prefixes cargo commands with cargo', () => {
    const details = new CommandDetailsBuilder('test', 'cargo').params(['--', '--nocapture']).build();
    expect(formatCommandLine(details)).toBe('cargo test -- --nocapture');
  });

  it('runs shell commands as written and quotes params with spaces', () => {
    const details = new CommandDetailsBuilder('echo', 'shell').params(['hello world']).build();
    expect(formatCommandLine(details)).toBe('echo "hello world"');
  });
});

describe('formatDetails', () => {
  it('lists every field with env keys sorted', () => {
    const details = new CommandDetailsBuilder('run', 'cargo')
      .params(['--release'])
      .preCommand('build')
      .workingDirectory('/srv/app')
      .allowMultipleInstances(true)
      .env({ Z: '1', A: '2' })
      .build();
    expect(formatDetails(details)).toEqual([
      'command: run',
      'type: cargo',
      'command line: cargo run --release',
      'params: --release',
      'pre-command: build',
      'working directory: /srv/app',
      'allow multiple instances: yes',
      'env A=2',
      'env Z=1',
    ]);
  });

  it('describes an unset working directory', () => {
    const details = new CommandDetailsBuilder('ls', 'shell').build();
    expect(formatDetails(details)).toEqual([
      'command: ls',
      'type: shell',
      'command line: ls',
      'working directory: (current directory)',
      'allow multiple instances: no',
    ]);
  });
});
