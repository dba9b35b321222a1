import type { ConfigStore } from '../../src/adapters/types.js';

export class MemoryConfigStore implements ConfigStore {
  readonly location = 'memory://config.toml';
  writes = 0;
  failWrites = false;

  constructor(public content?: string) {}

  // eslint-disable-next-line @typescript-eslint/require-await
  async read(): Promise<string | undefined> {
    return this.content;
  }

  // eslint-disable-next-line @typescript-eslint/require-await
  async write(content: string): Promise<void> {
    if (this.failWrites) {
      throw new Error('disk full');
    }
    this.writes++;
    this.content = content;
  }
}
