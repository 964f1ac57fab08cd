import { ConfigSink } from './types';

/**
 * In-memory configuration sink. Values keep the order in which keys were first set.
 */
export class ConfigValues implements ConfigSink {
  private values = new Map<string, unknown>();

  public set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  public get(key: string): unknown {
    return this.values.get(key);
  }

  public getString(key: string): string | undefined {
    const value = this.values.get(key);
    if (value === undefined || value === null) {
      return undefined;
    }
    return typeof value === 'string' ? value : String(value);
  }

  public has(key: string): boolean {
    return this.values.has(key);
  }

  public keys(): string[] {
    return Array.from(this.values.keys());
  }

  public get size(): number {
    return this.values.size;
  }

  public toObject(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }
}
