/**
 * Resolved Options
 * Final option values with the source each one came from
 */

import type {
  OptionValue,
  Provenance,
  ResolvedOption,
} from "../types/options";

export type OptionLayer = ReadonlyMap<string, OptionValue>;

// Lowest priority first; later layers replace earlier ones per option
const LAYER_ORDER: readonly Provenance[] = [
  "default",
  "config-file",
  "command-line",
];

export class ResolvedOptions {
  private readonly entries: ReadonlyMap<string, ResolvedOption>;

  private constructor(entries: Map<string, ResolvedOption>) {
    this.entries = entries;
  }

  /**
   * Merge option layers in the fixed source-priority order
   */
  static merge(
    layers: Partial<Record<Provenance, OptionLayer>>,
  ): ResolvedOptions {
    const entries = new Map<string, ResolvedOption>();

    for (const source of LAYER_ORDER) {
      const layer = layers[source];
      if (!layer) continue;
      for (const [name, value] of layer) {
        entries.set(name, Object.freeze({ value, source }));
      }
    }

    return new ResolvedOptions(entries);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): ResolvedOption | undefined {
    return this.entries.get(name);
  }

  sourceOf(name: string): Provenance | undefined {
    return this.entries.get(name)?.source;
  }

  names(): string[] {
    return [...this.entries.keys()];
  }

  getFlag(name: string): boolean {
    const value = this.entries.get(name)?.value;
    return value === true;
  }

  getInteger(name: string): number | undefined {
    const value = this.entries.get(name)?.value;
    return typeof value === "number" ? value : undefined;
  }

  getString(name: string): string | undefined {
    const value = this.entries.get(name)?.value;
    return typeof value === "string" ? value : undefined;
  }

  getStrings(name: string): string[] | undefined {
    const value = this.entries.get(name)?.value;
    if (Array.isArray(value)) return [...value];
    return typeof value === "string" ? [value] : undefined;
  }

  toJSON(): Record<string, ResolvedOption> {
    return Object.fromEntries(this.entries);
  }
}
