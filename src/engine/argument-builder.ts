import { Option } from "effect";

type Entry = readonly [flag: string, value: Option.Option<string>];

/**
 * Accumulates engine flags in insertion order. Unset optional values are
 * skipped entirely so the engine falls back to its own defaults.
 */
export class EngineArgumentBuilder {
  private readonly entries: Entry[] = [];

  public value(flag: string, value: string | number): this {
    this.entries.push([flag, Option.some(String(value))]);
    return this;
  }

  public optional(flag: string, value: Option.Option<string | number>): this {
    if (Option.isSome(value)) {
      this.value(flag, value.value);
    }
    return this;
  }

  public toggle(flag: string, enabled: boolean): this {
    if (enabled) {
      this.entries.push([flag, Option.none()]);
    }
    return this;
  }

  public build(): ReadonlyArray<string> {
    return this.entries.flatMap(([flag, value]) =>
      Option.match(value, {
        onNone: () => [flag],
        onSome: (v) => [flag, v],
      })
    );
  }
}
