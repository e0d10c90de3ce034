/**
 * Typed reads over a parsed JSON config object. Every failure is a
 * ConfigError naming the dotted key.
 */

import { ConfigError } from "../errors";
import { isRecord, type JsonObject } from "../utils/json";

export class ConfigReader {
  private constructor(
    private readonly source: JsonObject,
    private readonly prefix: string,
  ) {}

  static root(value: unknown, file: string): ConfigReader {
    if (!isRecord(value)) throw new ConfigError(`${file}: config must be a JSON object`);
    return new ConfigReader(value, "");
  }

  private key(name: string): string {
    return this.prefix ? `${this.prefix}.${name}` : name;
  }

  private fail(name: string, expected: string): never {
    throw new ConfigError(`Invalid config key "${this.key(name)}": expected ${expected}`, this.key(name));
  }

  has(name: string): boolean {
    return this.source[name] !== undefined && this.source[name] !== null;
  }

  /** Nested object; an empty reader when the key is absent */
  section(name: string): ConfigReader {
    const value = this.source[name];
    if (value == null) return new ConfigReader({}, this.key(name));
    if (!isRecord(value)) this.fail(name, "an object");
    return new ConfigReader(value, this.key(name));
  }

  requiredString(name: string): string {
    const value = this.source[name];
    if (typeof value !== "string" || value.trim() === "") this.fail(name, "a non-empty string");
    return value.trim();
  }

  string(name: string, fallback: string): string {
    return this.has(name) ? this.requiredString(name) : fallback;
  }

  optionalString(name: string): string | null {
    return this.has(name) ? this.requiredString(name) : null;
  }

  number(name: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
    if (!this.has(name)) return fallback;
    const value = this.source[name];
    if (typeof value !== "number" || !Number.isFinite(value)) this.fail(name, "a number");
    if (opts.integer && !Number.isInteger(value)) this.fail(name, "an integer");
    if (opts.min != null && value < opts.min) this.fail(name, `a number >= ${opts.min}`);
    return value;
  }

  optionalNumber(name: string, opts: { min?: number; integer?: boolean } = {}): number | null {
    return this.has(name) ? this.number(name, 0, opts) : null;
  }

  boolean(name: string, fallback: boolean): boolean {
    if (!this.has(name)) return fallback;
    const value = this.source[name];
    if (typeof value !== "boolean") this.fail(name, "true or false");
    return value;
  }

  oneOf<T extends string>(name: string, allowed: readonly T[], fallback: T): T {
    if (!this.has(name)) return fallback;
    const value = this.source[name];
    const match = allowed.find((a) => a === value);
    if (match === undefined) this.fail(name, `one of ${allowed.join(", ")}`);
    return match;
  }

  stringList(name: string, fallback: string[]): string[] {
    if (!this.has(name)) return [...fallback];
    const value = this.source[name];
    if (!Array.isArray(value)) return this.fail(name, "a list of strings");
    return value.map((item) => {
      if (typeof item !== "string") return this.fail(name, "a list of strings");
      return item;
    });
  }

  numberList(name: string, fallback: number[]): number[] {
    if (!this.has(name)) return [...fallback];
    const value = this.source[name];
    if (!Array.isArray(value)) return this.fail(name, "a list of numbers");
    return value.map((item) => {
      if (typeof item !== "number" || !Number.isFinite(item)) return this.fail(name, "a list of numbers");
      return item;
    });
  }

  /** Object whose values are all strings, insertion order kept */
  stringMap(name: string): Record<string, string> {
    const out: Record<string, string> = {};
    if (!this.has(name)) return out;
    const value = this.source[name];
    if (!isRecord(value)) return this.fail(name, "an object of strings");
    for (const [k, v] of Object.entries(value)) {
      if (typeof v !== "string") this.fail(`${name}.${k}`, "a string");
      out[k] = v;
    }
    return out;
  }

  /** List of objects, each wrapped in its own reader */
  sections(name: string): ConfigReader[] {
    if (!this.has(name)) return [];
    const value = this.source[name];
    if (!Array.isArray(value)) return this.fail(name, "a list of objects");
    return value.map((item, i) => {
      if (!isRecord(item)) return this.fail(`${name}[${i}]`, "an object");
      return new ConfigReader(item, `${this.key(name)}[${i}]`);
    });
  }
}
