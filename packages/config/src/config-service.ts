import type { Schema } from "@wirebox/types";

/**
 * Container service giving stringly-typed and schema-validated access to a
 * snapshot of configuration values.
 */
export class ConfigService {
  private readonly values: ReadonlyMap<string, string>;

  constructor(values: Record<string, string> = {}) {
    this.values = new Map(Object.entries(values));
  }

  get(key: string): string | undefined {
    return this.values.get(key);
  }

  getOrThrow(key: string): string {
    const value = this.get(key);
    if (value === undefined) {
      throw new Error(`Config key "${key}" not found`);
    }
    return value;
  }

  getAll(): Readonly<Record<string, string>> {
    return Object.fromEntries(this.values);
  }

  parse<T>(schema: Schema<T>): T {
    return schema.parse(this.getAll());
  }
}
