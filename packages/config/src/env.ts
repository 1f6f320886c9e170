export type Environment = "development" | "test" | "production";

const ENVIRONMENT_MAP: Record<string, Environment> = {
  development: "development",
  dev: "development",
  test: "test",
  production: "production",
  prod: "production",
};

function collectPrefixed(prefix: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (key.startsWith(prefix) && value !== undefined) {
      result[key.slice(prefix.length)] = value;
    }
  }
  return result;
}

export class WireboxConfig {
  static getAppVar(name: string): string | undefined {
    return process.env[`WIREBOX_APP_${name}`];
  }

  static getAllAppVars(): Record<string, string> {
    return collectPrefixed("WIREBOX_APP_");
  }

  static getVariable(name: string): string | undefined {
    return process.env[`WIREBOX_VARIABLE_${name}`];
  }

  static getAllVariables(): Record<string, string> {
    return collectPrefixed("WIREBOX_VARIABLE_");
  }

  static getEnvironment(): Environment {
    const raw = process.env.WIREBOX_ENV?.toLowerCase() ?? "";
    return ENVIRONMENT_MAP[raw] ?? "development";
  }
}
