interface Bounds {
  min?: number;
  max?: number;
}

const TRUTHY = new Set(["true", "1", "yes"]);
const FALSY = new Set(["false", "0", "no"]);

function raw(key: string): string | undefined {
  const value = process.env[key];
  return value === undefined || value === "" ? undefined : value;
}

function fallback<T>(key: string, value: string, defaultValue: T, problem: string): T {
  console.warn(`${key}=${JSON.stringify(value)} ${problem}, using default ${String(defaultValue)}`);
  return defaultValue;
}

/**
 * Reads typed settings from process.env. An unset or empty variable yields the default; an unusable
 * one yields the default with a console warning, since these run before any Nest logger exists.
 */
export class EnvironmentUtils {
  static parseInt(key: string, defaultValue: number, bounds: Bounds = {}): number {
    return EnvironmentUtils.parseNumber(key, defaultValue, bounds, Number.isInteger, "is not an integer");
  }

  static parseFloat(key: string, defaultValue: number, bounds: Bounds = {}): number {
    return EnvironmentUtils.parseNumber(key, defaultValue, bounds, Number.isFinite, "is not a finite number");
  }

  static parseBoolean(key: string, defaultValue: boolean): boolean {
    const value = raw(key);
    if (value === undefined) return defaultValue;

    const normalized = value.toLowerCase();
    if (TRUTHY.has(normalized)) return true;
    if (FALSY.has(normalized)) return false;
    return fallback(key, value, defaultValue, "is not a boolean");
  }

  static parseString(key: string, defaultValue: string, allowed?: readonly string[]): string {
    const value = raw(key);
    if (value === undefined) return defaultValue;
    if (allowed && !allowed.includes(value)) {
      return fallback(key, value, defaultValue, `is not one of ${allowed.join(", ")}`);
    }
    return value;
  }

  private static parseNumber(
    key: string,
    defaultValue: number,
    { min, max }: Bounds,
    accept: (n: number) => boolean,
    problem: string
  ): number {
    const value = raw(key);
    if (value === undefined) return defaultValue;

    const parsed = Number(value);
    if (!accept(parsed)) return fallback(key, value, defaultValue, problem);
    if (min !== undefined && parsed < min) return fallback(key, value, defaultValue, `is below ${min}`);
    if (max !== undefined && parsed > max) return fallback(key, value, defaultValue, `is above ${max}`);
    return parsed;
  }
}
