import { ConfigError } from './error-handler.js';

type Env = Record<string, string | undefined>;

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

/**
 * Typed access to environment variables. Blank values count as unset.
 */
export class ConfigManager {
  constructor(private readonly env: Env = process.env) {}

  get(key: string): string | undefined;
  get(key: string, defaultValue: string): string;
  get(key: string, defaultValue?: string): string | undefined {
    const value = this.env[key]?.trim();
    return value ? value : defaultValue;
  }

  require(key: string): string {
    const value = this.get(key);
    if (value === undefined) {
      throw new ConfigError(`${key} is not set`, { key });
    }
    return value;
  }

  getNumber(key: string, defaultValue: number): number {
    const raw = this.get(key);
    if (raw === undefined) {
      return defaultValue;
    }
    const value = Number(raw);
    if (Number.isNaN(value)) {
      throw new ConfigError(`${key} must be a number, got "${raw}"`, { key, value: raw });
    }
    return value;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const raw = this.get(key)?.toLowerCase();
    if (raw === undefined) {
      return defaultValue;
    }
    if (TRUE_VALUES.includes(raw)) return true;
    if (FALSE_VALUES.includes(raw)) return false;
    throw new ConfigError(`${key} must be a boolean, got "${raw}"`, { key, value: raw });
  }
}
