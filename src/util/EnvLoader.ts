// src/util/EnvLoader.ts

/**
 * Minimal, safe helpers to read env values AFTER loadDotenv() is called
 * at process start (server.ts and the jobs).
 */
export class EnvLoader {
  /**
   * Get an environment variable or undefined (no throw). Blank values count as unset.
   */
  static get(key: string): string | undefined {
    const value = process.env[key]?.trim();
    return value ? value : undefined;
  }

  /**
   * Get an env var, parse as integer, or undefined when missing.
   * Throws when present but not an integer.
   */
  static getInt(key: string): number | undefined {
    const v = EnvLoader.get(key);
    if (v === undefined) return undefined;
    const n = Number(v);
    if (!Number.isInteger(n)) {
      throw new Error(`Environment variable "${key}" must be an integer.`);
    }
    return n;
  }

  /**
   * Get an env var, parse as a finite number, or undefined when missing.
   */
  static getFloat(key: string): number | undefined {
    const v = EnvLoader.get(key);
    if (v === undefined) return undefined;
    const n = Number(v);
    if (!Number.isFinite(n)) {
      throw new Error(`Environment variable "${key}" must be a number.`);
    }
    return n;
  }

  /**
   * Comma separated list, blanks dropped. Undefined when missing or empty.
   */
  static getList(key: string): string[] | undefined {
    const v = EnvLoader.get(key);
    if (v === undefined) return undefined;
    const items = v
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean);
    return items.length ? items : undefined;
  }
}
