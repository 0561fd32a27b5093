/**
 * Settings Stores
 *
 * Read-only key/value access to persisted settings.
 */

import { readFile } from "node:fs/promises";
import { getLogger, isRecord, type RuntimeLogger } from "@murmur/shared";
import { z } from "zod";

export type SettingValue = string | number | boolean;

/**
 * Read-only settings capability consumed by the configuration resolver
 */
export interface SettingsStore {
  get(key: string): SettingValue | undefined;
}

/**
 * In-memory settings, for embedding applications and tests
 */
export class MemorySettingsStore implements SettingsStore {
  private readonly values: Map<string, SettingValue>;

  constructor(values: Record<string, SettingValue> = {}) {
    this.values = new Map(Object.entries(values));
  }

  get(key: string): SettingValue | undefined {
    return this.values.get(key);
  }

  set(key: string, value: SettingValue): void {
    this.values.set(key, value);
  }

  delete(key: string): void {
    this.values.delete(key);
  }
}

const SettingsFileSchema = z.record(z.string(), z.union([z.string(), z.number(), z.boolean()]));

export class SettingsFileError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: ErrorOptions) {
    super(`Invalid settings file ${path}: ${message}`, options);
    this.name = "SettingsFileError";
    this.path = path;
  }
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === "ENOENT";
}

/**
 * Settings read once from a flat JSON object file.
 * A missing file is an empty store.
 */
export class JsonFileSettingsStore implements SettingsStore {
  private readonly values: Readonly<Record<string, SettingValue>>;

  private constructor(values: Record<string, SettingValue>) {
    this.values = values;
  }

  static async load(
    path: string,
    logger: RuntimeLogger = getLogger().child({ module: "settings" })
  ): Promise<JsonFileSettingsStore> {
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        logger.debug("Settings file not found, using empty settings", { path });
        return new JsonFileSettingsStore({});
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new SettingsFileError(path, "not valid JSON", {
        cause: error instanceof Error ? error : undefined,
      });
    }

    const result = SettingsFileSchema.safeParse(parsed);
    if (!result.success) {
      const issue = result.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at "${issue.path.join(".")}"` : "";
      throw new SettingsFileError(path, `${issue?.message ?? "unexpected shape"}${where}`);
    }

    logger.debug("Loaded settings file", { path, keys: Object.keys(result.data).length });
    return new JsonFileSettingsStore(result.data);
  }

  get(key: string): SettingValue | undefined {
    return Object.hasOwn(this.values, key) ? this.values[key] : undefined;
  }
}
