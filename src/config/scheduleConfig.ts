import { promises as fs } from "fs";
import path from "path";
import YAML from "yaml";
import { ConfigFileError, ScheduleConfigError, UndefinedJobRule } from "../core/errors.js";

export const SCHEDULE_PREFIX = "schedule_";
export const CONFIG_PATH_ENV = "CLUSTER_SUBMIT_CONFIG";

export type ScheduleTable = Readonly<Record<string, unknown>>;
export type ResourceValues = Readonly<Record<string, unknown>>;

export type ScheduleEntry =
  | { kind: "record"; key: string; values: ResourceValues }
  | { kind: "redirect"; key: string; target: string };

export interface ResolvedRule {
  ruleName: string;
  // key looked up for the rule, and the key the record was read from (differs after a redirect)
  key: string;
  source: string;
  values: ResourceValues;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function scheduleKey(ruleName: string): string {
  return `${SCHEDULE_PREFIX}${ruleName}`;
}

export function classifyEntry(key: string, value: unknown): ScheduleEntry {
  if (isPlainObject(value)) return { kind: "record", key, values: value };
  if (typeof value === "string" && value.startsWith(SCHEDULE_PREFIX)) {
    return { kind: "redirect", key, target: value };
  }
  throw new ScheduleConfigError(
    `${key} must be a resource record or a redirect to another ${SCHEDULE_PREFIX}* key, got ${JSON.stringify(value)}`
  );
}

export class ScheduleConfig {
  constructor(private readonly table: ScheduleTable) {}

  static async loadFromFile(filePath: string): Promise<ScheduleConfig> {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, "utf8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigFileError(`unable to read schedule config ${filePath}: ${reason}`);
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(raw, { uniqueKeys: false }) as unknown;
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ConfigFileError(`invalid schedule config at ${filePath}: ${reason}`);
    }
    if (!isPlainObject(parsed)) {
      throw new ConfigFileError(`invalid schedule config at ${filePath}: expected an object at the top level`);
    }
    return new ScheduleConfig(parsed);
  }

  private lookup(key: string): ScheduleEntry | null {
    if (!Object.prototype.hasOwnProperty.call(this.table, key)) return null;
    return classifyEntry(key, this.table[key]);
  }

  /**
   * Resource record for a rule. A `schedule_<rule>` value may name another
   * `schedule_*` key instead of holding a record; that target must hold a record.
   */
  resolveRule(ruleName: string): ResolvedRule {
    const key = scheduleKey(ruleName);
    const entry = this.lookup(key);
    if (!entry) {
      throw new UndefinedJobRule(`No schedule config found for ${key}`);
    }
    if (entry.kind === "record") {
      return { ruleName, key, source: key, values: entry.values };
    }

    const target = this.lookup(entry.target);
    if (!target) {
      throw new UndefinedJobRule(`No schedule config found for ${entry.target}`);
    }
    if (target.kind === "redirect") {
      throw new UndefinedJobRule(
        `No schedule config found for ${entry.target}: ${key} -> ${entry.target} -> ${target.target} redirects more than once`
      );
    }
    return { ruleName, key, source: target.key, values: target.values };
  }

  general(sectionKey: string): ResourceValues {
    const section = this.table[sectionKey];
    if (section === undefined) {
      throw new ScheduleConfigError(`schedule config has no ${sectionKey} section`);
    }
    if (!isPlainObject(section)) {
      throw new ScheduleConfigError(`${sectionKey} must be an object`);
    }
    return section;
  }
}

export function resolveConfigPath(input: {
  explicitPath?: string;
  env: NodeJS.ProcessEnv;
  cwd: string;
  defaultFileName: string;
}): string {
  const fromEnv = input.env[CONFIG_PATH_ENV]?.trim();
  const chosen = input.explicitPath ?? (fromEnv ? fromEnv : input.defaultFileName);
  return path.resolve(input.cwd, chosen);
}
