import fs from "fs-extra";
import ini from "ini";
import { Outcome, errorMessage, fail, succeed } from "./errors.js";
import { debug, warn } from "./logger.js";
import { BridgeConfig, PAYLOAD_SHAPES, PayloadShape, Settings } from "./types.js";

export const VERSION = "1.0.0";

/**
 * Name of the configuration group holding process-wide settings instead of a project.
 */
const SETTINGS_SECTION = "_";

/**
 * Settings key prefix declaring an extra ingestion endpoint, e.g. `route:/hooks/ci = lightweight`.
 */
const ROUTE_KEY_PREFIX = "route:";

const DEFAULT_SETTINGS = {
  NOTIFICATIONS: "all",
  MODE: "normal",
  MAILTO: ""
} as const;

type IniSection = { readonly [key: string]: unknown };

function isSection(value: unknown): value is IniSection {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isPayloadShape(value: string): value is PayloadShape {
  return PAYLOAD_SHAPES.some(shape => shape === value);
}

// `ini` turns `true`/`false`/`null` into JSON values; configuration keeps their text.
function scalarText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "boolean" || value === null) {
    return String(value);
  }
  return undefined;
}

/**
 * Collect the scalar keys of every section, undoing `ini`'s nesting of dotted section names
 * so that `[acme/site.io]` stays one project.
 */
function collectSections(node: IniSection, prefix: string, out: Map<string, Map<string, string>>): void {
  for (const [key, value] of Object.entries(node)) {
    const name = prefix ? `${prefix}.${key}` : key;
    if (isSection(value)) {
      collectSections(value, name, out);
      continue;
    }
    if (!prefix) {
      debug(`Ignoring top-level configuration key outside any section: ${key}`);
      continue;
    }
    const text = scalarText(value);
    if (text === undefined) {
      warn(`Ignoring non-scalar configuration entry ${key} in [${prefix}]`);
      continue;
    }
    const section = out.get(prefix) ?? new Map<string, string>();
    section.set(key, text);
    out.set(prefix, section);
  }
}

const SECTION_HEADER = /^\s*\[(.+)\]\s*$/;
const KEY_LINE = /^\s*([^;#=\s][^=]*?)\s*=/;

/**
 * Section names and their key names as written, before `ini` nests dotted sections.
 */
function declaredKeys(text: string): Map<string, Set<string>> {
  const sections = new Map<string, Set<string>>();
  let current: Set<string> | undefined;
  for (const line of text.split(/\r?\n/)) {
    const header = SECTION_HEADER.exec(line);
    if (header) {
      const name = header[1].trim();
      current = sections.get(name) ?? new Set<string>();
      sections.set(name, current);
      continue;
    }
    const key = KEY_LINE.exec(line);
    if (key && current) {
      current.add(key[1].replace(/\[\]$/, ""));
    }
  }
  return sections;
}

/**
 * Find a key that a dotted section name would overwrite, e.g. key `io` in `[acme/site]`
 * next to `[acme/site.io]`.
 */
function findShadowedKey(text: string): string | undefined {
  const sections = declaredKeys(text);
  for (const name of sections.keys()) {
    const parts = name.split(".");
    for (let index = 1; index < parts.length; index += 1) {
      const parent = parts.slice(0, index).join(".");
      if (sections.get(parent)?.has(parts[index])) {
        return `key "${parts[index]}" in [${parent}] collides with section [${name}]`;
      }
    }
  }
  return undefined;
}

function parseSettings(entries: ReadonlyMap<string, string>): Outcome<Settings> {
  const spool = entries.get("spool")?.trim();
  if (!spool) {
    return fail({ kind: "configuration-invalid", reason: `missing "spool" in [${SETTINGS_SECTION}]` });
  }

  const routes = new Map<string, PayloadShape>();
  for (const [key, value] of entries) {
    if (!key.startsWith(ROUTE_KEY_PREFIX)) {
      continue;
    }
    const path = key.slice(ROUTE_KEY_PREFIX.length).trim();
    const shape = value.trim();
    if (!path.startsWith("/") || !isPayloadShape(shape)) {
      return fail({ kind: "configuration-invalid", reason: `bad route declaration ${key} = ${value}` });
    }
    routes.set(path, shape);
  }

  return succeed({
    spool,
    notifications: entries.get("notifications")?.trim() || DEFAULT_SETTINGS.NOTIFICATIONS,
    mode: entries.get("mode")?.trim() || DEFAULT_SETTINGS.MODE,
    mailto: entries.get("mailto")?.trim() ?? DEFAULT_SETTINGS.MAILTO,
    routes
  });
}

/**
 * Parse INI configuration text into the project table and settings.
 *
 * Invariant: the `_` group is never exposed as a project; a section without target keys
 * does not define a project; a target key never silently disappears behind a dotted section.
 *
 * @param text - INI document.
 * @returns Parsed configuration or `configuration-invalid`.
 */
export function parseConfig(text: string): Outcome<BridgeConfig> {
  const shadowed = findShadowedKey(text);
  if (shadowed) {
    return fail({ kind: "configuration-invalid", reason: shadowed });
  }
  const sections = new Map<string, Map<string, string>>();
  collectSections(ini.parse(text), "", sections);

  const settings = parseSettings(sections.get(SETTINGS_SECTION) ?? new Map<string, string>());
  if (!settings.ok) {
    return settings;
  }
  sections.delete(SETTINGS_SECTION);

  debug(`Configuration lists ${sections.size} projects.`);
  return succeed({ projects: sections, settings: settings.value });
}

/**
 * Read and parse the configuration file. Called once per connection, never cached.
 *
 * @param path - Configuration file location.
 * @returns Parsed configuration, `configuration-missing` or `configuration-invalid`.
 */
export async function loadConfig(path: string): Promise<Outcome<BridgeConfig>> {
  if (!(await fs.pathExists(path))) {
    return fail({ kind: "configuration-missing", path });
  }
  let text: string;
  try {
    text = await fs.readFile(path, "utf8");
  } catch (cause) {
    return fail({ kind: "configuration-invalid", reason: errorMessage(cause) });
  }
  return parseConfig(text);
}
