import { parse as parseYaml } from "yaml";
import { ConfigError } from "../errors";

function isObj(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

/**
 * Parses one YAML document that must be a mapping at the top level.
 * An empty document is treated as an empty mapping so the schema can name what is missing.
 */
export function parseYamlDocument(text: string, source: string): Record<string, unknown> {
  let doc: unknown;
  try {
    doc = parseYaml(text);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new ConfigError("CONFIG_PARSE", source, [{ path: "", message: msg }]);
  }

  if (doc === null || doc === undefined) return {};
  if (!isObj(doc)) {
    throw new ConfigError("CONFIG_PARSE", source, [{ path: "", message: "top level must be a mapping" }]);
  }
  return doc;
}
