/**
 * YAML helpers.
 *
 * Site files are read with the core schema so that ISO dates stay
 * strings; callers validate the parsed value before trusting its shape.
 */
import { readFileSync } from "node:fs";
import yaml from "js-yaml";

/**
 * Parse YAML text.
 *
 * @throws {yaml.YAMLException} on malformed YAML.
 */
export function parseYaml(text: string, filename?: string): unknown {
  return yaml.load(text, { schema: yaml.CORE_SCHEMA, filename });
}

/** Read and parse a YAML file. */
export function readYamlFile(path: string): unknown {
  return parseYaml(readFileSync(path, "utf-8"), path);
}

/** Dump a value as block-style YAML with a 2-space indent. */
export function stringifyYaml(value: unknown): string {
  return yaml.dump(value, {
    indent: 2,
    lineWidth: 120,
    noRefs: true,
    sortKeys: false,
  });
}
