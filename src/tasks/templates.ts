import path from "path";
import { ConfigError, StagingError } from "../core/errors.js";
import type { StagingMode } from "../core/task.js";
import type { DiscoveryStrategy } from "../discovery/discovery.js";

export interface TemplateExtraBinding {
  key: string;
  containerPath: string;
  mode: "ro" | "rw";
}

/**
 * Data-driven description of one containerized tool: where its inputs and
 * outputs live inside the container and how its argv is assembled.
 */
export interface TaskTemplate {
  name: string;
  description: string;
  image: string;
  entrypoint: string | null;
  stagingModes: StagingMode[];
  strategy: DiscoveryStrategy;
  controlSuffixes: string[];
  markerSuffix: string | null;
  labelStripPrefixes: string[];
  inputs: { containerDir: string };
  output: { containerPath: string };
  license: { containerPath: string; argv: string[] } | null;
  extraBindings: TemplateExtraBinding[];
  argv: string[];
  defaultArgs: Record<string, string>;
  env: Record<string, string>;
}

export type PlaceholderValue = { kind: "path"; value: string } | { kind: "text"; value: string };

const PLACEHOLDER_RE = /\{([a-z_]+)(?::([A-Za-z0-9_.-]+))?\}/g;
const BARE_PLACEHOLDERS = new Set(["unit", "label", "input", "primary", "output", "marker", "license"]);
const TEMPLATE_NAME_RE = /^[a-z][a-z0-9-]*$/;

export function placeholderKey(name: string, qualifier: string | undefined): string {
  return qualifier === undefined ? name : `${name}:${qualifier}`;
}

export function listPlaceholders(token: string): string[] {
  const out: string[] = [];
  for (const m of token.matchAll(PLACEHOLDER_RE)) {
    out.push(placeholderKey(m[1] ?? "", m[2]));
  }
  return out;
}

/**
 * Substitute typed values into argv tokens. Every placeholder must resolve;
 * values are inserted verbatim since argv never passes through a shell.
 */
export function renderArgv(
  tokens: readonly string[],
  values: ReadonlyMap<string, PlaceholderValue>,
  unitId: string
): { argv: string[]; referencedPaths: string[] } {
  const referencedPaths: string[] = [];
  const argv = tokens.map((token) =>
    token.replace(PLACEHOLDER_RE, (_match, name: string, qualifier: string | undefined) => {
      const key = placeholderKey(name, qualifier);
      const value = values.get(key);
      if (!value) {
        throw new StagingError(`no value for placeholder {${key}} in argv token ${JSON.stringify(token)}`, { unitId });
      }
      if (value.kind === "path") referencedPaths.push(value.value);
      return value.value;
    })
  );
  return { argv, referencedPaths };
}

function assertContainerPath(template: string, what: string, p: string): void {
  if (!p.startsWith("/") || path.posix.normalize(p) !== p || p === "/") {
    throw new ConfigError(`template ${template}: ${what} must be a normalized absolute container path (got ${p})`);
  }
}

export function validateTemplate(t: TaskTemplate): TaskTemplate {
  if (!TEMPLATE_NAME_RE.test(t.name)) throw new ConfigError(`invalid template name: ${t.name}`);
  if (!t.image.trim()) throw new ConfigError(`template ${t.name}: image must be non-empty`);
  if (t.stagingModes.length === 0) throw new ConfigError(`template ${t.name}: stagingModes must be non-empty`);
  if (t.argv.length === 0 && !t.entrypoint) throw new ConfigError(`template ${t.name}: argv must be non-empty`);

  assertContainerPath(t.name, "inputs.containerDir", t.inputs.containerDir);
  assertContainerPath(t.name, "output.containerPath", t.output.containerPath);
  if (t.license) assertContainerPath(t.name, "license.containerPath", t.license.containerPath);

  const keys = new Set<string>();
  for (const b of t.extraBindings) {
    if (!/^[a-z][a-z0-9_]*$/.test(b.key)) throw new ConfigError(`template ${t.name}: invalid binding key ${b.key}`);
    if (keys.has(b.key)) throw new ConfigError(`template ${t.name}: duplicate binding key ${b.key}`);
    keys.add(b.key);
    assertContainerPath(t.name, `extraBindings.${b.key}`, b.containerPath);
  }

  const check = (tokens: readonly string[], where: string, allowLicense: boolean): void => {
    for (const token of tokens) {
      for (const key of listPlaceholders(token)) {
        const [name, qualifier] = key.split(":");
        if (name === "license" && !allowLicense) {
          throw new ConfigError(`template ${t.name}: {license} may only appear in license.argv (${where})`);
        }
        if (name === "bind") {
          if (!qualifier || !keys.has(qualifier)) throw new ConfigError(`template ${t.name}: unknown binding {${key}} in ${where}`);
          continue;
        }
        if (name === "arg") {
          if (!qualifier) throw new ConfigError(`template ${t.name}: {arg} needs a name in ${where}`);
          continue;
        }
        if (!name || qualifier !== undefined || !BARE_PLACEHOLDERS.has(name)) {
          throw new ConfigError(`template ${t.name}: unknown placeholder {${key}} in ${where}`);
        }
      }
    }
  };
  check(t.argv, "argv", false);
  if (t.license) check(t.license.argv, "license.argv", true);

  return t;
}
