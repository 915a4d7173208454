import {
  type ArgumentEntry,
  pluginKindForConstructor,
  type RegistrationSite,
  type ResolvedArgument,
  type ResolvedReference,
} from "@plugscan/core";
import { type Mock, vi } from "vitest";
import { classifyValue } from "../../argument-parser.js";
import type { DiscoveryLogger } from "../../logger.js";

/**
 * Registration file with two plugins, a docstring that mentions a
 * descriptor, and helper functions around the entry point.
 */
export const REGISTRATION_SOURCE = [
  "from r2x_core import ParserPlugin, ExporterPlugin",
  "",
  "def helper():",
  '    return ParserPlugin(name="not-a-site", obj=None)',
  "",
  "",
  "def register_plugin() -> Package:",
  '    """Register ParserPlugin(name="fake") here."""',
  "    plugins = [",
  '        ParserPlugin(name="reeds", obj=ReEDSParser, config=ReEDSConfig(x=ExporterPlugin())),',
  "        ExporterPlugin(",
  '            name="exp",  # ExporterPlugin(',
  "            obj=Exporter,",
  "        ),",
  "    ]",
  '    return Package(name="pkg", plugins=plugins)',
  "",
  "",
  "def after():",
  '    ExporterPlugin(name="outside", obj=X)',
  "",
].join("\n");

/** Build a registration file from import lines and entry-point body lines. */
export function registrationFile(imports: readonly string[], body: readonly string[]): string {
  return [...imports, "", "", "def register_plugin():", ...body.map((line) => `    ${line}`), ""].join("\n");
}

/** A site for a standalone call expression. */
export function site(text: string, overrides: Partial<RegistrationSite> = {}): RegistrationSite {
  const constructorName = text.slice(0, text.indexOf("("));
  return {
    constructorName,
    kind: pluginKindForConstructor(constructorName),
    text,
    start: 0,
    end: text.length,
    line: 1,
    column: 1,
    ...overrides,
  };
}

/** A parsed argument classified the way the parser would. */
export function entry(name: string, raw: string): ArgumentEntry {
  return { name, raw, value: classifyValue(raw) };
}

export function literal(name: string, value: string | number | boolean | null, raw = String(value)): ResolvedArgument {
  return { name, raw, value: { type: "literal", value } };
}

export function reference(name: string, ref: ResolvedReference, raw = ref.name): ResolvedArgument {
  return { name, raw, value: { type: "reference", reference: ref } };
}

export function unsupported(name: string, raw: string, reason: string): ResolvedArgument {
  return { name, raw, value: { type: "unsupported", raw, reason } };
}

type LogMethod = (message: string) => void;

export interface MockLogger extends DiscoveryLogger {
  readonly debug: Mock<LogMethod>;
  readonly info: Mock<LogMethod>;
  readonly warn: Mock<LogMethod>;
}

export function createMockLogger(): MockLogger {
  return { debug: vi.fn<LogMethod>(), info: vi.fn<LogMethod>(), warn: vi.fn<LogMethod>() };
}
