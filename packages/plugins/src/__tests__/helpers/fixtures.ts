import { mkdir, mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { DiscoveryLogger } from "@plugscan/discovery";
import { type Mock, vi } from "vitest";

export const DEMO_PACKAGE = "r2x-demo";

/** Registration file of the demo package, as `r2x_demo/plugins.py`. */
export const DEMO_SOURCE = [
  "from r2x_core import ExporterPlugin, IOType, ParserPlugin",
  "from r2x_demo.config import DemoConfig",
  "from r2x_demo.parser import DemoParser",
  "from .exporter import export_demo",
  "",
  "",
  "def register_plugin():",
  "    return Package(",
  '        name="r2x-demo",',
  "        plugins=[",
  "            ParserPlugin(",
  '                name="demo-parser",',
  "                obj=DemoParser,",
  "                config=DemoConfig,",
  "                io_type=IOType.STDOUT,",
  "            ),",
  '            ExporterPlugin(name="demo-exporter", obj=export_demo, requires_store=True),',
  "        ],",
  "    )",
  "",
].join("\n");

/** Hand-written manifest the runtime path reports for DEMO_SOURCE. */
export const DEMO_ORACLE = {
  name: DEMO_PACKAGE,
  plugins: [
    {
      name: "demo-parser",
      plugin_kind: "parser",
      obj: { module: "r2x_demo.parser", name: "DemoParser", kind: "class" },
      config: { module: "r2x_demo.config", name: "DemoConfig", kind: "class" },
      call_method: null,
      io_type: "stdout",
      requires_store: null,
    },
    {
      name: "demo-exporter",
      plugin_kind: "exporter",
      obj: { module: "r2x_demo.exporter", name: "export_demo", kind: "function" },
      config: null,
      call_method: null,
      io_type: null,
      requires_store: true,
    },
  ],
  metadata: {},
};

/** Same package, but one plugin names a class that is never imported. */
export const UNRESOLVED_SOURCE = DEMO_SOURCE.replace("obj=DemoParser", "obj=MissingParser");

/** Create a temp directory holding `r2x_demo/plugins.py`; returns its path. */
export async function writeDemoPackage(source: string = DEMO_SOURCE): Promise<string> {
  const root = await mkdtemp(join(tmpdir(), "plugscan-plugins-"));
  await mkdir(join(root, "r2x_demo"));
  await writeFile(join(root, "r2x_demo", "plugins.py"), source);
  return root;
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
