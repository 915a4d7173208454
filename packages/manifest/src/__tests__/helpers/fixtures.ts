import type { ConstructorArgValue, DiscoveryPlugin, Package, PluginKind } from "@plugscan/core";

export const PARSER_REF = { module: "r2x_demo.parser", name: "DemoParser", objectKind: "class" } as const;
export const CONFIG_REF = { module: "r2x_demo.config", name: "DemoConfig", objectKind: "class" } as const;

export function plugin(
  kind: PluginKind,
  args: ReadonlyArray<readonly [string, ConstructorArgValue]>,
): DiscoveryPlugin {
  const constructorArgs = new Map<string, ConstructorArgValue>(args);
  const name = constructorArgs.get("name");
  const config = constructorArgs.get("config");
  return {
    name: typeof name === "string" ? name : "",
    kind,
    constructorArgs,
    config: config !== undefined && config !== null && typeof config === "object" ? config : null,
  };
}

export function demoPackage(): Package {
  return {
    packageName: "r2x-demo",
    plugins: [
      plugin("parser", [
        ["name", "demo-parser"],
        ["obj", PARSER_REF],
        ["config", CONFIG_REF],
        ["io_type", "stdout"],
      ]),
      plugin("upgrader", [
        ["name", "demo-upgrader"],
        ["obj", { module: "r2x_demo.upgrade", name: "upgrade", objectKind: "function" }],
        ["requires_store", true],
      ]),
    ],
    metadata: { version: "1.2.0" },
  };
}
