import {
  type ConstructorArgValue,
  type DiscoveryPlugin,
  deepFreeze,
  type FieldSpec,
  fieldSpecFor,
  isIoType,
  type Package,
  type PackageMetadata,
  PLUGIN_FIELDS,
  type RegistrationSite,
  type ResolvedArgument,
  type ResolvedReference,
} from "@plugscan/core";
import { UnknownArgumentError, UnknownPluginKindError, UnsupportedValueError } from "@plugscan/errors";
import { type DiscoveryLogger, silentLogger } from "./logger.js";

export interface BuildPluginOptions {
  /** Optional fields recorded as null when their value is unsupported */
  readonly tolerateUnsupported?: readonly string[] | undefined;
  readonly logger?: DiscoveryLogger | undefined;
}

/**
 * Assemble one plugin from its site and resolved arguments.
 *
 * @throws UnknownPluginKindError for a constructor outside the kind mapping
 * @throws UnknownArgumentError for a keyword the kind does not define
 * @throws UnsupportedValueError for wrong types, untolerated unsupported
 *   values, and missing required fields
 */
export function buildDiscoveryPlugin(
  site: RegistrationSite,
  args: readonly ResolvedArgument[],
  options: BuildPluginOptions = {},
): DiscoveryPlugin {
  const kind = site.kind;
  if (kind === undefined) {
    throw new UnknownPluginKindError(site.constructorName, site.line);
  }

  const constructorArgs = new Map<string, ConstructorArgValue>();
  for (const arg of args) {
    const spec = fieldSpecFor(kind, arg.name);
    if (spec === undefined) {
      throw new UnknownArgumentError(arg.name, kind);
    }
    constructorArgs.set(arg.name, fieldValue(spec, arg, site, options));
  }

  for (const spec of PLUGIN_FIELDS[kind]) {
    if (spec.required && !constructorArgs.has(spec.name)) {
      throw new UnsupportedValueError(spec.name, "", `missing required argument of ${site.constructorName}`);
    }
  }

  const name = constructorArgs.get("name");
  const config = constructorArgs.get("config");
  return deepFreeze({
    name: typeof name === "string" ? name : "",
    kind,
    constructorArgs,
    config: isReference(config) ? config : null,
  });
}

function isReference(value: ConstructorArgValue | undefined): value is ResolvedReference {
  return value !== undefined && value !== null && typeof value === "object";
}

function fieldValue(
  spec: FieldSpec,
  arg: ResolvedArgument,
  site: RegistrationSite,
  options: BuildPluginOptions,
): ConstructorArgValue {
  const { value } = arg;

  if (value.type === "unsupported") {
    if (!spec.required && (options.tolerateUnsupported ?? []).includes(spec.name)) {
      (options.logger ?? silentLogger).warn(
        `Recording ${spec.name}=null for ${site.constructorName} at line ${site.line}: ${value.raw} (${value.reason})`,
      );
      return null;
    }
    throw new UnsupportedValueError(arg.name, arg.raw, value.reason);
  }

  if (value.type === "literal" && value.value === null) {
    if (spec.required) {
      throw new UnsupportedValueError(arg.name, arg.raw, "required field cannot be None");
    }
    return null;
  }

  switch (spec.type) {
    case "string":
      if (value.type === "literal" && typeof value.value === "string") return value.value;
      throw new UnsupportedValueError(arg.name, arg.raw, "expected a string");
    case "boolean":
      if (value.type === "literal" && typeof value.value === "boolean") return value.value;
      throw new UnsupportedValueError(arg.name, arg.raw, "expected a boolean");
    case "io_type":
      if (value.type === "literal" && typeof value.value === "string" && isIoType(value.value)) {
        return value.value;
      }
      throw new UnsupportedValueError(arg.name, arg.raw, "expected one of stdin, stdout, both");
    case "reference":
      if (value.type === "reference") return value.reference;
      throw new UnsupportedValueError(arg.name, arg.raw, "expected an imported class or function");
  }
}

/**
 * Wrap plugins into a frozen package, keeping their source order.
 */
export function buildPackage(
  packageName: string,
  plugins: readonly DiscoveryPlugin[],
  metadata: PackageMetadata = {},
): Package {
  return deepFreeze({ packageName, plugins: [...plugins], metadata: { ...metadata } });
}
