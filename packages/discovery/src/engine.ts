import { readFile } from "node:fs/promises";
import { SpanStatusCode } from "@opentelemetry/api";
import type { Package, PackageMetadata } from "@plugscan/core";
import {
  type DiscoveryError,
  getErrorMessage,
  InternalError,
  isDiscoveryError,
  SourceNotFoundError,
  type UnrecognizedImportSyntaxError,
} from "@plugscan/errors";
import { parseArguments } from "./argument-parser.js";
import { type DiscoveryConfig, type DiscoveryConfigInput, resolveDiscoveryConfig } from "./config.js";
import { buildImportMap } from "./import-map.js";
import { createConsoleLogger, type DiscoveryLogger } from "./logger.js";
import { buildDiscoveryPlugin, buildPackage } from "./manifest-builder.js";
import { extractRegistrationSites } from "./site-extractor.js";
import { type EntryPointHint, locateRegistrationFile, type RegistrationFile } from "./source-locator.js";
import { createCommandMatcher, type StructuralMatcher } from "./structural-matcher.js";
import { resolveArgument } from "./symbol-resolver.js";
import { withSpan } from "./telemetry.js";

// ============================================================================
// TYPES
// ============================================================================

/**
 * Outcome of one static discovery attempt. Failures are values: the engine
 * never throws for a package it cannot analyse.
 */
export type DiscoveryResult =
  | {
      readonly ok: true;
      readonly package: Package;
      readonly warnings: readonly UnrecognizedImportSyntaxError[];
    }
  | {
      readonly ok: false;
      readonly error: DiscoveryError | InternalError;
      readonly warnings: readonly UnrecognizedImportSyntaxError[];
    };

export interface DiscoverOptions {
  readonly hint?: EntryPointHint | undefined;
  readonly metadata?: PackageMetadata | undefined;
}

export interface SourceContext {
  readonly packageName: string;
  readonly modulePath?: string | undefined;
  readonly isPackageInit?: boolean | undefined;
  readonly filePath?: string | undefined;
  readonly entryPoint?: string | undefined;
  readonly metadata?: PackageMetadata | undefined;
}

export interface DiscoveryEngineDeps {
  readonly logger?: DiscoveryLogger | undefined;
  /** Overrides the matcher built from `structuralMatcher` config */
  readonly matcher?: StructuralMatcher | undefined;
}

export interface DiscoveryEngine {
  readonly config: Readonly<DiscoveryConfig>;
  locate(packageRoot: string, packageName: string, hint?: EntryPointHint): Promise<RegistrationFile>;
  discover(packageRoot: string, packageName: string, options?: DiscoverOptions): Promise<DiscoveryResult>;
  discoverSource(source: string, context: SourceContext): DiscoveryResult;
}

const SPAN_NAME = "plugscan.discovery.package";

function toFailureError(error: unknown): DiscoveryError | InternalError {
  if (isDiscoveryError(error)) return error;
  if (error instanceof InternalError) return error;
  return new InternalError(
    getErrorMessage(error),
    error instanceof Error ? { originalName: error.name } : undefined,
    { cause: error },
  );
}

// ============================================================================
// ENGINE
// ============================================================================

/**
 * Create a static discovery engine.
 *
 * @throws DiscoveryConfigurationError when `config` is invalid
 */
export function createDiscoveryEngine(
  config: DiscoveryConfigInput = {},
  deps: DiscoveryEngineDeps = {},
): DiscoveryEngine {
  const resolved = resolveDiscoveryConfig(config);
  const logger = deps.logger ?? createConsoleLogger(undefined, resolved.logLevel);
  const matcher =
    deps.matcher ??
    (resolved.structuralMatcher === undefined ? undefined : createCommandMatcher(resolved.structuralMatcher));

  function discoverSource(source: string, context: SourceContext): DiscoveryResult {
    return withSpan<DiscoveryResult>(SPAN_NAME, { "plugscan.package": context.packageName }, (span) => {
      let warnings: readonly UnrecognizedImportSyntaxError[] = [];
      try {
        const imports = buildImportMap(source, {
          modulePath: context.modulePath,
          isPackageInit: context.isPackageInit,
          logger,
        });
        warnings = imports.warnings;

        const sites = extractRegistrationSites(source, {
          entryPoint: context.entryPoint ?? resolved.entryPoint,
          descriptorSuffix: resolved.descriptorSuffix,
          importMap: imports.importMap,
          filePath: context.filePath,
          matcher,
        });

        const plugins = sites.map((site) => {
          const args = parseArguments(site).map((entry) =>
            resolveArgument(entry, imports.importMap, {
              enumerations: resolved.enumerations,
              localNames: imports.localNames,
            }),
          );
          return buildDiscoveryPlugin(site, args, {
            tolerateUnsupported: resolved.tolerateUnsupported,
            logger,
          });
        });

        const pkg = buildPackage(context.packageName, plugins, context.metadata);
        span.setAttribute("plugscan.plugin_count", pkg.plugins.length);
        logger.debug(`Discovered ${pkg.plugins.length} plugin(s) in ${context.packageName}`);
        return { ok: true, package: pkg, warnings };
      } catch (caught) {
        const error = toFailureError(caught);
        span.setAttribute("plugscan.error.code", error.code);
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
        logger.debug(`Static discovery of ${context.packageName} failed: ${error.message}`);
        return { ok: false, error, warnings };
      }
    });
  }

  function locate(packageRoot: string, packageName: string, hint?: EntryPointHint): Promise<RegistrationFile> {
    return locateRegistrationFile(packageRoot, packageName, {
      registrationFileNames: resolved.registrationFileNames,
      entryPoint: resolved.entryPoint,
      hint,
    });
  }

  async function discover(
    packageRoot: string,
    packageName: string,
    options: DiscoverOptions = {},
  ): Promise<DiscoveryResult> {
    let file: RegistrationFile;
    let source: string;
    try {
      file = await locate(packageRoot, packageName, options.hint);
      source = await readRegistrationFile(packageRoot, file.filePath);
    } catch (caught) {
      const error = toFailureError(caught);
      logger.debug(`Static discovery of ${packageName} failed: ${error.message}`);
      return { ok: false, error, warnings: [] };
    }

    return discoverSource(source, {
      packageName,
      modulePath: file.modulePath,
      isPackageInit: file.isPackageInit,
      filePath: file.filePath,
      entryPoint: file.entryPoint,
      metadata: options.metadata,
    });
  }

  return { config: resolved, locate, discover, discoverSource };
}

/** Read a registration file, reporting any I/O failure as unreadable source. */
export async function readRegistrationFile(packageRoot: string, filePath: string): Promise<string> {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    throw new SourceNotFoundError(packageRoot, "unreadable", [filePath], { cause: error });
  }
}
