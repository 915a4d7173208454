import {
  createConsoleLogger,
  type EntryPointHint,
  type RegistrationFile,
  readRegistrationFile,
} from "@plugscan/discovery";
import {
  type DiscoveryError,
  getErrorMessage,
  InternalError,
  isDiscoveryError,
  wrapError,
} from "@plugscan/errors";
import { serializeManifest } from "@plugscan/manifest";
import { DEFAULT_ENTRY_POINT_GROUP, FALLBACK_LOG_TAG } from "./constants.js";
import { discoveryFingerprint } from "./discovery-cache.js";
import { readEntryPointHint } from "./entry-points.js";
import { resolveStaticDiscoveryFlag } from "./flags.js";
import { getFallbackDiscoveryCounter, getStaticDiscoveryCounter } from "./metrics.js";
import { SerialQueue } from "./serial-queue.js";
import type {
  BatchOutcome,
  DiscoveryOutcome,
  DiscoveryRequest,
  FallbackController,
  FallbackControllerConfig,
} from "./types.js";

type FallbackReason = DiscoveryError | InternalError;

function toFallbackReason(error: unknown): FallbackReason {
  if (isDiscoveryError(error)) return error;
  if (error instanceof InternalError) return error;
  return new InternalError(getErrorMessage(error), undefined, { cause: error });
}

// ---------------------------------------------------------------------------
// Controller
// ---------------------------------------------------------------------------

/**
 * Wrap a static discovery engine and the caller's dynamic path.
 *
 * With static discovery switched off every request goes straight to the
 * dynamic path. Switched on, a package is analysed statically and only falls
 * back when the engine reports a failure. Dynamic calls never overlap. Errors
 * they raise reach a `discover` caller unchanged; `discoverAll` reports them
 * per package.
 */
export function createFallbackController(config: FallbackControllerConfig): FallbackController {
  const enabled = resolveStaticDiscoveryFlag(process.env, config.enabled);
  const logger = config.logger ?? createConsoleLogger(FALLBACK_LOG_TAG);
  const group = config.entryPointGroup ?? DEFAULT_ENTRY_POINT_GROUP;
  const { engine, cache } = config;
  const queue = new SerialQueue();

  function runDynamic(request: DiscoveryRequest): Promise<string> {
    return queue.run(() => config.dynamicDiscovery(request));
  }

  async function resolveHint(request: DiscoveryRequest): Promise<EntryPointHint | undefined> {
    if (request.hint !== undefined || request.siteDir === undefined) return request.hint;
    try {
      return await readEntryPointHint(request.siteDir, request.packageName, group);
    } catch (error) {
      logger.warn(`Could not read entry points of ${request.packageName}: ${getErrorMessage(error)}`);
      return undefined;
    }
  }

  async function fallBack(
    request: DiscoveryRequest,
    reason: FallbackReason,
    fingerprint: string | undefined,
  ): Promise<DiscoveryOutcome> {
    logger.warn(
      `Static discovery failed for ${request.packageName} (${reason.code}): ${reason.message}; using dynamic discovery`,
    );
    config.onFallback?.(request, reason);
    getFallbackDiscoveryCounter().add(1, { "plugscan.error.code": reason.code });

    const manifest = await runDynamic(request);
    if (cache && fingerprint !== undefined) cache.set(request.packageName, fingerprint, manifest, "dynamic");
    return { packageName: request.packageName, manifest, source: "dynamic", fallbackReason: reason };
  }

  async function discover(request: DiscoveryRequest): Promise<DiscoveryOutcome> {
    const { packageName } = request;
    if (!enabled) {
      return { packageName, manifest: await runDynamic(request), source: "dynamic" };
    }

    let source: string;
    let file: RegistrationFile;
    try {
      file = await engine.locate(request.packageRoot, packageName, await resolveHint(request));
      source = await readRegistrationFile(request.packageRoot, file.filePath);
    } catch (error) {
      return fallBack(request, toFallbackReason(error), undefined);
    }

    const fingerprint = discoveryFingerprint(source, request.metadata);
    const cached = cache?.get(packageName, fingerprint);
    if (cached !== undefined) {
      const counter = cached.origin === "static" ? getStaticDiscoveryCounter() : getFallbackDiscoveryCounter();
      counter.add(1, { "plugscan.cache": true });
      return { packageName, manifest: cached.manifest, source: "cache", origin: cached.origin };
    }

    const result = engine.discoverSource(source, {
      packageName,
      modulePath: file.modulePath,
      isPackageInit: file.isPackageInit,
      filePath: file.filePath,
      entryPoint: file.entryPoint,
      metadata: request.metadata,
    });
    if (!result.ok) return fallBack(request, result.error, fingerprint);

    const manifest = serializeManifest(result.package, config.serializeOptions);
    cache?.set(packageName, fingerprint, manifest, "static");
    getStaticDiscoveryCounter().add(1, { "plugscan.cache": false });
    return { packageName, manifest, source: "static" };
  }

  async function discoverOrReport(request: DiscoveryRequest): Promise<BatchOutcome> {
    try {
      return await discover(request);
    } catch (caught) {
      const error = wrapError(caught);
      logger.warn(`Discovery failed for ${request.packageName}: ${error.message}`);
      config.onDiscoveryError?.(request, error);
      return { packageName: request.packageName, source: "error", error };
    }
  }

  function discoverAll(requests: readonly DiscoveryRequest[]): Promise<BatchOutcome[]> {
    return Promise.all(requests.map((request) => discoverOrReport(request)));
  }

  return { enabled, discover, discoverAll };
}
