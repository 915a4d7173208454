import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { createDiscoveryEngine, silentLogger } from "@plugscan/discovery";
import { InternalError } from "@plugscan/errors";
import { assertManifestEquivalent, validateManifest } from "@plugscan/manifest";
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { DiscoveryCache } from "../../discovery-cache.js";
import { createFallbackController } from "../../fallback-controller.js";
import type { DiscoveryRequest, DynamicDiscovery, FallbackControllerConfig } from "../../types.js";
import {
  createMockLogger,
  DEMO_ORACLE,
  DEMO_PACKAGE,
  DEMO_SOURCE,
  type MockLogger,
  UNRESOLVED_SOURCE,
  writeDemoPackage,
} from "../helpers/fixtures.js";

const ORACLE_JSON = JSON.stringify(DEMO_ORACLE);

describe("fallback controller", () => {
  const engine = createDiscoveryEngine({}, { logger: silentLogger });
  const roots: string[] = [];
  let logger: MockLogger;
  let dynamicDiscovery: Mock<DynamicDiscovery>;

  beforeEach(() => {
    logger = createMockLogger();
    dynamicDiscovery = vi.fn<DynamicDiscovery>().mockResolvedValue(ORACLE_JSON);
  });

  afterEach(async () => {
    await Promise.all(roots.splice(0).map((root) => rm(root, { recursive: true, force: true })));
  });

  async function demoRequest(source: string = DEMO_SOURCE): Promise<DiscoveryRequest> {
    const packageRoot = await writeDemoPackage(source);
    roots.push(packageRoot);
    return { packageName: DEMO_PACKAGE, packageRoot };
  }

  function controller(overrides: Partial<FallbackControllerConfig> = {}) {
    return createFallbackController({ engine, dynamicDiscovery, enabled: true, logger, ...overrides });
  }

  // -------------------------------------------------------------------------
  // Switch
  // -------------------------------------------------------------------------

  describe("when static discovery is off", () => {
    it("should go straight to the dynamic path", async () => {
      const request = await demoRequest();
      const outcome = await controller({ enabled: false }).discover(request);

      expect(outcome).toEqual({ packageName: DEMO_PACKAGE, manifest: ORACLE_JSON, source: "dynamic" });
      expect(dynamicDiscovery).toHaveBeenCalledWith(request);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it("should report the switch", () => {
      expect(controller({ enabled: false }).enabled).toBe(false);
    });
  });

  // -------------------------------------------------------------------------
  // Static path
  // -------------------------------------------------------------------------

  describe("static discovery", () => {
    it("should produce a manifest equivalent to the runtime one", async () => {
      const outcome = await controller().discover(await demoRequest());

      expect(outcome.source).toBe("static");
      expect(() => assertManifestEquivalent(JSON.parse(outcome.manifest), DEMO_ORACLE)).not.toThrow();
      expect(dynamicDiscovery).not.toHaveBeenCalled();
    });

    it("should produce a manifest the schema accepts", async () => {
      const outcome = await controller().discover(await demoRequest());

      expect(validateManifest(outcome.manifest).plugins).toHaveLength(2);
    });

    it("should apply serialize options", async () => {
      const outcome = await controller({ serializeOptions: { nullPolicy: "omit" } }).discover(await demoRequest());

      expect(Object.keys(JSON.parse(outcome.manifest).plugins[1])).toEqual([
        "name",
        "plugin_kind",
        "obj",
        "requires_store",
      ]);
    });

    it("should use the entry point named in the package's dist-info", async () => {
      const request = await demoRequest(DEMO_SOURCE.replace("def register_plugin", "def build_plugins"));
      const distInfo = join(request.packageRoot, "r2x_demo-0.1.0.dist-info");
      await mkdir(distInfo);
      await writeFile(join(distInfo, "entry_points.txt"), "[r2x_plugin]\ndemo = r2x_demo.plugins:build_plugins\n");

      const outcome = await controller().discover({ ...request, siteDir: request.packageRoot });

      expect(outcome.source).toBe("static");
    });
  });

  // -------------------------------------------------------------------------
  // Cache
  // -------------------------------------------------------------------------

  describe("cache", () => {
    it("should serve an unchanged package from the cache", async () => {
      const cache = new DiscoveryCache();
      const ctl = controller({ cache });
      const request = await demoRequest();

      const first = await ctl.discover(request);
      const second = await ctl.discover(request);

      expect(second).toEqual({
        packageName: DEMO_PACKAGE,
        manifest: first.manifest,
        source: "cache",
        origin: "static",
      });
    });

    it("should rediscover when the package metadata changes", async () => {
      const cache = new DiscoveryCache();
      const ctl = controller({ cache });
      const request = await demoRequest();
      await ctl.discover({ ...request, metadata: { version: "0.1.0" } });

      const outcome = await ctl.discover({ ...request, metadata: { version: "0.2.0" } });

      expect(outcome.source).toBe("static");
      expect(JSON.parse(outcome.manifest).metadata).toEqual({ version: "0.2.0" });
    });

    it("should rediscover after the registration file changes", async () => {
      const cache = new DiscoveryCache();
      const ctl = controller({ cache });
      const request = await demoRequest();
      await ctl.discover(request);

      await writeFile(
        join(request.packageRoot, "r2x_demo", "plugins.py"),
        DEMO_SOURCE.replace('name="demo-parser"', 'name="renamed-parser"'),
      );
      const outcome = await ctl.discover(request);

      expect(outcome.source).toBe("static");
      expect(JSON.parse(outcome.manifest).plugins[0].name).toBe("renamed-parser");
    });

    it("should cache the dynamic result of a failing package", async () => {
      const cache = new DiscoveryCache();
      const ctl = controller({ cache });
      const request = await demoRequest(UNRESOLVED_SOURCE);

      await ctl.discover(request);
      const second = await ctl.discover(request);

      expect(second.source).toBe("cache");
      expect(second.origin).toBe("dynamic");
      expect(dynamicDiscovery).toHaveBeenCalledTimes(1);
    });
  });

  // -------------------------------------------------------------------------
  // Fallback
  // -------------------------------------------------------------------------

  describe("fallback", () => {
    it("should fall back when static discovery fails", async () => {
      const onFallback = vi.fn();
      const request = await demoRequest(UNRESOLVED_SOURCE);

      const outcome = await controller({ onFallback }).discover(request);

      expect(outcome.source).toBe("dynamic");
      expect(outcome.manifest).toBe(ORACLE_JSON);
      expect(outcome.fallbackReason?.code).toBe("UNRESOLVED_SYMBOL");
      expect(onFallback).toHaveBeenCalledWith(request, outcome.fallbackReason);
      expect(logger.warn).toHaveBeenCalledWith(
        "Static discovery failed for r2x-demo (UNRESOLVED_SYMBOL): Symbol 'MissingParser' (argument 'obj') is not imported; using dynamic discovery",
      );
    });

    it("should fall back when no registration file exists", async () => {
      const request = await demoRequest();
      await rm(join(request.packageRoot, "r2x_demo", "plugins.py"));

      const outcome = await controller().discover(request);

      expect(outcome.fallbackReason?.code).toBe("SOURCE_NOT_FOUND");
      expect(dynamicDiscovery).toHaveBeenCalledTimes(1);
    });

    it("should propagate errors from the dynamic path", async () => {
      dynamicDiscovery.mockRejectedValue(new Error("interpreter exited with status 1"));

      await expect(controller().discover(await demoRequest(UNRESOLVED_SOURCE))).rejects.toThrow(
        "interpreter exited with status 1",
      );
    });
  });

  // -------------------------------------------------------------------------
  // discoverAll
  // -------------------------------------------------------------------------

  describe("discoverAll", () => {
    it("should preserve request order", async () => {
      const requests = [await demoRequest(UNRESOLVED_SOURCE), await demoRequest(), await demoRequest()];

      const outcomes = await controller().discoverAll(requests);

      expect(outcomes.map((o) => o.source)).toEqual(["dynamic", "static", "static"]);
    });

    it("should never run two dynamic discoveries at once", async () => {
      let active = 0;
      let maxActive = 0;
      dynamicDiscovery.mockImplementation(async () => {
        active++;
        maxActive = Math.max(maxActive, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return ORACLE_JSON;
      });
      const requests = await Promise.all([1, 2, 3].map(() => demoRequest(UNRESOLVED_SOURCE)));

      const outcomes = await controller().discoverAll(requests);

      expect(outcomes).toHaveLength(3);
      expect(dynamicDiscovery).toHaveBeenCalledTimes(3);
      expect(maxActive).toBe(1);
    });

    it("should report a failing package without losing the others", async () => {
      const onDiscoveryError = vi.fn();
      dynamicDiscovery.mockRejectedValue(new Error("interpreter crashed"));
      const requests = [await demoRequest(), await demoRequest(UNRESOLVED_SOURCE)];

      const outcomes = await controller({ onDiscoveryError }).discoverAll(requests);

      expect(outcomes.map((o) => o.source)).toEqual(["static", "error"]);
      const failure = outcomes[1];
      if (failure?.source !== "error") throw new Error("expected a failed outcome");
      expect(failure.error).toBeInstanceOf(InternalError);
      expect(failure.error.message).toBe("interpreter crashed");
      expect(onDiscoveryError).toHaveBeenCalledWith(requests[1], failure.error);
      expect(logger.warn).toHaveBeenCalledWith("Discovery failed for r2x-demo: interpreter crashed");
    });
  });
});
