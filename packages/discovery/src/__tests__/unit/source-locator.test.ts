import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { SourceNotFoundError } from "@plugscan/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { locateRegistrationFile, moduleNameFor } from "../../source-locator.js";

async function touch(path: string): Promise<void> {
  await mkdir(join(path, ".."), { recursive: true });
  await writeFile(path, "def register_plugin():\n    pass\n");
}

describe("locateRegistrationFile", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "plugscan-locator-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  // -------------------------------------------------------------------------
  // Candidate locations
  // -------------------------------------------------------------------------

  describe("candidate locations", () => {
    it("should find plugins.py inside the module directory", async () => {
      await touch(join(tempDir, "r2x_demo", "plugins.py"));

      const file = await locateRegistrationFile(tempDir, "r2x-demo");

      expect(file).toEqual({
        filePath: join(tempDir, "r2x_demo", "plugins.py"),
        modulePath: "r2x_demo.plugins",
        isPackageInit: false,
        entryPoint: "register_plugin",
      });
    });

    it("should treat a root named after the module as the module directory", async () => {
      const root = join(tempDir, "r2x_demo");
      await touch(join(root, "plugin.py"));

      const file = await locateRegistrationFile(root, "r2x-demo");

      expect(file.modulePath).toBe("r2x_demo.plugin");
    });

    it("should find a src layout", async () => {
      await touch(join(tempDir, "src", "r2x_demo", "plugins.py"));

      const file = await locateRegistrationFile(tempDir, "r2x-demo");

      expect(file.filePath).toBe(join(tempDir, "src", "r2x_demo", "plugins.py"));
      expect(file.modulePath).toBe("r2x_demo.plugins");
    });

    it("should use top-level module paths for files at a project root", async () => {
      await touch(join(tempDir, "plugins.py"));

      const file = await locateRegistrationFile(tempDir, "r2x-demo");

      expect(file.modulePath).toBe("plugins");
    });

    it("should honour configured file names and entry point", async () => {
      await touch(join(tempDir, "r2x_demo", "registry.py"));

      const file = await locateRegistrationFile(tempDir, "r2x-demo", {
        registrationFileNames: ["registry.py"],
        entryPoint: "setup",
      });

      expect(file.modulePath).toBe("r2x_demo.registry");
      expect(file.entryPoint).toBe("setup");
    });
  });

  // -------------------------------------------------------------------------
  // Failures
  // -------------------------------------------------------------------------

  describe("failures", () => {
    it("should throw SourceNotFoundError listing every place it looked", async () => {
      const error = await locateRegistrationFile(tempDir, "r2x-demo").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(SourceNotFoundError);
      expect(error).toMatchObject({ reason: "missing" });
      expect(error instanceof SourceNotFoundError ? error.candidates : []).toHaveLength(6);
    });

    it("should refuse to pick between several candidates", async () => {
      await touch(join(tempDir, "r2x_demo", "plugins.py"));
      await touch(join(tempDir, "r2x_demo", "plugin.py"));

      const error = await locateRegistrationFile(tempDir, "r2x-demo").catch((e: unknown) => e);

      expect(error).toMatchObject({
        reason: "ambiguous",
        candidates: [join(tempDir, "r2x_demo", "plugins.py"), join(tempDir, "r2x_demo", "plugin.py")],
      });
    });
  });

  // -------------------------------------------------------------------------
  // Entry-point hints
  // -------------------------------------------------------------------------

  describe("entry-point hints", () => {
    it("should let the hinted module win over ambiguous candidates", async () => {
      await touch(join(tempDir, "r2x_demo", "plugins.py"));
      await touch(join(tempDir, "r2x_demo", "plugin.py"));
      await touch(join(tempDir, "r2x_demo", "registry.py"));

      const file = await locateRegistrationFile(tempDir, "r2x-demo", {
        hint: { module: "r2x_demo.registry", attribute: "setup" },
      });

      expect(file).toEqual({
        filePath: join(tempDir, "r2x_demo", "registry.py"),
        modulePath: "r2x_demo.registry",
        isPackageInit: false,
        entryPoint: "setup",
      });
    });

    it("should resolve a hinted package to its __init__.py", async () => {
      await touch(join(tempDir, "r2x_demo", "__init__.py"));

      const file = await locateRegistrationFile(join(tempDir, "r2x_demo"), "r2x-demo", {
        hint: { module: "r2x_demo", attribute: "register_plugin" },
      });

      expect(file.filePath).toBe(join(tempDir, "r2x_demo", "__init__.py"));
      expect(file.isPackageInit).toBe(true);
    });

    it("should fall back to candidates but keep the hinted function name", async () => {
      await touch(join(tempDir, "r2x_demo", "plugins.py"));

      const file = await locateRegistrationFile(tempDir, "r2x-demo", {
        hint: { module: "r2x_demo.gone", attribute: "setup" },
      });

      expect(file.modulePath).toBe("r2x_demo.plugins");
      expect(file.entryPoint).toBe("setup");
    });
  });

  it("should normalise distribution names to module names", () => {
    expect(moduleNameFor("r2x-reeds")).toBe("r2x_reeds");
  });
});
