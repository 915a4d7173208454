import { stat } from "node:fs/promises";
import { basename, dirname, join, sep } from "node:path";
import { SourceNotFoundError } from "@plugscan/errors";

/**
 * The `module:attribute` target of a package's plugin entry point,
 * e.g. `r2x_example.plugins:register_plugin`.
 */
export interface EntryPointHint {
  readonly module: string;
  readonly attribute: string;
}

export interface LocateOptions {
  readonly registrationFileNames?: readonly string[] | undefined;
  /** Function name used when no hint names one */
  readonly entryPoint?: string | undefined;
  readonly hint?: EntryPointHint | undefined;
}

export interface RegistrationFile {
  readonly filePath: string;
  /** Dotted module path of the file */
  readonly modulePath: string;
  readonly isPackageInit: boolean;
  readonly entryPoint: string;
}

const DEFAULT_FILE_NAMES = ["plugins.py", "plugin.py"] as const;
const DEFAULT_ENTRY_POINT = "register_plugin";

/** Import name of a distribution: `r2x-example` → `r2x_example`. */
export function moduleNameFor(packageName: string): string {
  return packageName.trim().replace(/-/g, "_");
}

// ---------------------------------------------------------------------------
// Locate
// ---------------------------------------------------------------------------

/**
 * Find the registration file of an installed package.
 *
 * An entry-point hint whose module file exists wins outright. Otherwise the
 * configured file names are looked for at `<root>`, `<root>/<module>` and
 * `<root>/src/<module>`, and exactly one of them must exist.
 *
 * @throws SourceNotFoundError when nothing or more than one candidate exists
 */
export async function locateRegistrationFile(
  packageRoot: string,
  packageName: string,
  options: LocateOptions = {},
): Promise<RegistrationFile> {
  const entryPoint = options.hint?.attribute ?? options.entryPoint ?? DEFAULT_ENTRY_POINT;

  if (options.hint !== undefined) {
    const hinted = await locateHintedModule(packageRoot, options.hint);
    if (hinted !== undefined) return { ...hinted, entryPoint };
  }

  const moduleName = moduleNameFor(packageName);
  const fileNames = options.registrationFileNames ?? DEFAULT_FILE_NAMES;
  const rootIsModule = basename(packageRoot) === moduleName;

  const looked: string[] = [];
  const found: Array<{ filePath: string; modulePath: string }> = [];
  const directories: ReadonlyArray<readonly [string, string | undefined]> = [
    [packageRoot, rootIsModule ? moduleName : undefined],
    [join(packageRoot, moduleName), moduleName],
    [join(packageRoot, "src", moduleName), moduleName],
  ];

  for (const [directory, packagePath] of directories) {
    for (const fileName of fileNames) {
      const filePath = join(directory, fileName);
      looked.push(filePath);
      if (await isFile(packageRoot, filePath)) {
        const stem = fileName.replace(/\.py$/, "");
        found.push({ filePath, modulePath: packagePath === undefined ? stem : `${packagePath}.${stem}` });
      }
    }
  }

  const [only, ...others] = found;
  if (only === undefined) {
    throw new SourceNotFoundError(packageRoot, "missing", looked);
  }
  if (others.length > 0) {
    throw new SourceNotFoundError(
      packageRoot,
      "ambiguous",
      found.map((f) => f.filePath),
    );
  }
  return { ...only, isPackageInit: false, entryPoint };
}

async function locateHintedModule(
  packageRoot: string,
  hint: EntryPointHint,
): Promise<Omit<RegistrationFile, "entryPoint"> | undefined> {
  const relative = hint.module.split(".").join(sep);
  // The root may be the site directory, the package directory, or a source checkout.
  const bases = [packageRoot, dirname(packageRoot), join(packageRoot, "src")];
  for (const base of bases) {
    const moduleFile = join(base, `${relative}.py`);
    if (await isFile(packageRoot, moduleFile)) {
      return { filePath: moduleFile, modulePath: hint.module, isPackageInit: false };
    }
    const initFile = join(base, relative, "__init__.py");
    if (await isFile(packageRoot, initFile)) {
      return { filePath: initFile, modulePath: hint.module, isPackageInit: true };
    }
  }
  return undefined;
}

async function isFile(packageRoot: string, filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).isFile();
  } catch (error) {
    if (error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR")) {
      return false;
    }
    throw new SourceNotFoundError(packageRoot, "unreadable", [filePath], { cause: error });
  }
}
