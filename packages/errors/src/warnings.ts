import { PlugscanError } from "./base.js";

/**
 * Recorded (never thrown) when an import statement cannot be parsed.
 *
 * The statement is skipped; a symbol it would have bound surfaces later as
 * an `UnresolvedSymbolError` if a descriptor argument actually uses it.
 */
export class UnrecognizedImportSyntaxError extends PlugscanError {
  readonly _tag = "DiscoveryWarning" as const;
  readonly code = "UNRECOGNIZED_IMPORT_SYNTAX" as const;
  readonly statement: string;
  readonly line: number;

  constructor(statement: string, line: number, detail: string) {
    super(`Skipped import at line ${line} (${detail}): ${statement}`, {
      statement,
      line: String(line),
    });
    this.statement = statement;
    this.line = line;
  }
}
