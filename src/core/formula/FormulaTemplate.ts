/**
 * Renders the stub formula written in `stub` mode.
 *
 * The template lives in `templates/formula.rb.hbs` at the package root and is
 * compiled once per process.
 *
 * @module
 */

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import Handlebars from "handlebars";
import { TapError, asError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { formulaClassName } from "./FormulaNames.js";

/** Source placeholder used when the run has no formula URL. */
export const PLACEHOLDER_URL = "https://example.com/TODO.tar.gz";
export const PLACEHOLDER_HOMEPAGE = "https://example.com";

const TEMPLATE_PATH = fileURLToPath(new URL("../../../templates/formula.rb.hbs", import.meta.url));

export interface StubFormulaData {
  readonly name: string;
  readonly url?: string;
  readonly homepage?: string;
}

type FormulaTemplate = (data: Record<string, string>) => string;

let compiled: FormulaTemplate | undefined;

function loadTemplate(): FormulaTemplate {
  if (compiled) {
    return compiled;
  }

  try {
    const source = fs.readFileSync(TEMPLATE_PATH, "utf-8");
    // Output is Ruby, not HTML
    compiled = Handlebars.compile<Record<string, string>>(source, { noEscape: true, strict: true });
    return compiled;
  } catch (err) {
    throw new TapError(
      "Failed to load the formula template",
      ErrorCode.INTERNAL_ERROR,
      { path: TEMPLATE_PATH },
      "Reinstall tapforge; the packaged templates directory is incomplete.",
      asError(err),
      false,
    );
  }
}

/**
 * Renders the stub formula for `data.name`.
 */
export function renderStubFormula(data: StubFormulaData): string {
  const template = loadTemplate();
  return template({
    className: formulaClassName(data.name),
    url: data.url ?? PLACEHOLDER_URL,
    homepage: data.homepage ?? PLACEHOLDER_HOMEPAGE,
  });
}
