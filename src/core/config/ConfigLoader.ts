/**
 * Configuration Loader.
 *
 * Reads the optional YAML configuration:
 *
 * ```yaml
 * owner: alice            # default --owner
 * branch: main            # default --branch
 * visibility: public      # default --visibility
 * editor: suppress        # brew create editor: suppress | interactive
 * commitMessage: Initialize tap
 * validation:
 *   audit: false
 *   install: false
 *   test: false
 * ```
 *
 * A missing file at the default location means defaults. Unknown keys are
 * rejected so that typos do not go unnoticed.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import { VISIBILITIES } from "../inputs/RunInputs.js";
import {
  DEFAULT_PIPELINE_SETTINGS,
  EDITOR_POLICIES,
  type PipelineSettings,
} from "../pipeline/Step.js";
import { TapError, asError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Schema
// =============================================================================

const optionalToken = z.string().trim().min(1).optional();

export const ConfigSchema = z
  .object({
    owner: optionalToken,
    branch: optionalToken,
    visibility: z.enum(VISIBILITIES).optional(),
    editor: z.enum(EDITOR_POLICIES).default(DEFAULT_PIPELINE_SETTINGS.editor),
    commitMessage: z.string().trim().min(1).default(DEFAULT_PIPELINE_SETTINGS.commitMessage),
    validation: z
      .object({
        audit: z.boolean().default(false),
        install: z.boolean().default(false),
        test: z.boolean().default(false),
      })
      .strict()
      .default({}),
  })
  .strict();

export type TapConfig = z.infer<typeof ConfigSchema>;

export interface LoadedConfig {
  readonly config: TapConfig;

  /** File the values came from, or null when defaults were used. */
  readonly source: string | null;
}

export interface LoadConfigOptions {
  /** Raise instead of falling back to defaults when the file is absent. */
  readonly mustExist?: boolean;
}

export function defaultConfig(): TapConfig {
  return ConfigSchema.parse({});
}

/**
 * Step settings taken from the configuration.
 */
export function toPipelineSettings(config: TapConfig): PipelineSettings {
  return {
    editor: config.editor,
    commitMessage: config.commitMessage,
    validation: { ...config.validation },
  };
}

// =============================================================================
// ConfigLoader
// =============================================================================

export class ConfigLoader {
  /**
   * Loads and validates a configuration file.
   *
   * @throws TapError (CONFIG_PARSE_FAILED) for invalid YAML
   * @throws TapError (CONFIG_INVALID) for an invalid shape, or an absent file
   *   when `mustExist` is set
   */
  async load(filePath: string, options: LoadConfigOptions = {}): Promise<LoadedConfig> {
    let content: string;
    try {
      content = await fs.readFile(filePath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT" && !options.mustExist) {
        return { config: defaultConfig(), source: null };
      }
      throw new TapError(
        `Cannot read configuration file ${filePath}`,
        ErrorCode.CONFIG_INVALID,
        { path: filePath },
        "Check the --config path.",
        asError(err),
      );
    }

    const parsed = this.parseYaml(content, filePath);
    return { config: this.validate(parsed ?? {}, filePath), source: filePath };
  }

  private parseYaml(content: string, filePath: string): unknown {
    try {
      return parseYaml(content);
    } catch (error) {
      const cause = asError(error);

      let details: Record<string, unknown> = { path: filePath };
      if (error instanceof YAMLParseError) {
        details = {
          ...details,
          line: error.linePos?.[0]?.line,
          column: error.linePos?.[0]?.col,
        };
      }

      throw new TapError(
        "Invalid YAML in configuration file",
        ErrorCode.CONFIG_PARSE_FAILED,
        details,
        `Check the YAML syntax in ${filePath}: ${cause.message}`,
        cause,
      );
    }
  }

  private validate(parsed: unknown, filePath: string): TapConfig {
    const result = ConfigSchema.safeParse(parsed);
    if (result.success) {
      return result.data;
    }

    const issues = result.error.issues.map((issue) => {
      const fieldPath = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${fieldPath}: ${issue.message}`;
    });

    throw new TapError(
      "Invalid configuration",
      ErrorCode.CONFIG_INVALID,
      { path: filePath, issues },
      `Fix ${filePath}: ${issues.join("; ")}`,
    );
  }
}
