/**
 * Homebrew CLI wrapper.
 *
 * @module
 */

import type { EditorPolicy } from "../pipeline/Step.js";
import { expectSuccess, type CommandRunner, type RunCommandOptions } from "./CommandRunner.js";
import { TapError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

/**
 * Environment that makes `brew create` skip its editor.
 */
export const SUPPRESSED_EDITOR_ENV: Readonly<Record<string, string>> = {
  HOMEBREW_EDITOR: "true",
  EDITOR: "true",
  VISUAL: "true",
};

export interface BrewCreateParams {
  /** Tap the formula is created in (`owner/repo`) */
  readonly tapSlug: string;

  /** Formula name passed with `--set-name` */
  readonly name: string;

  /** Source tarball URL */
  readonly url: string;

  readonly editor: EditorPolicy;
}

export class BrewCli {
  constructor(private readonly commands: CommandRunner) {}

  /**
   * Homebrew's repository root (`brew --repository`).
   */
  async repository(): Promise<string> {
    const result = expectSuccess(await this.commands.run("brew", ["--repository"]));
    if (result.stdout === "") {
      throw new TapError(
        "brew --repository returned empty output",
        ErrorCode.TOOL_COMMAND_FAILED,
        { command: result.command },
      );
    }
    return result.stdout;
  }

  async tapNew(slug: string): Promise<void> {
    expectSuccess(await this.commands.run("brew", ["tap-new", slug]));
  }

  async create(params: BrewCreateParams): Promise<void> {
    const options: RunCommandOptions =
      params.editor === "interactive"
        ? { interactive: true }
        : { env: { ...SUPPRESSED_EDITOR_ENV } };

    const result = await this.commands.run(
      "brew",
      ["create", "--tap", params.tapSlug, "--set-name", params.name, params.url],
      options,
    );
    expectSuccess(
      result,
      `brew create failed for ${params.url}. Check that the URL is downloadable, ` +
        `or use --formula-mode stub and edit the formula by hand.`,
    );
  }

  async tap(name: string): Promise<void> {
    expectSuccess(await this.commands.run("brew", ["tap", name]));
  }

  /**
   * Names printed by a bare `brew tap`.
   */
  async listTaps(): Promise<string[]> {
    const result = expectSuccess(await this.commands.run("brew", ["tap"]));
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line !== "");
  }

  async audit(formulaRef: string): Promise<void> {
    expectSuccess(await this.commands.run("brew", ["audit", "--formula", formulaRef]));
  }

  async install(formulaRef: string): Promise<void> {
    expectSuccess(await this.commands.run("brew", ["install", formulaRef]));
  }

  async test(formulaRef: string): Promise<void> {
    expectSuccess(await this.commands.run("brew", ["test", formulaRef]));
  }
}
