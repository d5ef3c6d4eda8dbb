/**
 * External tool collaborators handed to every step.
 *
 * @module
 */

import { BrewCli } from "./BrewCli.js";
import { ExecaCommandRunner, type CommandRunner } from "./CommandRunner.js";
import { GhCli } from "./GhCli.js";
import { SimpleGitClient, type GitClient } from "./GitClient.js";

export interface Toolbox {
  readonly commands: CommandRunner;
  readonly brew: BrewCli;
  readonly gh: GhCli;
  readonly git: GitClient;
}

/**
 * Builds a toolbox around one command runner.
 *
 * @param commands - Runner for brew and gh (default: execa)
 * @param git - Git client (default: simple-git)
 */
export function createToolbox(
  commands: CommandRunner = new ExecaCommandRunner(),
  git: GitClient = new SimpleGitClient(),
): Toolbox {
  return {
    commands,
    brew: new BrewCli(commands),
    gh: new GhCli(commands),
    git,
  };
}
