import { Command } from "commander";

import { compileCommand } from "./cli/compile.js";

export function buildProgram(): Command {
  const program = new Command();

  program
    .name("buildpack-compile")
    .description("Compile a model application project into a deployable runtime bundle")
    .argument("<build-dir>", "Build (target) directory holding the pushed project")
    .argument("<cache-dir>", "Artifact cache directory shared between builds")
    .action(async (buildDir: string, cacheDir: string) => {
      await compileCommand(buildDir, cacheDir);
    });

  return program;
}

export async function main(argv: string[]): Promise<void> {
  await buildProgram().parseAsync(argv);
}
