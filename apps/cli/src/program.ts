import { FOLIO_VERSION_TAG } from "@folio/types";
import { Command } from "commander";
import { buildCommand } from "./commands/build";
import { watchCommand } from "./commands/watch";

export function createProgram(): Command {
  return new Command()
    .name("folio")
    .description("Static site builder - keeps a source tree and its output in sync")
    .version(FOLIO_VERSION_TAG)
    .enablePositionalOptions()
    .addCommand(buildCommand())
    .addCommand(watchCommand());
}
