#!/usr/bin/env node
import { Builtins, Cli } from "clipanion";
import { createCli } from "./cli/program.js";

const cli = createCli();
cli.register(Builtins.HelpCommand);
cli.register(Builtins.VersionCommand);

void cli.runExit(process.argv.slice(2), Cli.defaultContext);
