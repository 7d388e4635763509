#!/usr/bin/env node
import { createCli } from "./cli/program.js";

const cli = createCli();
void cli.runExit(process.argv.slice(2));
