#!/usr/bin/env tsx
import { TapPipeline } from "@tapkit/core";
import { CLI } from "./cli";

const cli = new CLI(new TapPipeline());
const exitCode = await cli.run(process.argv.slice(2));
process.exit(exitCode);
