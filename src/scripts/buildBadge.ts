#!/usr/bin/env node
import { runBadgeCommand } from "../functions/cli.js";

process.exitCode = await runBadgeCommand(process.argv.slice(2));
