#!/usr/bin/env node
import { run } from './runCli';

process.exitCode = run(process.argv.slice(2));
