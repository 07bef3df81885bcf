#!/usr/bin/env node
import { runGitCli } from './cli/git.js';

await runGitCli(process.argv);
