#!/usr/bin/env node
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { ExitCode, runCli } from '../cli/build-videos-cli.js';
import { findToolRoot } from '../cli/tool-root.js';

const toolRoot = findToolRoot(path.dirname(fileURLToPath(import.meta.url)));

runCli(process.argv.slice(2), { toolRoot }).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[build-videos] fatal:', error);
    process.exitCode = ExitCode.Failure;
  },
);
