#!/usr/bin/env node
/**
 * piper-release executable
 */

import { exit, argv } from 'node:process';
import { runCli } from './run';

runCli(argv).then(
  (code) => exit(code),
  (error: unknown) => {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    exit(1);
  },
);
