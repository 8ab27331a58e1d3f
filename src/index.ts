#!/usr/bin/env node

import { runCli } from './cli';

runCli(process.argv, process.env)
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
