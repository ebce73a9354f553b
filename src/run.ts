#!/usr/bin/env node

import { RunCommand } from './commands/run';

new RunCommand()
  .run(process.argv.slice(2))
  .then((exitCode) => process.exit(exitCode))
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
