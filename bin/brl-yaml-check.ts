#!/usr/bin/env node

import { main } from '../cli/index';

main(process.argv.slice(2))
  .then(exitCode => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    console.error(error);
    process.exit(1);
  });
