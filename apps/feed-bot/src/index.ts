#!/usr/bin/env node
import 'dotenv/config';
import { main } from './commands.js';

main(process.argv.slice(2))
  .then(({ output, exitCode }) => {
    if (output) {
      if (exitCode === 0) console.log(output);
      else console.error(output);
    }
    process.exitCode = exitCode;
  })
  .catch((err: unknown) => {
    console.error('Fatal error:', err);
    process.exitCode = 1;
  });
