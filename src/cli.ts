#!/usr/bin/env node
import { main } from './main';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Fatal error', error);
    process.exitCode = 1;
  },
);
