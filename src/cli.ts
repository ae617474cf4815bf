#!/usr/bin/env node
import { main } from './index.js';

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
