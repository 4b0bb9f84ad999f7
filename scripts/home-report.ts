#!/usr/bin/env tsx
import { buildProgram } from './cli';

buildProgram().parseAsync(process.argv).catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
