#!/usr/bin/env tsx
import { run } from './program';

process.exitCode = await run(process.argv);
