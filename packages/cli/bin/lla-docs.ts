#!/usr/bin/env -S node --import tsx
import { createProgram } from '../src/program.js';

await createProgram().parseAsync();
