#!/usr/bin/env -S npx tsx

import { createProgram } from './program';
import { fail } from './output';

createProgram().parseAsync().catch(fail);
