#!/usr/bin/env node
import 'dotenv/config';
import { run } from './index.js';
import { errorMessage } from '../types/index.js';

run().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
