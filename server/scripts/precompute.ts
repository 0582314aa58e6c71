#!/usr/bin/env node
import dotenv from 'dotenv';
dotenv.config();

import { loadAppConfig } from '../config/app-config.js';
import { errorMessage } from '../errors.js';
import { createServices } from '../services.js';
import { createProgram } from './precompute-cli.js';

const program = createProgram(({ simulate }) => createServices(loadAppConfig(), { simulate }));

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`❌ [Pipeline] ${errorMessage(error)}`);
  process.exit(1);
});
